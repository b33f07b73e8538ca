/**
 * @file job.ts
 * @description Response shapes for brand workflow jobs
 */

import { errorOf, resultOf } from "../core/lifecycle";
import {
  BrandBrief,
  Job,
  UnitStatus,
  WorkflowStep,
} from "../interfaces/workflow";

export interface JobView {
  job_id: string;
  status: UnitStatus;
  current_step: WorkflowStep | null;
  progress: number;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  error: string | null;
}

export interface JobListView {
  jobs: JobView[];
  total: number;
}

/**
 * @interface JobResultsView
 * @description Envelope returned once a job has completed
 */
export interface JobResultsView {
  job_id: string;
  status: UnitStatus;
  brand_brief: BrandBrief;
  brand_identity: unknown;
  marketing: unknown;
  created_at: string;
  completed_at: string | null;
}

function iso(date: Date | undefined): string | null {
  return date ? date.toISOString() : null;
}

export function toJobView(job: Job): JobView {
  return {
    job_id: job.id,
    status: job.status,
    current_step: job.currentStep ?? null,
    progress: job.progress,
    created_at: job.createdAt.toISOString(),
    started_at: iso(job.startedAt),
    completed_at: iso(job.completedAt),
    error: errorOf(job) ?? null,
  };
}

export function toJobResultsView(job: Job): JobResultsView {
  const results = resultOf(job) ?? {};
  return {
    job_id: job.id,
    status: job.status,
    brand_brief: job.brief,
    brand_identity: results.brand_identity ?? null,
    marketing: results.marketing ?? null,
    created_at: job.createdAt.toISOString(),
    completed_at: iso(job.completedAt),
  };
}
