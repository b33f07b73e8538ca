/**
 * @file jobRegistry.ts
 * @description In-memory store of brand workflow jobs
 */

import { v4 as uuidv4 } from "uuid";
import { InvalidStateError, NotFoundError } from "../errors/workflowError";
import {
  BrandBrief,
  Job,
  UnitStatus,
  WorkflowResults,
} from "../interfaces/workflow";
import { Logger } from "../utils/logger";
import { errorOf, evictTerminal, resultOf, transition } from "./lifecycle";

/**
 * @typedef {Function} EvictionListener
 * @description Called with the id of every job dropped by the retention policy
 */
type EvictionListener = (jobId: string) => void;

export type JobRunner = (job: Job) => Promise<void>;

export const DEFAULT_MAX_JOBS = 100;
export const DEFAULT_LIST_LIMIT = 20;

/**
 * @class JobRegistry
 * @description Owns the job map; only start() moves a job out of pending
 */
export class JobRegistry {
  private jobs: Map<string, Job> = new Map();
  private evictionListeners: Set<EvictionListener> = new Set();

  constructor(private readonly maxJobs: number = DEFAULT_MAX_JOBS) {}

  /**
   * @method addEvictionListener
   * @description Add a listener for evicted jobs
   */
  public addEvictionListener(listener: EvictionListener): void {
    this.evictionListeners.add(listener);
  }

  /**
   * @method create
   * @description Insert a pending job for the brief and apply the retention policy
   * @returns The new job id
   */
  public create(brief: BrandBrief): string {
    const job: Job = {
      id: uuidv4(),
      status: UnitStatus.PENDING,
      progress: 0,
      createdAt: new Date(),
      brief,
    };
    this.jobs.set(job.id, job);
    Logger.info(`Created job ${job.id} for ${brief.brand_name}`);
    this.evict();
    return job.id;
  }

  public get(jobId: string): Job | null {
    return this.jobs.get(jobId) ?? null;
  }

  public has(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  public get size(): number {
    return this.jobs.size;
  }

  /**
   * @method list
   * @description Newest jobs first
   */
  public list(limit: number = DEFAULT_LIST_LIMIT): Job[] {
    // Reversed insertion order breaks ties between jobs created in the same millisecond
    return Array.from(this.jobs.values())
      .reverse()
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, Math.max(0, limit));
  }

  /**
   * @method start
   * @description Move a pending job to running and hand it to the runner.
   * Does nothing for a job that already started.
   * @throws {NotFoundError} For an unknown id
   */
  public async start(jobId: string, run: JobRunner): Promise<void> {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new NotFoundError("Job", jobId);
    }
    if (job.status !== UnitStatus.PENDING) {
      Logger.debug(`Job ${jobId} already ${job.status}, ignoring start`);
      return;
    }
    transition(job, UnitStatus.RUNNING);
    Logger.info(`Starting job ${jobId}`);
    try {
      await run(job);
    } finally {
      // a job that just finished may now be the oldest terminal one
      this.evict();
    }
  }

  /**
   * @method getResults
   * @description Results bag of a completed job
   * @throws {NotFoundError} For an unknown id
   * @throws {InvalidStateError} Unless the job completed
   */
  public getResults(jobId: string): WorkflowResults {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new NotFoundError("Job", jobId);
    }
    switch (job.status) {
      case UnitStatus.PENDING:
        throw new InvalidStateError("Job has not started yet");
      case UnitStatus.RUNNING:
        throw new InvalidStateError("Job is still running");
      case UnitStatus.FAILED:
        throw new InvalidStateError(`Job failed: ${errorOf(job) ?? "unknown error"}`);
      case UnitStatus.COMPLETED:
        return resultOf(job) ?? {};
    }
  }

  private evict(): void {
    const evicted = evictTerminal(this.jobs, this.maxJobs);
    for (const jobId of evicted) {
      Logger.debug(`Evicted job ${jobId}`);
      this.evictionListeners.forEach((listener) => {
        try {
          listener(jobId);
        } catch (error) {
          Logger.error(
            `Error in eviction listener for ${jobId}: ${
              error instanceof Error ? error.message : "Unknown error"
            }`
          );
        }
      });
    }
  }
}
