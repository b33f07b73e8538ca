/**
 * @file progressEvent.ts
 * @description Construction and wire format of progress stream messages
 */

import { errorOf } from "../core/lifecycle";
import {
  Job,
  ProgressEvent,
  ProgressEventType,
  UnitStatus,
  WorkflowStep,
} from "../interfaces/workflow";

/**
 * @interface ProgressEventMessage
 * @description The JSON body sent to stream clients
 */
export interface ProgressEventMessage {
  type: ProgressEventType;
  job_id: string;
  step: WorkflowStep | null;
  progress: number;
  message: string;
  timestamp: string;
}

export function createProgressEvent(
  type: ProgressEventType,
  jobId: string,
  progress: number,
  message: string,
  step?: WorkflowStep
): ProgressEvent {
  return {
    type,
    jobId,
    step,
    progress,
    message,
    timestamp: new Date().toISOString(),
  };
}

export function toProgressMessage(event: ProgressEvent): ProgressEventMessage {
  return {
    type: event.type,
    job_id: event.jobId,
    step: event.step ?? null,
    progress: event.progress,
    message: event.message,
    timestamp: event.timestamp,
  };
}

export function isTerminalEvent(event: ProgressEvent): boolean {
  return (
    event.type === ProgressEventType.COMPLETED ||
    event.type === ProgressEventType.ERROR
  );
}

export function connectedEvent(job: Job): ProgressEvent {
  return createProgressEvent(
    ProgressEventType.CONNECTED,
    job.id,
    job.progress,
    "Connected to job progress stream",
    job.currentStep
  );
}

/**
 * @function finishedJobEvent
 * @description Closing message for a client that connects after the job ended
 * @returns null while the job is still pending or running
 */
export function finishedJobEvent(job: Job): ProgressEvent | null {
  if (job.status === UnitStatus.COMPLETED) {
    return createProgressEvent(
      ProgressEventType.COMPLETED,
      job.id,
      100,
      "Job already completed",
      job.currentStep
    );
  }
  if (job.status === UnitStatus.FAILED) {
    return createProgressEvent(
      ProgressEventType.ERROR,
      job.id,
      job.progress,
      `Job failed: ${errorOf(job) ?? "unknown error"}`,
      job.currentStep
    );
  }
  return null;
}

export function jobNotFoundEvent(jobId: string): ProgressEvent {
  return createProgressEvent(ProgressEventType.ERROR, jobId, 0, "Job not found");
}

export function keepaliveEvent(job: Job): ProgressEvent {
  return createProgressEvent(
    ProgressEventType.KEEPALIVE,
    job.id,
    job.progress,
    "keepalive",
    job.currentStep
  );
}
