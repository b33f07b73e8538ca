/**
 * @file jobOrchestrator.ts
 * @description Drives jobs through their ordered workflow steps and reports progress
 */

import {
  Job,
  JobStartParams,
  ProgressEventType,
  StepContext,
  UnitStatus,
  WorkflowEngine,
  WorkflowResults,
  WorkflowStep,
} from "../interfaces/workflow";
import { createProgressEvent } from "../models/progressEvent";
import { Logger } from "../utils/logger";
import { isRecord } from "../utils/utils";
import { ErrorHandler } from "./errorHandler";
import { JobRegistry } from "./jobRegistry";
import { advanceProgress, fail, succeed } from "./lifecycle";
import { ProgressBroadcaster } from "./progressBroadcaster";
import { WorkerPool } from "./workerPool";

/**
 * @interface WorkflowStepDefinition
 * @description One step of a workflow: its progress waypoints and the work it runs
 */
export interface WorkflowStepDefinition {
  step: WorkflowStep;
  /** Key of the step output in the job results */
  resultKey: string;
  entryProgress: number;
  exitProgress: number;
  entryMessage: string;
  completeMessage: string;
  run(context: StepContext): Promise<unknown>;
}

export const INITIAL_PROGRESS = 0;
export const FINALIZING_PROGRESS = 95;

/**
 * @function createBrandWorkflowSteps
 * @description Brand identity first, then a marketing campaign built on its style guide
 */
export function createBrandWorkflowSteps(
  engine: WorkflowEngine
): WorkflowStepDefinition[] {
  return [
    {
      step: WorkflowStep.BRAND_IDENTITY,
      resultKey: "brand_identity",
      entryProgress: 10,
      exitProgress: 50,
      entryMessage: "Starting brand identity creation...",
      completeMessage: "Brand identity creation completed!",
      run: ({ job, params }) => engine.runBrandIdentity(job.brief, params),
    },
    {
      step: WorkflowStep.MARKETING,
      resultKey: "marketing",
      entryProgress: 55,
      exitProgress: 90,
      entryMessage: "Starting marketing campaign development...",
      completeMessage: "Marketing campaign development completed!",
      run: ({ job, params, results }) => {
        const identity = results.brand_identity;
        const styleGuide =
          isRecord(identity) && isRecord(identity.style_guide)
            ? identity.style_guide
            : {};
        return engine.runMarketing(job.brief, styleGuide, params);
      },
    },
  ];
}

/**
 * @class JobOrchestrator
 * @description Step bodies run on the workflow pool; failures end the job instead of propagating
 */
export class JobOrchestrator {
  constructor(
    private readonly registry: JobRegistry,
    private readonly broadcaster: ProgressBroadcaster,
    private readonly pool: WorkerPool,
    private readonly steps: WorkflowStepDefinition[]
  ) {}

  /**
   * @method start
   * @description Runs the job if it is still pending; resolves when the run ends
   * @throws {NotFoundError} For an unknown id
   */
  public start(jobId: string, params: JobStartParams = {}): Promise<void> {
    return this.registry.start(jobId, (job) => this.execute(job, params));
  }

  private emit(
    job: Job,
    type: ProgressEventType,
    step: WorkflowStep,
    progress: number,
    message: string
  ): void {
    job.currentStep = step;
    advanceProgress(job, progress);
    this.broadcaster.publish(
      job.id,
      createProgressEvent(type, job.id, job.progress, message, step)
    );
  }

  private async execute(job: Job, params: JobStartParams): Promise<void> {
    const results: WorkflowResults = {};
    try {
      this.emit(
        job,
        ProgressEventType.PROGRESS,
        WorkflowStep.INITIALIZING,
        INITIAL_PROGRESS,
        "Initializing workflow..."
      );

      for (const definition of this.steps) {
        this.emit(
          job,
          ProgressEventType.PROGRESS,
          definition.step,
          definition.entryProgress,
          definition.entryMessage
        );
        const scheduled = this.pool.schedule(`${job.id}:${definition.step}`, () =>
          definition.run({ job, params, results })
        );
        results[definition.resultKey] = await scheduled.result;
        this.emit(
          job,
          ProgressEventType.STEP_COMPLETE,
          definition.step,
          definition.exitProgress,
          definition.completeMessage
        );
      }

      this.emit(
        job,
        ProgressEventType.PROGRESS,
        WorkflowStep.FINALIZING,
        FINALIZING_PROGRESS,
        "Finalizing results..."
      );
      succeed(job, results);
      this.emit(
        job,
        ProgressEventType.COMPLETED,
        WorkflowStep.FINALIZING,
        100,
        "Workflow completed successfully!"
      );
      Logger.success(`Job ${job.id} completed`);
    } catch (error) {
      const failure = ErrorHandler.toExecutionFailure(job.id, error);
      const message = failure.reason;
      Logger.error(failure.message);
      if (job.status === UnitStatus.RUNNING) {
        fail(job, message);
      }
      this.broadcaster.publish(
        job.id,
        createProgressEvent(
          ProgressEventType.ERROR,
          job.id,
          job.progress,
          `Workflow failed: ${message}`,
          job.currentStep
        )
      );
    }
  }
}
