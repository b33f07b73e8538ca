/**
 * @file workflowController.ts
 * @description Controller for brand workflow jobs and their progress streams
 */

import { Request, Response } from "express";
import { ErrorHandler } from "../core/errorHandler";
import { JobOrchestrator } from "../core/jobOrchestrator";
import { JobRegistry } from "../core/jobRegistry";
import { NotFoundError, ValidationError } from "../errors/workflowError";
import { JobStartParams } from "../interfaces/workflow";
import { parseBrandBrief } from "../models/brandBrief";
import { JobListView, toJobResultsView, toJobView } from "../models/job";
import { StreamingService } from "../services/streamingService";
import { Logger } from "../utils/logger";

export interface WorkflowControllerDeps {
  registry: JobRegistry;
  orchestrator: JobOrchestrator;
  streaming: StreamingService;
  defaultListLimit: number;
}

function parseLimit(raw: unknown, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = typeof raw === "string" ? Number(raw) : NaN;
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(["limit must be a positive integer"]);
  }
  return value;
}

/**
 * @class WorkflowController
 * @description Creates jobs, reports their state and streams their progress
 */
export class WorkflowController {
  constructor(private readonly deps: WorkflowControllerDeps) {}

  /**
   * @method getServiceInfo
   * @description Service name and entry points
   */
  public getServiceInfo = async (req: Request, res: Response): Promise<void> => {
    res.json({
      name: "Brand Workflow Engine",
      version: "1.0.0",
      endpoints: {
        jobs: "/api/jobs",
        events: "/api/jobs/{job_id}/events",
        websocket: "/ws/{job_id}",
        artistic_logo: "/api/generate/artistic-logo/jobs",
      },
    });
  };

  /**
   * @method healthCheck
   * @description Check service health
   */
  public healthCheck = async (req: Request, res: Response): Promise<void> => {
    res.json({ status: "healthy", timestamp: new Date().toISOString() });
  };

  /**
   * @method createJob
   * @description Register a job for the brief and start it in the background
   */
  public createJob = async (req: Request, res: Response): Promise<void> => {
    try {
      const brief = parseBrandBrief(req.body);
      const params: JobStartParams = {};
      if (typeof req.query.model === "string" && req.query.model !== "") {
        params.model = req.query.model;
      }
      const jobId = this.deps.registry.create(brief);
      const job = this.deps.registry.get(jobId);
      if (!job) {
        throw new NotFoundError("Job", jobId);
      }
      res.status(202).json(toJobView(job));

      this.deps.orchestrator.start(jobId, params).catch((error) => {
        Logger.error(
          `Error running job ${jobId}: ${
            error instanceof Error ? error.message : "Unknown error"
          }`
        );
      });
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  /**
   * @method listJobs
   * @description Most recent jobs first
   */
  public listJobs = async (req: Request, res: Response): Promise<void> => {
    try {
      const limit = parseLimit(req.query.limit, this.deps.defaultListLimit);
      const jobs = this.deps.registry.list(limit).map(toJobView);
      const body: JobListView = { jobs, total: jobs.length };
      res.json(body);
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  public getJob = async (req: Request, res: Response): Promise<void> => {
    try {
      const job = this.deps.registry.get(req.params.jobId);
      if (!job) {
        throw new NotFoundError("Job", req.params.jobId);
      }
      res.json(toJobView(job));
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  /**
   * @method getJobResults
   * @description Results envelope; 400 unless the job completed
   */
  public getJobResults = async (req: Request, res: Response): Promise<void> => {
    try {
      const { jobId } = req.params;
      this.deps.registry.getResults(jobId);
      const job = this.deps.registry.get(jobId);
      if (!job) {
        throw new NotFoundError("Job", jobId);
      }
      res.json(toJobResultsView(job));
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  /**
   * @method streamJobEvents
   * @description Server-Sent Events feed of a job's progress
   */
  public streamJobEvents = async (req: Request, res: Response): Promise<void> => {
    try {
      const { jobId } = req.params;
      if (!this.deps.registry.has(jobId)) {
        throw new NotFoundError("Job", jobId);
      }
      this.deps.streaming.subscribe(jobId, res);
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };
}
