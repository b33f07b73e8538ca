/**
 * @file generationController.ts
 * @description Controller for artistic logo generation tasks
 */

import { Request, Response } from "express";
import { ErrorHandler } from "../core/errorHandler";
import { GenerationExecutor } from "../core/generationExecutor";
import { NotFoundError } from "../errors/workflowError";
import { parseArtisticLogoRequest } from "../models/artisticLogo";

export const LOGO_JOBS_PATH = "/api/generate/artistic-logo/jobs";

/**
 * @class GenerationController
 * @description Submit, poll, list, cancel and delete generation tasks
 */
export class GenerationController {
  constructor(private readonly executor: GenerationExecutor) {}

  /**
   * @method submitLogoJob
   * @description Queue a logo generation; answers 202 with the polling location
   */
  public submitLogoJob = async (req: Request, res: Response): Promise<void> => {
    try {
      const request = parseArtisticLogoRequest(req.body);
      const view = await this.executor.submit(request);
      const location = `${LOGO_JOBS_PATH}/${view.task_id}`;
      res
        .status(202)
        .location(location)
        .json({ task_id: view.task_id, status: view.status, location });
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  public listLogoJobs = async (req: Request, res: Response): Promise<void> => {
    try {
      res.json(await this.executor.list());
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  public getLogoJob = async (req: Request, res: Response): Promise<void> => {
    try {
      const { taskId } = req.params;
      const view = await this.executor.get(taskId);
      if (!view) {
        throw new NotFoundError("Task", taskId);
      }
      res.json(view);
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  /**
   * @method cancelLogoJob
   * @description Cancel a task and answer with its resulting state
   */
  public cancelLogoJob = async (req: Request, res: Response): Promise<void> => {
    try {
      const { taskId } = req.params;
      const before = await this.executor.get(taskId);
      if (!before) {
        throw new NotFoundError("Task", taskId);
      }
      await this.executor.cancel(taskId);
      res.json((await this.executor.get(taskId)) ?? before);
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  public deleteLogoJob = async (req: Request, res: Response): Promise<void> => {
    try {
      const { taskId } = req.params;
      if (!(await this.executor.delete(taskId))) {
        throw new NotFoundError("Task", taskId);
      }
      res.status(204).end();
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };
}
