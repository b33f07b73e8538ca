/**
 * @file errorHandler.ts
 * @description Maps core errors onto HTTP responses and readable messages
 */

import { Response } from "express";
import { ExecutionFailureError, WorkflowError } from "../errors/workflowError";
import { GenerationError } from "../errors/generationError";
import { Logger } from "../utils/logger";

/**
 * @class ErrorHandler
 * @description Error helpers shared by the controllers and the workers
 */
export class ErrorHandler {
  /**
   * @static
   * @method describe
   * @description Extracts a message from anything that was thrown
   */
  public static describe(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    if (typeof error === "string") {
      return error;
    }
    return "Unknown error";
  }

  /**
   * @static
   * @method toExecutionFailure
   * @description Wraps whatever a worker raised for the unit it was running
   */
  public static toExecutionFailure(
    unitId: string,
    error: unknown
  ): ExecutionFailureError {
    if (error instanceof ExecutionFailureError) {
      return error;
    }
    return new ExecutionFailureError(unitId, ErrorHandler.describe(error));
  }

  /**
   * @static
   * @method handleHttpError
   * @description Handles an error in an HTTP response
   */
  public static handleHttpError(error: unknown, res: Response): void {
    if (error instanceof WorkflowError) {
      Logger.warn(`HTTP ${error.status}: ${error.message}`);
      res.status(error.status).json({ error: error.message, code: error.code });
      return;
    }
    if (error instanceof GenerationError) {
      Logger.error(`Engine error: ${error.message}`);
      res.status(502).json({ error: error.message, code: error.code });
      return;
    }
    Logger.error(`HTTP Error: ${ErrorHandler.describe(error)}`);
    res.status(500).json({ error: "Internal server error" });
  }
}
