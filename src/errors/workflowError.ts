/**
 * @enum {string}
 * @description Error codes raised by the job and generation-task core
 */
export enum WorkflowErrorCode {
  NOT_FOUND = "NOT_FOUND",
  INVALID_STATE = "INVALID_STATE",
  INVALID_REQUEST = "INVALID_REQUEST",
  EXECUTION_FAILURE = "EXECUTION_FAILURE",
  CANCELLATION_RACE = "CANCELLATION_RACE",
  TASK_CANCELLED = "TASK_CANCELLED",
}

/**
 * @class WorkflowError
 * @description Base error for the core; carries a code and the HTTP status the boundary should use
 * @extends Error
 */
export class WorkflowError extends Error {
  constructor(
    public readonly code: WorkflowErrorCode,
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "WorkflowError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * @class NotFoundError
 * @description Unknown job or task identifier
 */
export class NotFoundError extends WorkflowError {
  constructor(kind: "Job" | "Task", id: string) {
    super(WorkflowErrorCode.NOT_FOUND, 404, `${kind} ${id} not found`);
    this.name = "NotFoundError";
  }
}

/**
 * @class InvalidStateError
 * @description Operation not allowed for the current status
 */
export class InvalidStateError extends WorkflowError {
  constructor(message: string) {
    super(WorkflowErrorCode.INVALID_STATE, 400, message);
    this.name = "InvalidStateError";
  }
}

/**
 * @class ValidationError
 * @description Malformed request payload
 */
export class ValidationError extends WorkflowError {
  constructor(public readonly issues: string[]) {
    super(WorkflowErrorCode.INVALID_REQUEST, 400, issues.join("; "));
    this.name = "ValidationError";
  }
}

/**
 * @class ExecutionFailureError
 * @description An external step or generation call raised. Recorded on the unit, never rethrown to the submitter.
 */
export class ExecutionFailureError extends WorkflowError {
  constructor(
    public readonly unitId: string,
    public readonly reason: string
  ) {
    super(
      WorkflowErrorCode.EXECUTION_FAILURE,
      500,
      `Execution of ${unitId} failed: ${reason}`
    );
    this.name = "ExecutionFailureError";
  }
}

/**
 * @class CancellationRaceError
 * @description Cancel arrived after the unit of work already finished
 */
export class CancellationRaceError extends WorkflowError {
  constructor(taskId: string, status: string) {
    super(
      WorkflowErrorCode.CANCELLATION_RACE,
      409,
      `Task ${taskId} is already ${status} and can no longer be cancelled`
    );
    this.name = "CancellationRaceError";
  }
}

/**
 * @class TaskCancellationError
 * @description Raised at a cooperative checkpoint once a task has been cancelled
 */
export class TaskCancellationError extends WorkflowError {
  constructor(taskId: string, public readonly reason: string) {
    super(
      WorkflowErrorCode.TASK_CANCELLED,
      400,
      `Task ${taskId} was cancelled: ${reason}`
    );
    this.name = "TaskCancellationError";
  }
}
