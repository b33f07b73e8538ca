/**
 * @file generationExecutor.ts
 * @description Background generation tasks: submission, polling and cooperative cancellation
 */

import { v4 as uuidv4 } from "uuid";
import {
  CancellationRaceError,
  InvalidStateError,
} from "../errors/workflowError";
import {
  GenerationEngine,
  GenerationRequest,
  PersistedTaskRecord,
  TaskOutcome,
  TaskView,
  TrackedUnit,
  UnitStatus,
} from "../interfaces/workflow";
import { Logger } from "../utils/logger";
import { CancellationToken, CANCELLED_BY_USER } from "./cancellationToken";
import { ErrorHandler } from "./errorHandler";
import {
  errorOf,
  evictTerminal,
  fail,
  isTerminal,
  resultOf,
  succeed,
  transition,
} from "./lifecycle";
import { PersistenceAdapter } from "./persistenceAdapter";
import { QueueStatus, ScheduledWork, WorkerPool } from "./workerPool";

/**
 * @interface GenerationTask
 * @description In-memory state of one generation task
 */
interface GenerationTask extends TrackedUnit<unknown> {
  request: GenerationRequest;
  token: CancellationToken;
  handle?: ScheduledWork<void>;
  /** Set by delete(); a deleted task is never written back */
  deleted: boolean;
  /** The last write to storage failed; memory wins until a write succeeds */
  unsynced: boolean;
}

export const DEFAULT_MAX_TASKS = 500;

function toView(task: GenerationTask): TaskView {
  const view: TaskView = { task_id: task.id, status: task.status };
  const result = resultOf(task);
  const error = errorOf(task);
  if (task.status === UnitStatus.COMPLETED) view.result = result ?? null;
  if (error !== undefined) view.error = error;
  return view;
}

function recordToView(record: PersistedTaskRecord): TaskView {
  const view: TaskView = { task_id: record.task_id, status: record.status };
  if (record.status === UnitStatus.COMPLETED) view.result = record.result;
  if (record.error !== null) view.error = record.error;
  return view;
}

function toRecord(task: GenerationTask): PersistedTaskRecord {
  return {
    task_id: task.id,
    status: task.status,
    req: task.request,
    result: resultOf(task) ?? null,
    error: errorOf(task) ?? null,
  };
}

/**
 * @class GenerationExecutor
 * @description Reads prefer the durable record and fall back to memory.
 * Persistence errors are logged; memory stays authoritative for this process.
 */
export class GenerationExecutor {
  private tasks: Map<string, GenerationTask> = new Map();

  constructor(
    private readonly engine: GenerationEngine,
    private readonly persistence: PersistenceAdapter,
    private readonly pool: WorkerPool,
    private readonly maxTasks: number = DEFAULT_MAX_TASKS
  ) {}

  /**
   * @method submit
   * @description Store and persist a pending task, then queue it on the worker pool
   * @throws {InvalidStateError} When the id is already in use
   */
  public async submit(
    request: GenerationRequest,
    taskId: string = uuidv4()
  ): Promise<TaskView> {
    if (this.tasks.has(taskId)) {
      throw new InvalidStateError(`Task ${taskId} already exists`);
    }
    const task: GenerationTask = {
      id: taskId,
      status: UnitStatus.PENDING,
      progress: 0,
      createdAt: new Date(),
      request,
      token: new CancellationToken(taskId),
      deleted: false,
      unsynced: false,
    };
    const accepted: TaskView = { task_id: taskId, status: UnitStatus.PENDING };
    this.tasks.set(taskId, task);
    Logger.info(`Submitted generation task ${taskId}`);
    await this.persist(task);

    if (task.token.isCancelled || task.deleted) {
      Logger.info(`Task ${taskId} was cancelled before it was queued`);
      this.retain();
      return accepted;
    }

    const handle = this.pool.schedule(taskId, () => this.run(taskId));
    task.handle = handle;
    handle.result.catch((error) => {
      Logger.debug(`Task ${taskId} left the queue: ${ErrorHandler.describe(error)}`);
    });
    this.retain();
    return accepted;
  }

  /**
   * @method run
   * @description Worker body. Engine failures become the task error and never propagate.
   */
  public async run(taskId: string): Promise<void> {
    const task = this.tasks.get(taskId);
    if (!task) {
      Logger.warn(`Task ${taskId} is no longer tracked, skipping`);
      return;
    }
    if (task.token.isCancelled || task.status !== UnitStatus.PENDING) {
      Logger.info(`Task ${taskId} was cancelled before it started`);
      return;
    }

    transition(task, UnitStatus.RUNNING);
    await this.persist(task);

    let outcome: TaskOutcome<unknown>;
    try {
      const value = await this.engine.generate(task.request, {
        taskId,
        token: task.token,
      });
      outcome = { kind: "success", value };
    } catch (error) {
      const failure = ErrorHandler.toExecutionFailure(taskId, error);
      outcome = { kind: "failure", error: failure.reason };
    }

    if (task.token.isCancelled) {
      Logger.info(`Discarding the output of cancelled task ${taskId}`);
      if (!isTerminal(task.status)) {
        fail(task, task.token.reason ?? CANCELLED_BY_USER);
      }
    } else if (outcome.kind === "success") {
      succeed(task, outcome.value);
      Logger.success(`Task ${taskId} completed`);
    } else {
      fail(task, outcome.error);
      Logger.error(`Task ${taskId} failed: ${outcome.error}`);
    }

    await this.persist(task);
    this.retain();
  }

  /**
   * @method get
   * @description Polling view of a task, or null when neither store knows it.
   * A task whose last write failed is written again and served from memory.
   */
  public async get(taskId: string): Promise<TaskView | null> {
    const task = this.tasks.get(taskId);
    if (task?.unsynced) {
      await this.persist(task);
      return toView(task);
    }
    const record = await this.readRecord(taskId);
    if (record) {
      return recordToView(record);
    }
    return task ? toView(task) : null;
  }

  /**
   * @method list
   * @description Every known task; durable records win over memory for the same id
   * unless the task's last write failed
   */
  public async list(): Promise<TaskView[]> {
    const unsynced = Array.from(this.tasks.values()).filter((task) => task.unsynced);
    await Promise.all(unsynced.map((task) => this.persist(task)));

    const views: Map<string, TaskView> = new Map();
    this.tasks.forEach((task) => views.set(task.id, toView(task)));
    try {
      const records = await this.persistence.list();
      records.forEach((record) => {
        if (this.tasks.get(record.task_id)?.unsynced) return;
        views.set(record.task_id, recordToView(record));
      });
    } catch (error) {
      Logger.error(
        `Error listing persisted tasks: ${ErrorHandler.describe(error)}`
      );
    }
    return Array.from(views.values());
  }

  /**
   * @method cancel
   * @description Flag a task as cancelled. Queued work is dropped, running work is
   * marked failed at once and stops at its next checkpoint.
   * @returns False for an unknown or already finished task
   */
  public async cancel(
    taskId: string,
    reason: string = CANCELLED_BY_USER
  ): Promise<boolean> {
    const task = this.tasks.get(taskId);
    if (task) {
      if (isTerminal(task.status)) {
        Logger.warn(new CancellationRaceError(taskId, task.status).message);
        return false;
      }
      task.token.cancel(reason);
      const dequeued = task.handle?.cancel() ?? false;
      fail(task, reason);
      Logger.info(
        dequeued || !task.startedAt
          ? `Task ${taskId} cancelled before it started`
          : `Task ${taskId} flagged for cancellation while running`
      );
      await this.persist(task);
      return true;
    }

    const record = await this.readRecord(taskId);
    if (!record) {
      return false;
    }
    if (isTerminal(record.status)) {
      Logger.warn(new CancellationRaceError(taskId, record.status).message);
      return false;
    }
    await this.write(taskId, {
      ...record,
      status: UnitStatus.FAILED,
      result: null,
      error: reason,
    });
    Logger.info(`Persisted task ${taskId} marked as cancelled`);
    return true;
  }

  /**
   * @method delete
   * @description Cancel any active work and forget the task in memory and in storage
   */
  public async delete(taskId: string): Promise<boolean> {
    const task = this.tasks.get(taskId);
    if (task) {
      task.deleted = true;
      if (!isTerminal(task.status)) {
        task.token.cancel();
        task.handle?.cancel();
        fail(task, task.token.reason ?? CANCELLED_BY_USER);
      }
      this.tasks.delete(taskId);
    }
    let removed = false;
    try {
      removed = await this.persistence.delete(taskId);
    } catch (error) {
      Logger.error(
        `Error deleting persisted task ${taskId}: ${ErrorHandler.describe(error)}`
      );
    }
    if (task || removed) {
      Logger.info(`Deleted task ${taskId}`);
    }
    return Boolean(task) || removed;
  }

  public getQueueStatus(): QueueStatus {
    return this.pool.getQueueStatus();
  }

  /**
   * @method whenIdle
   * @description Resolves once every queued and running task has settled
   */
  public whenIdle(): Promise<void> {
    return this.pool.whenIdle();
  }

  public get trackedCount(): number {
    return this.tasks.size;
  }

  private retain(): void {
    const dropped = evictTerminal(this.tasks, this.maxTasks, (task) => !task.unsynced);
    if (dropped.length > 0) {
      Logger.debug(`Dropped ${dropped.length} finished task(s) from memory`);
    }
  }

  private async readRecord(taskId: string): Promise<PersistedTaskRecord | null> {
    try {
      return await this.persistence.get(taskId);
    } catch (error) {
      Logger.error(
        `Error reading persisted task ${taskId}: ${ErrorHandler.describe(error)}`
      );
      return null;
    }
  }

  private async persist(task: GenerationTask): Promise<void> {
    if (task.deleted) return;
    const saved = await this.write(task.id, toRecord(task));
    if (!task.deleted) {
      task.unsynced = !saved;
    }
  }

  /**
   * @returns Whether the record reached storage
   */
  private async write(taskId: string, record: PersistedTaskRecord): Promise<boolean> {
    try {
      await this.persistence.save(taskId, record);
      return true;
    } catch (error) {
      Logger.error(
        `Error persisting task ${taskId}: ${ErrorHandler.describe(error)}`
      );
      return false;
    }
  }
}
