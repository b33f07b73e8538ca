/**
 * @file workerPool.ts
 * @description Bounded-concurrency pool; excess work waits in a FIFO queue
 */

import { TaskCancellationError } from "../errors/workflowError";
import { Logger } from "../utils/logger";
import { CANCELLED_BY_USER } from "./cancellationToken";

/**
 * @interface PoolConfig
 * @description Configuration options for the worker pool
 */
export interface PoolConfig {
  maxConcurrent: number;
}

/**
 * @interface QueueStatus
 * @description Status information about the worker pool
 */
export interface QueueStatus {
  maxConcurrent: number;
  queuedTasks: number;
  processingTasks: number;
  completedTasks: number;
  failedTasks: number;
  cancelledTasks: number;
}

/**
 * @interface ScheduledWork
 * @description Handle on a unit of work submitted to the pool
 */
export interface ScheduledWork<T> {
  readonly id: string;
  readonly started: boolean;
  readonly result: Promise<T>;
  /** Removes the work from the queue. False once it has started. */
  cancel(): boolean;
}

interface PoolEntry {
  readonly id: string;
  execute(): Promise<boolean>;
}

class Deferred<T> {
  public resolve: (value: T) => void = () => undefined;
  public reject: (reason: unknown) => void = () => undefined;
  public readonly promise: Promise<T>;

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolve = resolve;
      this.reject = reject;
    });
  }
}

class QueuedWork<T> implements ScheduledWork<T>, PoolEntry {
  public started = false;
  private readonly deferred = new Deferred<T>();

  constructor(
    public readonly id: string,
    private readonly work: () => Promise<T>,
    private readonly dequeue: (entry: PoolEntry) => boolean
  ) {}

  public get result(): Promise<T> {
    return this.deferred.promise;
  }

  public cancel(): boolean {
    if (this.started || !this.dequeue(this)) {
      return false;
    }
    this.deferred.reject(new TaskCancellationError(this.id, CANCELLED_BY_USER));
    return true;
  }

  /**
   * @method execute
   * @description Runs the work and settles the handle
   * @returns Whether the work succeeded
   */
  public async execute(): Promise<boolean> {
    this.started = true;
    try {
      this.deferred.resolve(await this.work());
      return true;
    } catch (error) {
      this.deferred.reject(error);
      return false;
    }
  }
}

/**
 * @class WorkerPool
 * @description Runs asynchronous work with a hard cap on concurrency
 */
export class WorkerPool {
  private queue: PoolEntry[] = [];
  private processing: Set<PoolEntry> = new Set();
  private completed = 0;
  private failed = 0;
  private cancelled = 0;
  private dispatchPending = false;
  private idleWaiters: (() => void)[] = [];

  constructor(
    private readonly name: string,
    private readonly config: PoolConfig = { maxConcurrent: 4 }
  ) {
    if (!Number.isInteger(config.maxConcurrent) || config.maxConcurrent < 1) {
      throw new Error(
        `Invalid pool size for ${name}: ${config.maxConcurrent}`
      );
    }
  }

  /**
   * @method schedule
   * @description Queue work; it is dispatched on a later turn of the event loop
   */
  public schedule<T>(id: string, work: () => Promise<T>): ScheduledWork<T> {
    const entry = new QueuedWork<T>(id, work, (queued) => this.remove(queued));
    this.queue.push(entry);
    Logger.debug(`[${this.name}] Queued ${id} (${this.queue.length} waiting)`);
    this.scheduleDispatch();
    return entry;
  }

  /**
   * @method getQueueStatus
   * @description Get current status of the pool
   */
  public getQueueStatus(): QueueStatus {
    return {
      maxConcurrent: this.config.maxConcurrent,
      queuedTasks: this.queue.length,
      processingTasks: this.processing.size,
      completedTasks: this.completed,
      failedTasks: this.failed,
      cancelledTasks: this.cancelled,
    };
  }

  /**
   * @method whenIdle
   * @description Resolves once nothing is queued or running
   */
  public whenIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.processing.size === 0;
  }

  private remove(entry: PoolEntry): boolean {
    const index = this.queue.indexOf(entry);
    if (index === -1) {
      return false;
    }
    this.queue.splice(index, 1);
    this.cancelled++;
    Logger.info(`[${this.name}] Removed ${entry.id} from the queue`);
    this.notifyIfIdle();
    return true;
  }

  private scheduleDispatch(): void {
    if (this.dispatchPending) return;
    this.dispatchPending = true;
    setImmediate(() => {
      this.dispatchPending = false;
      this.processNext();
    });
  }

  /**
   * @method processNext
   * @description Start queued work while capacity allows
   */
  private processNext(): void {
    while (
      this.queue.length > 0 &&
      this.processing.size < this.config.maxConcurrent
    ) {
      const entry = this.queue.shift();
      if (!entry) continue;

      this.processing.add(entry);
      entry
        .execute()
        .then((succeeded) => {
          if (succeeded) {
            this.completed++;
          } else {
            this.failed++;
          }
        })
        .finally(() => {
          this.processing.delete(entry);
          this.processNext();
          this.notifyIfIdle();
        })
        .catch((error) => {
          Logger.error(
            `[${this.name}] Error settling ${entry.id}: ${
              error instanceof Error ? error.message : "Unknown error"
            }`
          );
        });
    }
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
