/**
 * @file cancellationToken.ts
 * @description Cooperative cancellation flag threaded into a unit of work
 */

import { TaskCancellationError } from "../errors/workflowError";

export const CANCELLED_BY_USER = "cancelled by user";

type CancelListener = (reason: string) => void;

/**
 * @class CancellationToken
 * @description Set once by the coordinator, checked by the worker at its own checkpoints
 */
export class CancellationToken {
  private cancelReason: string | null = null;
  private listeners: Set<CancelListener> = new Set();

  constructor(public readonly unitId: string) {}

  public get isCancelled(): boolean {
    return this.cancelReason !== null;
  }

  public get reason(): string | null {
    return this.cancelReason;
  }

  /**
   * @method cancel
   * @description Flag the unit as cancelled. Returns false when it already was.
   */
  public cancel(reason: string = CANCELLED_BY_USER): boolean {
    if (this.cancelReason !== null) {
      return false;
    }
    this.cancelReason = reason;
    const listeners = Array.from(this.listeners);
    this.listeners.clear();
    for (const listener of listeners) {
      listener(reason);
    }
    return true;
  }

  /**
   * @method throwIfCancelled
   * @description Checkpoint for workers
   * @throws {TaskCancellationError} Once the token has been cancelled
   */
  public throwIfCancelled(): void {
    if (this.cancelReason !== null) {
      throw new TaskCancellationError(this.unitId, this.cancelReason);
    }
  }

  /**
   * @method onCancel
   * @description Run a callback when the token is cancelled (immediately if it already is)
   * @returns A function that removes the callback
   */
  public onCancel(listener: CancelListener): () => void {
    if (this.cancelReason !== null) {
      listener(this.cancelReason);
      return () => undefined;
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
