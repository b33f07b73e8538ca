/**
 * @file progressBroadcaster.ts
 * @description Per-job fan-out of progress events to live observers
 */

import { ProgressEvent } from "../interfaces/workflow";
import { Logger } from "../utils/logger";

export type ProgressObserver = (event: ProgressEvent) => void | Promise<void>;

/**
 * @interface JobLookup
 * @description Existence check the broadcaster needs from the job store
 */
export interface JobLookup {
  has(jobId: string): boolean;
}

/**
 * @interface Subscription
 * @description Returned by subscribe(); unsubscribe() is safe to call twice
 */
export interface Subscription {
  readonly jobId: string;
  unsubscribe(): void;
}

/**
 * Delivery chain of one observer. Events reach it one at a time, in publish order.
 */
class ObserverChannel {
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly jobId: string,
    private readonly observer: ProgressObserver
  ) {}

  public deliver(event: ProgressEvent): void {
    this.tail = this.tail
      .then(() => this.observer(event))
      .catch((error) => {
        Logger.warn(
          `Dropped ${event.type} event for an observer of job ${this.jobId}: ${
            error instanceof Error ? error.message : "Unknown error"
          }`
        );
      });
  }

  public drained(): Promise<void> {
    return this.tail;
  }
}

/**
 * @class ProgressBroadcaster
 * @description Observer failures never reach the publisher or the other observers
 */
export class ProgressBroadcaster {
  private channels: Map<string, Map<ProgressObserver, ObserverChannel>> =
    new Map();

  constructor(private readonly jobs: JobLookup) {}

  /**
   * @method subscribe
   * @returns null when the job does not exist
   */
  public subscribe(jobId: string, observer: ProgressObserver): Subscription | null {
    if (!this.jobs.has(jobId)) {
      return null;
    }
    let observers = this.channels.get(jobId);
    if (!observers) {
      observers = new Map();
      this.channels.set(jobId, observers);
    }
    if (!observers.has(observer)) {
      observers.set(observer, new ObserverChannel(jobId, observer));
    }
    Logger.debug(`Observer added for job ${jobId} (${observers.size} total)`);
    return {
      jobId,
      unsubscribe: () => this.unsubscribe(jobId, observer),
    };
  }

  public unsubscribe(jobId: string, observer: ProgressObserver): void {
    const observers = this.channels.get(jobId);
    if (!observers || !observers.delete(observer)) return;
    if (observers.size === 0) {
      this.channels.delete(jobId);
    }
    Logger.debug(`Observer removed for job ${jobId}`);
  }

  /**
   * @method publish
   * @description Queue the event on every observer registered right now
   */
  public publish(jobId: string, event: ProgressEvent): void {
    const observers = this.channels.get(jobId);
    if (!observers) return;
    const snapshot = Array.from(observers.values());
    snapshot.forEach((channel) => channel.deliver(event));
  }

  /**
   * @method flush
   * @description Resolves once every event published so far has been handed to its observers
   */
  public async flush(jobId: string): Promise<void> {
    const observers = this.channels.get(jobId);
    if (!observers) return;
    await Promise.all(
      Array.from(observers.values()).map((channel) => channel.drained())
    );
  }

  public observerCount(jobId: string): number {
    return this.channels.get(jobId)?.size ?? 0;
  }

  public clear(jobId: string): void {
    this.channels.delete(jobId);
  }
}
