/**
 * @file progressStream.ts
 * @description One client's view of a job's progress, shared by the SSE and WebSocket endpoints
 */

import { JobRegistry } from "../core/jobRegistry";
import { ProgressBroadcaster, Subscription } from "../core/progressBroadcaster";
import { ProgressEvent } from "../interfaces/workflow";
import {
  connectedEvent,
  finishedJobEvent,
  isTerminalEvent,
  jobNotFoundEvent,
  keepaliveEvent,
} from "../models/progressEvent";
import { Logger } from "../utils/logger";

/**
 * @interface ProgressTransport
 * @description How a session reaches its client
 */
export interface ProgressTransport {
  send(event: ProgressEvent): void;
  close(): void;
}

export interface ProgressStreamOptions {
  registry: JobRegistry;
  broadcaster: ProgressBroadcaster;
  keepaliveIntervalMs: number;
}

/**
 * @class ProgressStreamSession
 * @description Sends connected first, then live events until a terminal one.
 * A keepalive goes out after every keepaliveIntervalMs of silence.
 */
export class ProgressStreamSession {
  private subscription: Subscription | null = null;
  private keepaliveTimer: NodeJS.Timeout | null = null;
  private closed = false;

  constructor(
    private readonly jobId: string,
    private readonly transport: ProgressTransport,
    private readonly options: ProgressStreamOptions
  ) {}

  public get isClosed(): boolean {
    return this.closed;
  }

  /**
   * @method open
   * @description Greets the client and either finishes at once or follows the job
   */
  public open(): void {
    const job = this.options.registry.get(this.jobId);
    if (!job) {
      this.send(jobNotFoundEvent(this.jobId));
      this.close();
      return;
    }

    this.send(connectedEvent(job));
    const finished = finishedJobEvent(job);
    if (finished) {
      this.send(finished);
      this.close();
      return;
    }
    if (this.closed) return;

    this.subscription = this.options.broadcaster.subscribe(this.jobId, (event) =>
      this.forward(event)
    );
    this.scheduleKeepalive();
    Logger.info(`Progress stream opened for job ${this.jobId}`);
  }

  /**
   * @method touch
   * @description Client activity restarts the silence timer
   */
  public touch(): void {
    if (this.closed) return;
    this.scheduleKeepalive();
  }

  public close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.keepaliveTimer) {
      clearTimeout(this.keepaliveTimer);
      this.keepaliveTimer = null;
    }
    this.subscription?.unsubscribe();
    this.subscription = null;
    this.transport.close();
    Logger.debug(`Progress stream closed for job ${this.jobId}`);
  }

  private forward(event: ProgressEvent): void {
    if (this.closed) return;
    this.send(event);
    this.scheduleKeepalive();
    if (isTerminalEvent(event)) {
      this.close();
    }
  }

  private scheduleKeepalive(): void {
    if (this.keepaliveTimer) {
      clearTimeout(this.keepaliveTimer);
    }
    this.keepaliveTimer = setTimeout(() => {
      const job = this.options.registry.get(this.jobId);
      if (!job) {
        this.close();
        return;
      }
      this.send(keepaliveEvent(job));
      if (!this.closed) {
        this.scheduleKeepalive();
      }
    }, this.options.keepaliveIntervalMs);
  }

  private send(event: ProgressEvent): void {
    if (this.closed) return;
    try {
      this.transport.send(event);
    } catch (error) {
      Logger.warn(
        `Progress stream for job ${this.jobId} failed to send: ${
          error instanceof Error ? error.message : "Unknown error"
        }`
      );
      this.close();
    }
  }
}
