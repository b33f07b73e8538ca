/**
 * @file streamingService.ts
 * @description Service for streaming job progress over Server-Sent Events (SSE)
 */

import { Response } from "express";
import { toProgressMessage } from "../models/progressEvent";
import { Logger } from "../utils/logger";
import { ProgressStreamOptions, ProgressStreamSession } from "./progressStream";

/**
 * @class StreamingService
 * @description Manages SSE connections for job progress updates
 */
export class StreamingService {
  private sessions: Set<ProgressStreamSession> = new Set();

  constructor(private readonly options: ProgressStreamOptions) {}

  /**
   * @method subscribe
   * @description Subscribe a client to progress events for a job
   * @param {string} jobId - The job to follow
   * @param {Response} res - The Express response object for SSE
   */
  public subscribe(jobId: string, res: Response): ProgressStreamSession {
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });

    const session = new ProgressStreamSession(
      jobId,
      {
        send: (event) => {
          res.write(`event: ${event.type}\n`);
          res.write(`data: ${JSON.stringify(toProgressMessage(event))}\n\n`);
        },
        close: () => {
          if (!res.writableEnded) {
            res.end();
          }
        },
      },
      this.options
    );
    this.sessions.add(session);

    // Handle client disconnect
    res.on("close", () => {
      session.close();
      this.sessions.delete(session);
      Logger.info(`SSE client left job ${jobId}`);
    });

    session.open();
    if (session.isClosed) {
      this.sessions.delete(session);
    }
    return session;
  }

  public get connectionCount(): number {
    return this.sessions.size;
  }

  /**
   * @method closeAll
   * @description End every open stream (used on shutdown)
   */
  public closeAll(): void {
    this.sessions.forEach((session) => session.close());
    this.sessions.clear();
  }
}
