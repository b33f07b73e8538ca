/**
 * @file progressSocketService.ts
 * @description WebSocket endpoint /ws/:jobId streaming job progress
 */

import { IncomingMessage, Server } from "http";
import { Duplex } from "stream";
import { RawData, WebSocket, WebSocketServer } from "ws";
import { toProgressMessage } from "../models/progressEvent";
import { Logger } from "../utils/logger";
import { ProgressStreamOptions, ProgressStreamSession } from "./progressStream";

const SOCKET_PATH = /^\/ws\/([^/]+)\/?$/;

/**
 * @function parseJobPath
 * @description Job id addressed by an upgrade request, or null for any other path
 */
export function parseJobPath(url: string | undefined): string | null {
  if (!url) return null;
  const pathname = url.split("?")[0];
  const match = SOCKET_PATH.exec(pathname);
  if (!match) return null;
  try {
    return decodeURIComponent(match[1]);
  } catch (error) {
    Logger.warn(
      `Rejecting malformed socket path ${pathname}: ${
        error instanceof Error ? error.message : "Unknown error"
      }`
    );
    return null;
  }
}

/**
 * @class ProgressSocketService
 * @description Answers text "ping" with "pong"; any client message resets the keepalive timer
 */
export class ProgressSocketService {
  private readonly wss = new WebSocketServer({ noServer: true });
  private sessions: Map<WebSocket, ProgressStreamSession> = new Map();

  constructor(private readonly options: ProgressStreamOptions) {}

  /**
   * @method attach
   * @description Take over upgrade requests of an HTTP server
   */
  public attach(server: Server): void {
    server.on("upgrade", (request: IncomingMessage, socket: Duplex, head: Buffer) =>
      this.handleUpgrade(request, socket, head)
    );
  }

  public handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    const jobId = parseJobPath(request.url);
    if (jobId === null) {
      socket.write("HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n");
      socket.destroy();
      return;
    }
    this.wss.handleUpgrade(request, socket, head, (ws) => {
      this.handleConnection(ws, jobId);
    });
  }

  private handleConnection(ws: WebSocket, jobId: string): void {
    const session = new ProgressStreamSession(
      jobId,
      {
        send: (event) => {
          if (ws.readyState === WebSocket.OPEN) {
            ws.send(JSON.stringify(toProgressMessage(event)));
          }
        },
        close: () => ws.close(),
      },
      this.options
    );
    this.sessions.set(ws, session);

    ws.on("message", (data: RawData) => {
      session.touch();
      if (data.toString() === "ping" && ws.readyState === WebSocket.OPEN) {
        ws.send("pong");
      }
    });

    ws.on("close", () => {
      session.close();
      this.sessions.delete(ws);
    });

    ws.on("error", (error: Error) => {
      Logger.error(`WebSocket error on job ${jobId}: ${error.message}`);
      session.close();
    });

    Logger.info(`WebSocket client connected to job ${jobId}`);
    session.open();
  }

  public get connectionCount(): number {
    return this.sessions.size;
  }

  /**
   * @method close
   * @description Close every client and stop accepting upgrades
   */
  public close(): Promise<void> {
    this.sessions.forEach((session) => session.close());
    this.sessions.clear();
    return new Promise<void>((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
