/**
 * @file server.ts
 * @description Express application and HTTP server lifecycle
 */

import { createServer, Server } from "http";
import express from "express";
import cors from "cors";
import { Container } from "./container";
import { GenerationController } from "./controllers/generationController";
import { WorkflowController } from "./controllers/workflowController";
import { ErrorHandler } from "./core/errorHandler";
import { ValidationError } from "./errors/workflowError";
import { createRouter } from "./routes/workflowRoutes";
import { Logger } from "./utils/logger";

/**
 * @function createApp
 * @description Builds the Express app over an already wired container
 */
export function createApp(container: Container): express.Express {
  const app = express();

  // Middleware
  app.use(cors({ origin: container.config.CORS_ORIGINS, credentials: true }));
  app.use(express.json());

  const workflowController = new WorkflowController({
    registry: container.registry,
    orchestrator: container.orchestrator,
    streaming: container.streaming,
    defaultListLimit: container.config.JOB_LIST_LIMIT,
  });
  const generationController = new GenerationController(container.executor);
  app.use(createRouter(workflowController, generationController));

  // Error handling middleware
  app.use(
    (
      err: unknown,
      req: express.Request,
      res: express.Response,
      next: express.NextFunction
    ) => {
      if (res.headersSent) {
        next(err);
        return;
      }
      if (err instanceof SyntaxError) {
        ErrorHandler.handleHttpError(
          new ValidationError(["Request body is not valid JSON"]),
          res
        );
        return;
      }
      ErrorHandler.handleHttpError(err, res);
    }
  );

  return app;
}

/**
 * @function startServer
 * @description Listens on HOST:PORT with the WebSocket endpoint attached
 */
export function startServer(container: Container): Promise<Server> {
  const { config } = container;
  const server = createServer(createApp(container));
  container.sockets.attach(server);

  return new Promise<Server>((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.PORT, config.HOST, () => {
      Logger.info(`Server running at http://${config.HOST}:${config.PORT}`);
      Logger.info(`Environment: ${config.NODE_ENV}`);
      Logger.info(`Log level: ${config.LOG_LEVEL}`);
      Logger.info(`Task persistence: ${container.persistence.kind}`);
      resolve(server);
    });
  });
}

/**
 * @function stopServer
 * @description Closes streams and sockets, stops listening, then closes the store
 */
export async function stopServer(server: Server, container: Container): Promise<void> {
  container.streaming.closeAll();
  await container.sockets.close();
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
  await container.persistence.close();
  Logger.info("Server stopped");
}
