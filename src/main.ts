import { buildContainer } from "./container";
import { startServer, stopServer } from "./server";
import { getEnvConfig } from "./utils/checkEnv";
import { Logger } from "./utils/logger";

/**
 * Loads configuration, wires the services and serves until SIGINT / SIGTERM.
 */
async function main(): Promise<void> {
  const config = getEnvConfig();
  Logger.setLevel(config.LOG_LEVEL);

  const container = buildContainer(config);
  const server = await startServer(container);

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    Logger.info(`${signal} received, shutting down...`);
    stopServer(server, container)
      .then(() => process.exit(0))
      .catch((error) => {
        Logger.error(
          `Error during shutdown: ${
            error instanceof Error ? error.message : "Unknown error"
          }`
        );
        process.exit(1);
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  Logger.success("Brand workflow engine is ready");
}

main().catch((error) => {
  Logger.error(
    `Initialization error: ${error instanceof Error ? error.message : "Unknown error"}`
  );
  process.exit(1);
});
