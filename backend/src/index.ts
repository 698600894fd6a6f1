import { createApp } from "./app.js";
import { config } from "./config.js";
import { logger } from "./lib/logger.js";
import { createRuntime } from "./runtime.js";
import { startScheduler, stopScheduler } from "./scheduler.js";

const start = (): void => {
  const runtime = createRuntime();

  const app = createApp({ store: runtime.store, coordinator: runtime.coordinator });
  const server = app.listen(config.PORT, config.HOST, () => {
    logger.info(`API listening on http://${config.HOST}:${config.PORT}`);
    startScheduler(runtime.coordinator, config.POLL_CRON);
  });

  const shutdown = (signal: string): void => {
    logger.info("Shutting down", { signal });
    stopScheduler();
    server.close();
    runtime
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("Shutdown failed", error);
        process.exit(1);
      });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
};

try {
  start();
} catch (error) {
  logger.error("Failed to start server", error);
  process.exit(1);
}
