/**
 * Quote API entry point.
 *
 * Boot order: config, logger, catalog, Express app, listen. The time from
 * process start to the socket accepting connections is logged as the
 * start-up time.
 */
import { config } from "./config";
import { createLogger } from "./logger";
import { closeServer, startServer } from "./start";

const logger = createLogger(config);

startServer(config, logger)
  .then(({ server }) => {
    // ─── Graceful Shutdown ────────────────────────────────────
    const shutdown = (signal: string) => {
      logger.info(`${signal} — shutting down ${process.pid}`);
      closeServer(server)
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, "Error while closing server");
          process.exit(1);
        });
      setTimeout(() => process.exit(1), config.shutdownTimeoutMs).unref();
    };

    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
  })
  .catch((err: unknown) => {
    logger.fatal({ err }, "Server failed to start");
    process.exit(1);
  });
