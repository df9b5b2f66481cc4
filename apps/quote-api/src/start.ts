import type { Server } from "http";
import type { Logger } from "pino";
import { createApp } from "./app";
import { QuoteCatalog, loadDefaultCatalog } from "./catalog";
import { AppConfig } from "./config";

export interface RunningServer {
  server: Server;
  port: number;
  /** Milliseconds from process start until the socket was listening. */
  startupMs: number;
}

export function startServer(
  config: AppConfig,
  logger: Logger,
  catalog: QuoteCatalog = loadDefaultCatalog(),
): Promise<RunningServer> {
  const app = createApp({ catalog, logger, config });

  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, config.host, () => {
      server.off("error", reject);

      const address = server.address();
      const port = address !== null && typeof address !== "string" ? address.port : config.port;
      const startupMs = Math.round(process.uptime() * 1000);

      logger.info({ quotes: catalog.size, port, pid: process.pid }, `Application started in ${startupMs}ms`);
      resolve({ server, port, startupMs });
    });
    server.once("error", reject);
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
