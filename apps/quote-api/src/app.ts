import express, { Express, NextFunction, Request, Response } from "express";
import compression from "compression";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import type { Logger } from "pino";
import type { ErrorResponse } from "@quote-api/types";
import { AppConfig } from "./config";
import { QuoteCatalog } from "./catalog";
import { HttpError, NotFoundError } from "./errors";
import { createRouter } from "./routes";
import { StatsProvider, createStatsProvider } from "./stats";

export interface AppDeps {
  catalog: QuoteCatalog;
  logger: Logger;
  config: Pick<AppConfig, "rateLimit">;
  stats?: StatsProvider;
}

export function createApp({ catalog, logger, config, stats = createStatsProvider() }: AppDeps): Express {
  const app = express();

  app.use(helmet()); // secure headers, also drops x-powered-by
  app.use(compression());

  if (config.rateLimit.max > 0) {
    app.use(
      rateLimit({
        windowMs: config.rateLimit.windowMs,
        limit: config.rateLimit.max,
        standardHeaders: true,
        legacyHeaders: false,
        message: { error: "Too many requests" } satisfies ErrorResponse,
      }),
    );
  }

  // Request logger middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on("finish", () => {
      logger.info({
        method: req.method,
        path: req.path,
        status: res.statusCode,
        ms: Date.now() - start,
        pid: process.pid,
      });
    });
    next();
  });

  app.use(createRouter({ catalog, stats }));

  app.use((_req: Request, _res: Response, next: NextFunction) => {
    next(new NotFoundError());
  });

  // Error handler
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof HttpError) {
      res.status(err.status).json({ error: err.message } satisfies ErrorResponse);
      return;
    }
    // Express and its middleware tag their own 4xx errors (bad URI encoding and the like)
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      res.status(status).json({ error: "Bad request" } satisfies ErrorResponse);
      return;
    }
    logger.error({ err, path: req.path }, "Unhandled error");
    res.status(500).json({ error: "Internal server error" } satisfies ErrorResponse);
  });

  return app;
}

function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  const { status } = err;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}
