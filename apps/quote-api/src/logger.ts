import pino, { Logger, LoggerOptions } from "pino";
import { AppConfig } from "./config";

// ─── Logger ───────────────────────────────────────────────
// JSON lines in production, pino-pretty everywhere else.
export function loggerOptions(cfg: Pick<AppConfig, "logLevel" | "nodeEnv">): LoggerOptions {
  return {
    level     : cfg.logLevel,
    transport : cfg.nodeEnv !== "production"
                  ? { target: require.resolve("pino-pretty") }
                  : undefined,
  };
}

export function createLogger(cfg: Pick<AppConfig, "logLevel" | "nodeEnv">): Logger {
  return pino(loggerOptions(cfg));
}
