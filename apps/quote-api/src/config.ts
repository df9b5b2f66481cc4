// ─── Config ───────────────────────────────────────────────
// Environment variables with defaults. Bad numbers fall back
// to the default instead of failing the boot.
export interface AppConfig {
  readonly port: number;
  readonly host: string;
  readonly logLevel: string;
  readonly nodeEnv: string;
  readonly rateLimit: {
    readonly windowMs: number;
    readonly max: number; // 0 (default) turns the limiter off
  };
  readonly shutdownTimeoutMs: number;
}

type Env = Record<string, string | undefined>;

function toNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const n = Number(value);
  return Number.isFinite(n) && n >= 0 ? Math.floor(n) : fallback;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return Object.freeze({
    port:     toNumber(env.PORT, 3000),
    host:     env.HOST      || "0.0.0.0",
    logLevel: env.LOG_LEVEL || "info",
    nodeEnv:  env.NODE_ENV  || "development",
    rateLimit: Object.freeze({
      windowMs: toNumber(env.RATE_LIMIT_WINDOW_MS, 60_000),
      max:      toNumber(env.RATE_LIMIT_MAX, 0),
    }),
    shutdownTimeoutMs: toNumber(env.SHUTDOWN_TIMEOUT_MS, 10_000),
  });
}

export const config = loadConfig();
