export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Config {
  port: number;
  host: string;
  baseUrl: string;
  logLevel: LogLevel;
  bodyLimitBytes: number;
  rateLimitEnabled: boolean;
  rateLimitMax: number;
  rateLimitTimeWindowMs: number;
  shutdownDrainMs: number;
  appVersion: string;
  gitSha: string;
  appEnv: string;
}

type Env = Record<string, string | undefined>;

function mustBeUrl(s: string): string {
  try {
    const u = new URL(s);
    if (u.protocol !== "http:" && u.protocol !== "https:") throw new Error("bad protocol");
    return s;
  } catch {
    throw new Error(`Invalid BASE_URL: ${s}`);
  }
}

function positiveInt(name: string, raw: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) throw new Error(`Invalid ${name}: ${raw}`);
  return n;
}

function isLogLevel(s: string): s is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(s);
}

export function loadConfig(env: Env = process.env): Config {
  const port = positiveInt("PORT", env.PORT ?? "3000");
  const host = env.HOST ?? "0.0.0.0";

  const baseUrl = mustBeUrl(env.BASE_URL ?? "http://localhost:3000");

  const logLevel = env.LOG_LEVEL ?? "info";
  if (!isLogLevel(logLevel)) throw new Error(`Invalid LOG_LEVEL: ${logLevel}`);

  const bodyLimitBytes = positiveInt("BODY_LIMIT_BYTES", env.BODY_LIMIT_BYTES ?? String(1024 * 16)); // 16KB
  const rateLimitEnabled = (env.RATE_LIMIT_ENABLED ?? "false") === "true";
  const rateLimitMax = positiveInt("RATE_LIMIT_MAX", env.RATE_LIMIT_MAX ?? "60");
  const rateLimitTimeWindowMs = positiveInt("RATE_LIMIT_WINDOW_MS", env.RATE_LIMIT_WINDOW_MS ?? "60000");

  const shutdownDrainMs = positiveInt("SHUTDOWN_DRAIN_MS", env.SHUTDOWN_DRAIN_MS ?? "5000");

  return {
    port,
    host,
    baseUrl,
    logLevel,
    bodyLimitBytes,
    rateLimitEnabled,
    rateLimitMax,
    rateLimitTimeWindowMs,
    shutdownDrainMs,
    appVersion: env.APP_VERSION ?? "unknown",
    gitSha: env.GIT_SHA ?? "unknown",
    appEnv: env.APP_ENV ?? "unknown"
  };
}
