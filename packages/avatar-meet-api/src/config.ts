export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: LogLevel;
  databaseUrl?: string;
  databaseName?: string;
  databaseTimeoutMs: number;
  corsOrigins: string[];
}

type Env = Record<string, string | undefined>;

function numberEnv(env: Env, name: string, fallback: number): number {
  const value = env[name];
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: ${value}`);
  }
  return parsed;
}

function logLevelEnv(env: Env, name: string, fallback: LogLevel): LogLevel {
  const value = env[name];
  if (!value) {
    return fallback;
  }
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (!level) {
    throw new Error(`Invalid log level env var ${name}: ${value}`);
  }
  return level;
}

function listEnv(env: Env, name: string, fallback: string[]): string[] {
  const value = env[name];
  if (!value) {
    return fallback;
  }
  const items = value.split(",").map((item) => item.trim()).filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: numberEnv(env, "PORT", 8000),
    host: env.HOST ?? "0.0.0.0",
    nodeEnv: env.NODE_ENV ?? "development",
    logLevel: logLevelEnv(env, "LOG_LEVEL", "info"),
    databaseUrl: env.DATABASE_URL || undefined,
    databaseName: env.DATABASE_NAME || undefined,
    databaseTimeoutMs: numberEnv(env, "DATABASE_TIMEOUT_MS", 5000),
    corsOrigins: listEnv(env, "CORS_ORIGINS", ["*"]),
  };
}
