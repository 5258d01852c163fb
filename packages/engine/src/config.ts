import path from "path";
import { ConfigError } from "./errors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface EngineConfig {
  targetService: string;
  sourcesDir: string;
  dbPath?: string;
  logLevel?: LogLevel;
  /** Upper bound for a single artifact read; there are no retries. */
  loadTimeoutMs?: number;
  scopePoliciesToTarget?: boolean;
}

export const DEFAULT_TARGET_SERVICE = "payment-service";
export const DEFAULT_LOAD_TIMEOUT_MS = 5000;

const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): EngineConfig {
  const targetService = env.RCA_TARGET_SERVICE?.trim() || DEFAULT_TARGET_SERVICE;
  const sourcesDir = path.resolve(cwd, env.RCA_SOURCES_DIR ?? ".");
  const dbPath = env.RCA_DB_PATH ? path.resolve(cwd, env.RCA_DB_PATH) : undefined;

  return {
    targetService,
    sourcesDir,
    dbPath,
    logLevel: parseLogLevel(env.RCA_LOG_LEVEL),
    loadTimeoutMs: parseTimeout(env.RCA_LOAD_TIMEOUT_MS),
    scopePoliciesToTarget: parseBoolean(env.RCA_SCOPE_POLICIES_TO_TARGET, false)
  };
}

export function parseLogLevel(value: string | undefined): LogLevel {
  if (!value) {
    return "info";
  }
  const normalized = value.trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === normalized);
  if (!match) {
    throw new ConfigError(`Invalid log level: ${value}`);
  }
  return match;
}

function parseTimeout(value: string | undefined): number {
  if (!value) {
    return DEFAULT_LOAD_TIMEOUT_MS;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`RCA_LOAD_TIMEOUT_MS must be a positive integer, got ${value}`);
  }
  return parsed;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true") {
    return true;
  }
  if (normalized === "0" || normalized === "false") {
    return false;
  }
  throw new ConfigError(`Invalid boolean value: ${value}`);
}
