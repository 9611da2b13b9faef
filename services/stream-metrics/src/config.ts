import { InvalidConfigError } from "./errors.js";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(s: string): s is LogLevel {
  return LOG_LEVELS.some((level) => level === s);
}

export interface Config {
  port: number;
  host: string;
  logLevel: LogLevel;
  collectDefaultMetrics: boolean;
}

function mustBePort(s: string): number {
  const port = Number(s);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new InvalidConfigError(`Invalid METRICS_PORT: ${s}`);
  }
  return port;
}

function mustBeBool(name: string, s: string): boolean {
  if (s === "true") return true;
  if (s === "false") return false;
  throw new InvalidConfigError(`Invalid ${name}: ${s} (expected true or false)`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const port = mustBePort(env.METRICS_PORT ?? "9090");

  const host = env.METRICS_HOST ?? "0.0.0.0";

  const logLevel = env.LOG_LEVEL ?? "info";
  if (!isLogLevel(logLevel)) throw new InvalidConfigError(`Invalid LOG_LEVEL: ${logLevel}`);

  const collectDefaultMetrics = mustBeBool(
    "COLLECT_DEFAULT_METRICS",
    env.COLLECT_DEFAULT_METRICS ?? "true"
  );

  return {
    port,
    host,
    logLevel,
    collectDefaultMetrics
  };
}
