// Pino-based JSON logger with a minimal typed wrapper.
// Built on first use; main.ts configures it from the loaded config.

import pino from "pino";
import type { LogLevel } from "./config.js";

export interface LogFields {
  [key: string]: unknown;
}

export interface Logger {
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Replaces stdout; no pretty printing is applied to it. */
  destination?: pino.DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const base = options.destination
    ? pino({ level }, options.destination)
    : pino({
        level,
        transport:
          process.env.NODE_ENV === "development"
            ? {
                target: "pino-pretty",
                options: { colorize: true, translateTime: "SYS:standard" }
              }
            : undefined
      });

  const wrap = (instance: pino.Logger): Logger => ({
    info(msg, fields) {
      instance.info(fields ?? {}, msg);
    },
    warn(msg, fields) {
      instance.warn(fields ?? {}, msg);
    },
    child(bindings) {
      return wrap(instance.child(bindings));
    }
  });

  return wrap(base);
}

let root: Logger | undefined;

export function configureLogger(options: LoggerOptions): Logger {
  root = createLogger(options);
  return root;
}

export function getLogger(): Logger {
  root ??= createLogger();
  return root;
}
