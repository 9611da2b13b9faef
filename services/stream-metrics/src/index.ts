export * from "./errors.js";
export * from "./metrics.js";
export * from "./rate_logger.js";
export * from "./stream.js";
export * from "./rate_gauge.js";
export { buildMetricsServer, initMetricsServer, startupMessage, METRICS_PATH } from "./server.js";
export type { MetricsServerOptions } from "./server.js";
export { LOG_LEVELS, isLogLevel, loadConfig } from "./config.js";
export type { Config, LogLevel } from "./config.js";
export { configureLogger, createLogger, getLogger } from "./logger.js";
export type { LogFields, Logger, LoggerOptions } from "./logger.js";
