import { loadConfig } from "./config.js";
import { configureLogger } from "./logger.js";
import { collectDefaultMetrics, registry } from "./metrics.js";
import { initMetricsServer } from "./server.js";

const config = loadConfig();
configureLogger({ level: config.logLevel });

if (config.collectDefaultMetrics) {
  collectDefaultMetrics(registry);
}

await initMetricsServer(config.port, {
  registry,
  logLevel: config.logLevel,
  host: config.host
});
