import Fastify from "fastify";
import type { FastifyError, FastifyInstance, FastifyRequest } from "fastify";
import client from "prom-client";
import type { Registry } from "prom-client";
import type { LogLevel } from "./config.js";
import { getLogger } from "./logger.js";
import { incCounter, mkCounter, mkRegVector, registry as defaultRegistry, withLabel } from "./metrics.js";

export const METRICS_PATH = "/metrics";

export interface MetricsServerOptions {
  registry?: Registry;
  /** `false` silences Fastify's request logging. */
  logLevel?: LogLevel | false;
  host?: string;
}

export function startupMessage(port: number): string {
  return `Starting metrics server at http://localhost:${port}/`;
}

export function buildMetricsServer(options: MetricsServerOptions = {}): FastifyInstance {
  const registry = options.registry ?? defaultRegistry;
  const logLevel = options.logLevel ?? "info";

  const httpRequestsTotal = mkRegVector(
    ["method", "route", "status_code"] as const,
    mkCounter("http_requests_total", "Total number of HTTP requests"),
    registry
  );

  const httpRequestDurationSeconds = new client.Histogram({
    name: "http_request_duration_seconds",
    help: "HTTP request duration in seconds",
    labelNames: ["method", "route", "status_code"] as const,
    buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
    registers: [registry]
  });

  const startedAt = new WeakMap<FastifyRequest, bigint>();

  const app = Fastify({
    logger: logLevel === false ? false : { level: logLevel }
  });

  app.addHook("onRequest", async (req) => {
    startedAt.set(req, process.hrtime.bigint());
  });

  app.addHook("onResponse", async (req, reply) => {
    const start = startedAt.get(req);
    if (start === undefined) return;

    const durationSeconds = Number(process.hrtime.bigint() - start) / 1e9;
    const labels = {
      method: req.method,
      route: req.routeOptions.url ?? "unknown",
      status_code: String(reply.statusCode)
    };

    withLabel(httpRequestsTotal, labels, incCounter);
    httpRequestDurationSeconds.observe(labels, durationSeconds);
  });

  app.get(METRICS_PATH, async (_req, reply) => {
    try {
      const metrics = await registry.metrics();
      return reply.header("Content-Type", registry.contentType).code(200).send(metrics);
    } catch (err) {
      app.log.error({ err }, "metrics failed");
      return reply.code(500).send("metrics_error");
    }
  });

  app.setErrorHandler((err: FastifyError, _req, reply) => {
    app.log.error({ err }, "request failed");
    return reply.code(err.statusCode ?? 500).send({ error: "internal_error" });
  });

  return app;
}

/**
 * Serves the registry until the process exits. Resolves once the port is bound.
 */
export async function initMetricsServer(
  port: number,
  options: MetricsServerOptions = {}
): Promise<FastifyInstance> {
  getLogger().child({ tag: "metrics" }).info(startupMessage(port));
  const app = buildMetricsServer(options);
  await app.listen({ port, host: options.host ?? "0.0.0.0" });
  return app;
}
