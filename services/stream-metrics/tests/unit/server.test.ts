import { afterEach, describe, expect, test, vi } from "vitest";
import client from "prom-client";
import { addCounter, mkRegCounter } from "../../src/metrics.js";
import { buildMetricsServer, initMetricsServer, startupMessage } from "../../src/server.js";
import { captureLogs } from "./capture_logs.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("metrics server", () => {
  test("serves the registry in its exposition format", async () => {
    const registry = new client.Registry();
    const jobs = mkRegCounter("jobs_total", "Jobs", registry);
    addCounter(jobs, 3);

    const app = buildMetricsServer({ registry, logLevel: false });
    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toBe(registry.contentType);
    expect(res.body).toContain("# TYPE jobs_total counter");
    expect(res.body).toContain("jobs_total 3");
  });

  test("counts the requests it answers", async () => {
    const registry = new client.Registry();
    const app = buildMetricsServer({ registry, logLevel: false });

    await app.inject({ method: "GET", url: "/metrics" });

    await vi.waitFor(async () => {
      expect(await registry.metrics()).toContain(
        'http_requests_total{method="GET",route="/metrics",status_code="200"} 1'
      );
    });
  });

  test("has no other routes", async () => {
    const app = buildMetricsServer({ registry: new client.Registry(), logLevel: false });
    const res = await app.inject({ method: "GET", url: "/" });
    expect(res.statusCode).toBe(404);
  });

  test("answers 500 when collection fails", async () => {
    const registry = new client.Registry();
    vi.spyOn(registry, "metrics").mockRejectedValue(new Error("collect failed"));

    const app = buildMetricsServer({ registry, logLevel: false });
    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(500);
    expect(res.body).toBe("metrics_error");
  });

  test("a second server on the same registry fails to register", () => {
    const registry = new client.Registry();
    buildMetricsServer({ registry, logLevel: false });
    expect(() => buildMetricsServer({ registry, logLevel: false })).toThrow(/already been registered/);
  });
});

describe("initMetricsServer", () => {
  test("startup message", () => {
    expect(startupMessage(9090)).toBe("Starting metrics server at http://localhost:9090/");
  });

  test("logs the startup line and binds", async () => {
    const lines = captureLogs();

    const app = await initMetricsServer(0, {
      registry: new client.Registry(),
      logLevel: false,
      host: "127.0.0.1"
    });

    try {
      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatchObject({
        level: 30,
        tag: "metrics",
        msg: "Starting metrics server at http://localhost:0/"
      });
      const res = await app.inject({ method: "GET", url: "/metrics" });
      expect(res.statusCode).toBe(200);
    } finally {
      await app.close();
    }
  });
});
