import { describe, expect, test } from "vitest";
import { getLogger } from "../../src/logger.js";
import { captureLogs } from "./capture_logs.js";

describe("logger", () => {
  test("child bindings and fields land on the JSON line", () => {
    const lines = captureLogs();

    getLogger().child({ tag: "ingest" }).info("hello", { rate: 2 });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 30, tag: "ingest", rate: 2, msg: "hello" });
  });

  test("respects the configured level", () => {
    const lines = captureLogs("warn");

    getLogger().info("dropped");
    getLogger().warn("kept");

    expect(lines.map((l) => l.msg)).toEqual(["kept"]);
  });
});
