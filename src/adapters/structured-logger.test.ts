import { describe, expect, it } from "vitest";
import { LogLevel } from "../types/log-level.js";
import { StructuredLogger } from "./structured-logger.js";

describe("StructuredLogger", () => {
  it("outputs JSON lines to the writer", () => {
    const lines: string[] = [];
    const logger = new StructuredLogger({ writer: (line) => lines.push(line) });

    logger.info("file opened", { path: "/tmp/app.log" });

    const parsed = JSON.parse(lines[0]);
    expect(parsed.level).toBe("info");
    expect(parsed.msg).toBe("file opened");
    expect(parsed.path).toBe("/tmp/app.log");
    expect(parsed.time).toBeTypeOf("string");
  });

  it("names warnings with the sink's level vocabulary", () => {
    const lines: string[] = [];
    const logger = new StructuredLogger({ writer: (line) => lines.push(line) });

    logger.warn("skipped");

    expect(JSON.parse(lines[0]).level).toBe("warning");
  });

  it("respects log level filtering", () => {
    const lines: string[] = [];
    const logger = new StructuredLogger({
      writer: (line) => lines.push(line),
      level: LogLevel.Warning,
    });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("visible");
    logger.error("visible");

    expect(lines).toHaveLength(2);
  });

  it("includes component name when set", () => {
    const lines: string[] = [];
    const logger = new StructuredLogger({
      writer: (line) => lines.push(line),
      component: "sink-writer",
    });

    logger.info("test");

    expect(JSON.parse(lines[0]).component).toBe("sink-writer");
  });

  it("serializes error objects with stack", () => {
    const lines: string[] = [];
    const logger = new StructuredLogger({ writer: (line) => lines.push(line) });

    logger.error("failed", { error: new Error("boom") });

    const parsed = JSON.parse(lines[0]);
    expect(parsed.error).toBe("boom");
    expect(parsed.errorStack).toContain("Error: boom");
  });

  it("does not allow ctx to overwrite reserved fields", () => {
    const lines: string[] = [];
    const logger = new StructuredLogger({
      writer: (line) => lines.push(line),
      component: "test",
    });

    logger.info("spoofed", { level: "debug", time: "fake", msg: "injected", component: "evil" });

    const parsed = JSON.parse(lines[0]);
    expect(parsed.level).toBe("info");
    expect(parsed.msg).toBe("spoofed");
    expect(parsed.component).toBe("test");
    expect(parsed.time).not.toBe("fake");
  });

  it("survives circular references in ctx", () => {
    const lines: string[] = [];
    const logger = new StructuredLogger({ writer: (line) => lines.push(line) });

    const circular: Record<string, unknown> = { key: "value" };
    circular.self = circular;

    logger.error("circular data", circular);

    expect(lines).toHaveLength(1);
    const parsed = JSON.parse(lines[0]);
    expect(parsed.msg).toBe("circular data");
    expect(parsed.serializationError).toBe(true);
  });
});
