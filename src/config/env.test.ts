import { describe, expect, it } from "vitest";
import { ConfigError } from "../errors.js";
import { LogLevel } from "../types/log-level.js";
import { OutputTarget } from "../types/output-target.js";
import { loadSinkConfigFromEnv } from "./env.js";

describe("loadSinkConfigFromEnv", () => {
  it("returns an empty config when nothing is set", () => {
    expect(loadSinkConfigFromEnv({})).toEqual({});
  });

  it("reads every variable", () => {
    const config = loadSinkConfigFromEnv({
      DRAINLOG_LEVEL: "warning",
      DRAINLOG_TARGET: "both",
      DRAINLOG_TEMPLATE: "{t} - {m}",
      DRAINLOG_FILE: "logs/app.log",
      DRAINLOG_APPEND: "false",
      DRAINLOG_TIMESTAMP_SUFFIX: "0",
      DRAINLOG_QUEUE_CAPACITY: "256",
      DRAINLOG_OVERFLOW: "drop-newest",
    });
    expect(config).toEqual({
      level: LogLevel.Warning,
      target: OutputTarget.Both,
      template: "{t} - {m}",
      filePath: "logs/app.log",
      append: false,
      timestampSuffix: false,
      queueCapacity: 256,
      overflow: "drop-newest",
    });
  });

  it("parses level names case-insensitively", () => {
    expect(loadSinkConfigFromEnv({ DRAINLOG_LEVEL: "CRITICAL" }).level).toBe(LogLevel.Critical);
    expect(loadSinkConfigFromEnv({ DRAINLOG_LEVEL: "Warn" }).level).toBe(LogLevel.Warning);
  });

  it("collects every invalid variable into one error", () => {
    const load = () =>
      loadSinkConfigFromEnv({
        DRAINLOG_LEVEL: "loud",
        DRAINLOG_APPEND: "yes",
        DRAINLOG_QUEUE_CAPACITY: "12abc",
      });

    expect(load).toThrow(ConfigError);
    expect(load).toThrow(
      new ConfigError(
        [
          "Invalid environment configuration:",
          '  - DRAINLOG_LEVEL: unknown level "loud"',
          '  - DRAINLOG_APPEND: must be "true" or "false", got "yes"',
          '  - DRAINLOG_QUEUE_CAPACITY: must be integer, got "12abc"',
        ].join("\n"),
      ),
    );
  });

  it("rejects an unknown overflow policy", () => {
    expect(() => loadSinkConfigFromEnv({ DRAINLOG_OVERFLOW: "block" })).toThrow(
      "DRAINLOG_OVERFLOW: must be drop-oldest or drop-newest",
    );
  });
});
