import { describe, expect, it } from "vitest";
import { LogLevel } from "../types/log-level.js";
import { noopLogger } from "../utils/noop-logger.js";
import { LogSink } from "./log-sink.js";
import { createSourceLogger } from "./source-logger.js";

function setup() {
  const out: string[] = [];
  const sink = new LogSink({ stdout: (text) => out.push(text), logger: noopLogger });
  return { sink, out, log: createSourceLogger(sink) };
}

describe("createSourceLogger", () => {
  it("records the calling file", async () => {
    const { sink, out, log } = setup();
    sink.setFormatTemplate("{f}");

    log.info("hello");
    await sink.shutdown();

    expect(out).toHaveLength(1);
    expect(out[0].endsWith("source-logger.test.ts\n")).toBe(true);
  });

  it("records increasing line numbers for later calls", async () => {
    const { sink, out, log } = setup();
    sink.setFormatTemplate("{l}");

    log.debug("first");
    log.debug("second");
    await sink.shutdown();

    const [first, second] = out.map((line) => Number.parseInt(line, 10));
    expect(first).toBeGreaterThan(0);
    expect(second).toBeGreaterThan(first);
  });

  it("maps each method to its level and joins values", async () => {
    const { sink, out, log } = setup();
    sink.setFormatTemplate("{L} {m}");

    log.trace("t");
    log.debug("value x = ", 123);
    log.info("i");
    log.warning("w");
    log.error("cannot open file ", "config.txt");
    log.critical("c");
    await sink.shutdown();

    expect(out).toEqual([
      "TRACE t\n",
      "DEBUG value x = 123\n",
      "INFO i\n",
      "WARNING w\n",
      "ERROR cannot open file config.txt\n",
      "CRITICAL c\n",
    ]);
  });

  it("honours the sink's minimum level", async () => {
    const { sink, out, log } = setup();
    sink.setLogLevel(LogLevel.Error);
    sink.setFormatTemplate("{m}");

    log.info("hidden");
    log.error("shown");
    await sink.shutdown();

    expect(out).toEqual(["shown\n"]);
  });
});
