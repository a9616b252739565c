import { LogLevel } from "../types/log-level.js";
import { captureCallSite } from "../utils/call-site.js";
import type { Displayable } from "../utils/join-values.js";
import type { LogSink } from "./log-sink.js";

export type SourceLogMethod = (...values: Displayable[]) => void;

export interface SourceLogger {
  trace: SourceLogMethod;
  debug: SourceLogMethod;
  info: SourceLogMethod;
  warning: SourceLogMethod;
  error: SourceLogMethod;
  critical: SourceLogMethod;
}

/**
 * Per-level logging methods that record the caller's file and line.
 * The stack is only captured for messages that pass the sink's level filter.
 */
export function createSourceLogger(sink: LogSink): SourceLogger {
  const method =
    (level: LogLevel): SourceLogMethod =>
    (...values) => {
      if (level < sink.level) return;
      const site = captureCallSite();
      sink.logValues(level, site.file, site.line, ...values);
    };

  return {
    trace: method(LogLevel.Trace),
    debug: method(LogLevel.Debug),
    info: method(LogLevel.Info),
    warning: method(LogLevel.Warning),
    error: method(LogLevel.Error),
    critical: method(LogLevel.Critical),
  };
}
