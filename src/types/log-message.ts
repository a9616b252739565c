import type { LogLevel } from "./log-level.js";

/** One submitted log record. Frozen on creation; never mutated by the pipeline. */
export interface LogMessage {
  readonly level: LogLevel;
  readonly text: string;
  readonly file: string;
  readonly line: number;
  /** Epoch milliseconds, captured at submission rather than at write time. */
  readonly time: number;
}

export function createLogMessage(
  level: LogLevel,
  text: string,
  file: string,
  line: number,
  time: number = Date.now(),
): LogMessage {
  return Object.freeze({ level, text, file, line, time });
}
