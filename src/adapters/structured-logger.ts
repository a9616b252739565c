import type { Logger } from "../interfaces/logger.js";
import { LogLevel, levelName } from "../types/log-level.js";

export interface StructuredLoggerOptions {
  writer?: (line: string) => void;
  level?: LogLevel;
  component?: string;
}

/** JSON-lines diagnostic logger. Writes synchronously, never through a LogSink queue. */
export class StructuredLogger implements Logger {
  private writer: (line: string) => void;
  private level: LogLevel;
  private component: string | undefined;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level = options.level ?? LogLevel.Debug;
    this.component = options.component;
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.Debug, msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.Info, msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.Warning, msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.Error, msg, ctx);
  }

  private emit(level: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (level < this.level) return;

    const entry: Record<string, unknown> = {};

    if (ctx) {
      for (const [key, value] of Object.entries(ctx)) {
        if (value instanceof Error) {
          entry[key] = value.message;
          entry[`${key}Stack`] = value.stack;
        } else {
          entry[key] = value;
        }
      }
    }

    // Reserved fields are assigned last so ctx cannot spoof them.
    entry.time = new Date().toISOString();
    entry.level = levelName(level).toLowerCase();
    entry.msg = msg;
    if (this.component) entry.component = this.component;

    try {
      this.writer(JSON.stringify(entry));
    } catch {
      // Circular reference or serialization failure — emit safe fallback
      this.writer(
        JSON.stringify({ time: entry.time, level: entry.level, msg, serializationError: true }),
      );
    }
  }
}

/** Default diagnostics: warnings and worse, as JSON lines on stderr. */
export function createDiagnosticsLogger(level: LogLevel = LogLevel.Warning): Logger {
  return new StructuredLogger({ component: "drainlog", level });
}
