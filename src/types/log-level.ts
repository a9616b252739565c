/**
 * Severity levels, ordered from most to least verbose.
 * A message passes the filter when its level is >= the sink's minimum.
 */
export enum LogLevel {
  Trace = 0,
  Debug = 1,
  Info = 2,
  Warning = 3,
  Error = 4,
  Critical = 5,
}

export const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.Trace]: "TRACE",
  [LogLevel.Debug]: "DEBUG",
  [LogLevel.Info]: "INFO",
  [LogLevel.Warning]: "WARNING",
  [LogLevel.Error]: "ERROR",
  [LogLevel.Critical]: "CRITICAL",
};

const LEVELS_BY_NAME: ReadonlyMap<string, LogLevel> = new Map([
  ["trace", LogLevel.Trace],
  ["debug", LogLevel.Debug],
  ["info", LogLevel.Info],
  ["warning", LogLevel.Warning],
  ["warn", LogLevel.Warning],
  ["error", LogLevel.Error],
  ["critical", LogLevel.Critical],
]);

export function levelName(level: LogLevel): string {
  return LEVEL_NAMES[level] ?? "UNKNOWN";
}

/** Case-insensitive lookup; returns undefined for unknown names. */
export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVELS_BY_NAME.get(name.trim().toLowerCase());
}
