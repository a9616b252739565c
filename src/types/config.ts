import { sinkConfigSchema } from "../config/config-schema.js";
import { DEFAULT_TEMPLATE } from "../core/formatter.js";
import type { OverflowPolicy } from "../core/message-queue.js";
import { ConfigError } from "../errors.js";
import { LogLevel } from "./log-level.js";
import { OutputTarget } from "./output-target.js";

/** Sink configuration; every field is optional. */
export interface SinkConfig {
  level?: LogLevel; // default: Trace
  target?: OutputTarget; // default: Console
  template?: string; // default: "{t} | {L} | {f}:{l} -> {m}"

  // File destination; no file is opened when filePath is omitted
  filePath?: string;
  append?: boolean; // default: true
  timestampSuffix?: boolean; // default: true

  // Queue bound; unbounded when queueCapacity is omitted
  queueCapacity?: number;
  overflow?: OverflowPolicy; // default: "drop-oldest"
}

/** Fully resolved configuration with defaults applied. */
export type ResolvedSinkConfig = Required<Omit<SinkConfig, "filePath" | "queueCapacity">> &
  Pick<SinkConfig, "filePath" | "queueCapacity">;

export const DEFAULT_SINK_CONFIG: ResolvedSinkConfig = {
  level: LogLevel.Trace,
  target: OutputTarget.Console,
  template: DEFAULT_TEMPLATE,
  filePath: undefined,
  append: true,
  timestampSuffix: true,
  queueCapacity: undefined,
  overflow: "drop-oldest",
};

export function resolveSinkConfig(config: SinkConfig = {}): ResolvedSinkConfig {
  const validation = sinkConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`);
  }

  const data = validation.data;
  return {
    level: data.level ?? DEFAULT_SINK_CONFIG.level,
    target: data.target ?? DEFAULT_SINK_CONFIG.target,
    template: data.template ?? DEFAULT_SINK_CONFIG.template,
    filePath: data.filePath,
    append: data.append ?? DEFAULT_SINK_CONFIG.append,
    timestampSuffix: data.timestampSuffix ?? DEFAULT_SINK_CONFIG.timestampSuffix,
    queueCapacity: data.queueCapacity,
    overflow: data.overflow ?? DEFAULT_SINK_CONFIG.overflow,
  };
}
