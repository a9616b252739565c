import { resolveSinkConfig, type SinkConfig } from "../types/config.js";
import { LogSink, type LogSinkOptions } from "./log-sink.js";

export type CreateLogSinkRuntime = Pick<LogSinkOptions, "logger" | "stdout" | "stream" | "now">;

/** Validate `config`, build a sink and apply it. Opens the file when `filePath` is set. */
export function createLogSink(config: SinkConfig = {}, runtime: CreateLogSinkRuntime = {}): LogSink {
  const resolved = resolveSinkConfig(config);
  const sink = new LogSink({
    ...runtime,
    queueCapacity: resolved.queueCapacity,
    overflow: resolved.overflow,
  });

  sink.setOutputTarget(resolved.target);
  sink.setFormatTemplate(resolved.template);
  if (resolved.filePath) {
    sink.init(resolved.level, resolved.filePath, resolved.append, resolved.timestampSuffix);
  } else {
    sink.setLogLevel(resolved.level);
  }
  return sink;
}
