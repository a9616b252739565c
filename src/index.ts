/**
 * drainlog public API barrel.
 *
 * Re-exports the sink, its building blocks, configuration helpers and the
 * diagnostic logger adapters.
 * @module
 */

// Adapters
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { createDiagnosticsLogger, StructuredLogger } from "./adapters/structured-logger.js";
// Config
export { sinkConfigSchema } from "./config/config-schema.js";
export { loadSinkConfigFromEnv } from "./config/env.js";
// Core
export type { CreateLogSinkRuntime } from "./core/create-log-sink.js";
export { createLogSink } from "./core/create-log-sink.js";
export type { PresetTemplateName } from "./core/formatter.js";
export {
  DEFAULT_TEMPLATE,
  formatFileStamp,
  formatTimestamp,
  PRESET_TEMPLATES,
  renderTemplate,
} from "./core/formatter.js";
export type { LogSinkOptions } from "./core/log-sink.js";
export { LogSink } from "./core/log-sink.js";
export type { LogWorkerOptions, WorkerHandler } from "./core/log-worker.js";
export { LogWorker } from "./core/log-worker.js";
export type { MessageQueueOptions, OverflowPolicy } from "./core/message-queue.js";
export { MessageQueue } from "./core/message-queue.js";
export type { SinkWriterOptions } from "./core/sink-writer.js";
export { SinkWriter, UTF8_BOM } from "./core/sink-writer.js";
export type { SourceLogger, SourceLogMethod } from "./core/source-logger.js";
export { createSourceLogger } from "./core/source-logger.js";
export type { WorkerState } from "./core/worker-lifecycle.js";
export { isWorkerTransitionAllowed, WORKER_STATES } from "./core/worker-lifecycle.js";
// Errors
export {
  ConfigError,
  DrainlogError,
  errorMessage,
  SinkWriteError,
  toDrainlogError,
} from "./errors.js";
// Interfaces
export type { Logger } from "./interfaces/logger.js";
// Types
export type { ResolvedSinkConfig, SinkConfig } from "./types/config.js";
export { DEFAULT_SINK_CONFIG, resolveSinkConfig } from "./types/config.js";
export { LEVEL_NAMES, LogLevel, levelName, parseLogLevel } from "./types/log-level.js";
export type { LogMessage } from "./types/log-message.js";
export { createLogMessage } from "./types/log-message.js";
export { hasTarget, OutputTarget, parseOutputTarget } from "./types/output-target.js";
// Utils
export type { CallSite } from "./utils/call-site.js";
export { captureCallSite, parseStackFrame } from "./utils/call-site.js";
export type { Displayable } from "./utils/join-values.js";
export { joinValues } from "./utils/join-values.js";
export { resolveLogFilePath } from "./utils/log-path.js";
export type { ShutdownSignal, ShutdownSignalOptions, SignalTarget } from "./utils/signal-handler.js";
export { registerShutdownSignals } from "./utils/signal-handler.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
