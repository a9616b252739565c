/**
 * LogSink — asynchronous, multi-destination log sink.
 *
 * Callers submit messages synchronously; the level check and the queue push
 * happen on their call stack and nothing else does. A single LogWorker renders
 * each message with the template active when it is processed and hands it to
 * the SinkWriter. `shutdown()` drains everything accepted, then closes the file.
 *
 * Before `init`, the sink writes to the console with the default template at
 * the most verbose level.
 *
 * @module
 */

import { createDiagnosticsLogger } from "../adapters/structured-logger.js";
import type { Logger } from "../interfaces/logger.js";
import { LogLevel } from "../types/log-level.js";
import { createLogMessage, type LogMessage } from "../types/log-message.js";
import { OutputTarget } from "../types/output-target.js";
import { type Displayable, joinValues } from "../utils/join-values.js";
import { resolveLogFilePath } from "../utils/log-path.js";
import { DEFAULT_TEMPLATE, formatFileStamp, renderTemplate } from "./formatter.js";
import { LogWorker } from "./log-worker.js";
import { MessageQueue, type OverflowPolicy } from "./message-queue.js";
import { SinkWriter } from "./sink-writer.js";
import type { WorkerState } from "./worker-lifecycle.js";

export interface LogSinkOptions {
  /** Diagnostics channel for the sink's own problems. Defaults to JSON lines on stderr. */
  logger?: Logger;
  /** Console destination. Defaults to writing `stream`. */
  stdout?: (text: string) => void;
  /** Stream behind the default console destination. Defaults to process.stdout. */
  stream?: NodeJS.WritableStream;
  /** Clock used for message timestamps and the startup file-name stamp. */
  now?: () => number;
  /** Bound on pending messages. Unbounded when omitted. */
  queueCapacity?: number;
  overflow?: OverflowPolicy;
}

export class LogSink {
  private minLevel = LogLevel.Trace;
  private outputTarget = OutputTarget.Console;
  private formatTemplate = DEFAULT_TEMPLATE;
  private readonly startupStamp: string;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly queue: MessageQueue<LogMessage>;
  private readonly writer: SinkWriter;
  private readonly worker: LogWorker<LogMessage>;
  private shutdownPromise: Promise<void> | null = null;

  constructor(options: LogSinkOptions = {}) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createDiagnosticsLogger();
    this.startupStamp = formatFileStamp(this.now());

    this.queue = new MessageQueue<LogMessage>({
      capacity: options.queueCapacity,
      overflow: options.overflow,
      onDrop: () => {
        this.logger.warn("Log queue full; message dropped", {
          overflow: options.overflow ?? "drop-oldest",
          dropped: this.queue.droppedCount,
        });
      },
    });
    this.writer = new SinkWriter({
      stdout: options.stdout,
      stream: options.stream,
      logger: this.logger,
    });
    this.worker = new LogWorker(this.queue, (msg) => this.write(msg), { logger: this.logger });
    this.worker.start();
  }

  get level(): LogLevel {
    return this.minLevel;
  }

  get target(): OutputTarget {
    return this.outputTarget;
  }

  get template(): string {
    return this.formatTemplate;
  }

  /** Effective log file path, including any timestamp suffix. Null before `init`. */
  get filePath(): string | null {
    return this.writer.filePath;
  }

  get state(): WorkerState {
    return this.worker.state;
  }

  get droppedCount(): number {
    return this.queue.droppedCount;
  }

  /**
   * Set the minimum level and (re)open the log file.
   *
   * Does not throw on an unusable path: the failure is reported through
   * diagnostics and file output stays disabled. Messages already queued are
   * written through whichever file is open when the worker reaches them.
   */
  init(minLevel: LogLevel, filePath: string, append = true, addTimestampSuffix = true): void {
    if (this.shutdownPromise) {
      this.logger.warn("init called after shutdown; ignored", { filePath });
      return;
    }
    this.minLevel = minLevel;
    const path = resolveLogFilePath(filePath, this.startupStamp, addTimestampSuffix);
    this.writer.open(path, append);
  }

  setLogLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  setOutputTarget(target: OutputTarget): void {
    this.outputTarget = target;
  }

  setFormatTemplate(template: string): void {
    this.formatTemplate = template;
  }

  /** Submit one message. Below the minimum level this returns before building anything. */
  log(level: LogLevel, message: string, sourceFile: string, sourceLine: number): void {
    if (level < this.minLevel || this.shutdownPromise) return;
    this.queue.enqueue(createLogMessage(level, message, sourceFile, sourceLine, this.now()));
  }

  /** Join `values` into the message text, after the level check. */
  logValues(
    level: LogLevel,
    sourceFile: string,
    sourceLine: number,
    ...values: Displayable[]
  ): void {
    if (level < this.minLevel || this.shutdownPromise) return;
    this.log(level, joinValues(values), sourceFile, sourceLine);
  }

  /** Resolve once every message submitted so far has been written or dropped. */
  flush(): Promise<void> {
    return this.worker.flush();
  }

  /**
   * Signal the worker, wait for it to drain the queue, then release the file.
   * Safe to call more than once; later calls return the same promise.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.worker.stop().then(() => {
        this.writer.close();
      });
    }
    return this.shutdownPromise;
  }

  private write(msg: LogMessage): void {
    this.writer.write(renderTemplate(this.formatTemplate, msg), this.outputTarget);
  }
}
