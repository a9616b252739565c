import { closeSync, fstatSync, fsyncSync, mkdirSync, openSync, writeSync } from "node:fs";
import { dirname } from "node:path";
import { errorMessage, SinkWriteError, toDrainlogError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import { hasTarget, OutputTarget } from "../types/output-target.js";
import { noopLogger } from "../utils/noop-logger.js";

const BOM_BYTES: readonly number[] = [0xef, 0xbb, 0xbf];

/** The UTF-8 byte-order mark. A copy; new files get their own. */
export const UTF8_BOM = Buffer.from(BOM_BYTES);

export interface SinkWriterOptions {
  /** Console destination. When omitted, lines go to `stream`. */
  stdout?: (text: string) => void;
  /** Stream behind the default console destination. Defaults to process.stdout. */
  stream?: NodeJS.WritableStream;
  logger?: Logger;
}

/**
 * Writes rendered lines to the console and/or the log file.
 *
 * File I/O is synchronous and every line is fsynced before `write` returns,
 * so reopening the file can only happen between two lines. Failures never
 * throw: they go to the diagnostics logger and the line is lost for that
 * destination only.
 *
 * A console stream that emits `error` (a closed pipe, typically) turns console
 * output off for the rest of the writer's life. The listener stays attached
 * so that late errors from the same stream are absorbed too.
 */
export class SinkWriter {
  private fd: number | null = null;
  private path: string | null = null;
  private openError: Error | null = null;
  private consoleClosed = false;
  private readonly stdout: (text: string) => void;
  private readonly logger: Logger;

  constructor(options: SinkWriterOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    if (options.stdout) {
      this.stdout = options.stdout;
    } else {
      const stream = options.stream ?? process.stdout;
      stream.on("error", (err: Error) => this.onConsoleStreamError(err));
      this.stdout = (text) => {
        stream.write(text);
      };
    }
  }

  get isOpen(): boolean {
    return this.fd !== null;
  }

  get isConsoleClosed(): boolean {
    return this.consoleClosed;
  }

  /** Path passed to the most recent `open`, whether or not it succeeded. */
  get filePath(): string | null {
    return this.path;
  }

  /**
   * Close any open file and open `path`, creating its directory.
   * A fresh, empty regular file starts with the UTF-8 byte-order mark.
   */
  open(path: string, append: boolean): boolean {
    this.close();
    this.path = path;
    this.openError = null;

    let fd: number | null = null;
    try {
      mkdirSync(dirname(path), { recursive: true });
      fd = openSync(path, append ? "a" : "w");
      const stat = fstatSync(fd);
      if (stat.isFile() && stat.size === 0) {
        writeSync(fd, Buffer.from(BOM_BYTES));
        fsyncSync(fd);
      }
      this.fd = fd;
      this.logger.debug?.("Log file opened", { path, append });
      return true;
    } catch (err) {
      if (fd !== null) this.closeQuietly(fd);
      this.openError = new SinkWriteError(`Cannot open log file ${path}: ${errorMessage(err)}`, "file", {
        cause: err,
      });
      this.logger.warn("Log file could not be opened; file output is disabled", {
        path,
        error: this.openError,
      });
      return false;
    }
  }

  write(line: string, target: OutputTarget): void {
    if (hasTarget(target, OutputTarget.Console)) {
      this.writeConsole(line);
    }
    if (hasTarget(target, OutputTarget.File)) {
      this.writeFile(line);
    }
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    this.closeQuietly(fd);
  }

  private onConsoleStreamError(err: Error): void {
    if (this.consoleClosed) return;
    this.consoleClosed = true;
    this.logger.warn("Console stream failed; console output disabled", {
      error: new SinkWriteError(errorMessage(err), "console", { cause: err }),
    });
  }

  private writeConsole(line: string): void {
    if (this.consoleClosed) return;
    try {
      this.stdout(`${line}\n`);
    } catch (err) {
      this.logger.warn("Console write failed", {
        error: new SinkWriteError(errorMessage(err), "console", { cause: err }),
      });
    }
  }

  private writeFile(line: string): void {
    if (this.fd === null) {
      this.logger.warn("Log file is not open; skipping file write", {
        path: this.path,
        ...(this.openError ? { error: this.openError } : {}),
      });
      return;
    }

    const data = `${line}\n`;
    try {
      const bytes = writeSync(this.fd, data);
      fsyncSync(this.fd);
      this.logger.debug?.("Wrote to log file", { path: this.path, bytes });
    } catch (err) {
      this.logger.warn("Log file write failed; line dropped for file output", {
        path: this.path,
        error: new SinkWriteError(errorMessage(err), "file", { cause: err }),
      });
    }
  }

  private closeQuietly(fd: number): void {
    try {
      closeSync(fd);
    } catch (err) {
      const error = toDrainlogError(err);
      this.logger.warn("Failed to close log file", { path: this.path, error: error.message, code: error.code });
    }
  }
}
