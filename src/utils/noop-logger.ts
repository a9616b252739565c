import type { Logger } from "../interfaces/logger.js";

export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/** Shared singleton — use to silence diagnostics. */
export const noopLogger: Logger = new NoopLogger();
