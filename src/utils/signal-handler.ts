import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "./noop-logger.js";

export type ShutdownSignal = "SIGTERM" | "SIGINT";

/** The slice of `process` the handler needs; injectable for tests. */
export interface SignalTarget {
  on(signal: ShutdownSignal, listener: () => void): unknown;
  exit(code: number): void;
}

export interface ShutdownSignalOptions {
  logger?: Logger;
  target?: SignalTarget;
}

/**
 * Drain `sink` on SIGTERM/SIGINT, then exit.
 * No force timer: a stuck write keeps the process open until it completes.
 */
export function registerShutdownSignals(
  sink: { shutdown(): Promise<void> },
  options: ShutdownSignalOptions = {},
): void {
  const logger = options.logger ?? noopLogger;
  const target: SignalTarget = options.target ?? process;
  let shuttingDown = false;

  const handler = () => {
    if (shuttingDown) return;
    shuttingDown = true;

    sink
      .shutdown()
      .then(() => target.exit(0))
      .catch((err: unknown) => {
        logger.error("Log sink shutdown failed", { error: err });
        target.exit(1);
      });
  };

  target.on("SIGTERM", handler);
  target.on("SIGINT", handler);
}
