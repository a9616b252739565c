/**
 * LogWorker — the single consumer of a MessageQueue.
 *
 * Runs as an async loop on the event loop: waits in `drainWait`, hands each
 * item to the handler in order, and on `stop()` keeps sweeping until the
 * closed queue is observed empty. The handler runs synchronously, so nothing
 * else can touch the sink between taking a batch and writing it.
 */

import { toDrainlogError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";
import type { MessageQueue } from "./message-queue.js";
import { isWorkerTransitionAllowed, type WorkerState } from "./worker-lifecycle.js";

export type WorkerHandler<T> = (item: T) => void;

export interface LogWorkerOptions {
  logger?: Logger;
}

interface FlushWaiter {
  target: number;
  resolve: () => void;
}

export class LogWorker<T> {
  private currentState: WorkerState = "idle";
  private loop: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private processed = 0;
  private flushWaiters: FlushWaiter[] = [];
  private readonly logger: Logger;

  constructor(
    private readonly queue: MessageQueue<T>,
    private readonly handler: WorkerHandler<T>,
    options: LogWorkerOptions = {},
  ) {
    this.logger = options.logger ?? noopLogger;
  }

  get state(): WorkerState {
    return this.currentState;
  }

  /** Items handed to the handler so far, whether or not it threw. */
  get processedCount(): number {
    return this.processed;
  }

  start(): void {
    if (this.loop) return;
    this.transition("running");
    this.loop = this.run();
  }

  /**
   * Signal shutdown and wait for the final sweep.
   * Every item accepted before the sweep observes an empty queue is handled.
   */
  stop(): Promise<void> {
    if (this.stopping) return this.stopping;
    this.transition("draining");
    this.queue.close();
    const loop = this.loop ?? this.run();
    this.loop = loop;
    this.stopping = loop.then(() => {
      this.transition("stopped");
      this.settleFlushWaiters(true);
    });
    return this.stopping;
  }

  /** Resolve once every item accepted before this call has been handled or evicted. */
  flush(): Promise<void> {
    const target = this.queue.pushedCount;
    if (this.settled() >= target || this.currentState === "stopped") return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.flushWaiters.push({ target, resolve });
    });
  }

  private async run(): Promise<void> {
    for (;;) {
      const batch = await this.queue.drainWait();
      if (batch.length === 0) {
        // drainWait only yields an empty batch once the queue is closed.
        break;
      }
      for (const item of batch) {
        this.handle(item);
      }
      this.settleFlushWaiters(false);
    }
  }

  private handle(item: T): void {
    try {
      this.handler(item);
    } catch (err) {
      const error = toDrainlogError(err);
      this.logger.error("Log worker handler failed", { error: error.message, code: error.code });
    } finally {
      this.processed++;
    }
  }

  private settled(): number {
    return this.processed + this.queue.evictedCount;
  }

  private settleFlushWaiters(all: boolean): void {
    if (this.flushWaiters.length === 0) return;
    const done = this.settled();
    const remaining: FlushWaiter[] = [];
    for (const waiter of this.flushWaiters) {
      if (all || waiter.target <= done) {
        waiter.resolve();
      } else {
        remaining.push(waiter);
      }
    }
    this.flushWaiters = remaining;
  }

  private transition(next: WorkerState): void {
    if (!isWorkerTransitionAllowed(this.currentState, next)) {
      throw new Error(`Invalid worker transition: ${this.currentState} -> ${next}`);
    }
    this.currentState = next;
  }
}
