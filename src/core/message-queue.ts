/**
 * MessageQueue<T> — FIFO mailbox between log producers and the worker.
 *
 * Usage:
 *   const queue = new MessageQueue<LogMessage>();
 *   queue.enqueue(msg);                    // producer side, synchronous
 *   const batch = await queue.drainWait(); // consumer side
 *   queue.close();                         // shutdown signal
 *
 * Unbounded by default. With a `capacity`, the overflow policy decides which
 * message is lost when a push would exceed it.
 */

export type OverflowPolicy = "drop-oldest" | "drop-newest";

export interface MessageQueueOptions {
  capacity?: number;
  overflow?: OverflowPolicy;
  /** Called with each item lost to the overflow policy. */
  onDrop?: (item: unknown) => void;
}

export class MessageQueue<T> {
  private readonly items: T[] = [];
  private wake: (() => void) | null = null;
  private closed = false;
  private pushed = 0;
  private dropped = 0;
  private evicted = 0;
  private readonly capacity: number;
  private readonly overflow: OverflowPolicy;
  private readonly onDrop: ((item: unknown) => void) | undefined;

  constructor(options: MessageQueueOptions = {}) {
    const capacity = options.capacity ?? Number.POSITIVE_INFINITY;
    if (capacity !== Number.POSITIVE_INFINITY && (!Number.isInteger(capacity) || capacity < 1)) {
      throw new RangeError("MessageQueue capacity must be a positive integer");
    }
    this.capacity = capacity;
    this.overflow = options.overflow ?? "drop-oldest";
    this.onDrop = options.onDrop;
  }

  /**
   * Append an item and wake the waiting consumer.
   * Returns false when the item itself was rejected (drop-newest on a full queue).
   */
  enqueue(item: T): boolean {
    if (this.items.length >= this.capacity) {
      this.dropped++;
      if (this.overflow === "drop-newest") {
        this.onDrop?.(item);
        return false;
      }
      const oldest = this.items.shift();
      this.evicted++;
      this.onDrop?.(oldest);
    }

    this.items.push(item);
    this.pushed++;
    this.notify();
    return true;
  }

  /**
   * Wait until the queue holds at least one item or has been closed, then take
   * everything queued, oldest first. A closed, empty queue yields [].
   */
  async drainWait(): Promise<T[]> {
    while (this.items.length === 0 && !this.closed) {
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
    return this.items.splice(0, this.items.length);
  }

  /** Raise the shutdown signal. Items pushed afterwards are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.notify();
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Items accepted since construction, including ones later evicted. */
  get pushedCount(): number {
    return this.pushed;
  }

  /** Items lost to the overflow policy. */
  get droppedCount(): number {
    return this.dropped;
  }

  /** Accepted items later removed by drop-oldest; they never reach the consumer. */
  get evictedCount(): number {
    return this.evicted;
  }

  private notify(): void {
    if (this.wake) {
      const w = this.wake;
      this.wake = null;
      w();
    }
  }
}
