/** Immutable snapshot of buffered events captured by one drain. */
export type Batch<T> = readonly T[];

export interface EventBufferOptions {
  /** Cap on pending events. Oldest events are dropped past it. */
  maxSize?: number;
  /** Called with the number of events dropped by one overflowing enqueue. */
  onOverflow?: (dropped: number) => void;
}

/**
 * Append-only accumulation of pending events.
 *
 * `drain()` swaps the live array for a fresh one synchronously, so an event
 * enqueued by any caller lands either in the returned batch or in the new
 * buffer, never both.
 */
export class EventBuffer<T> {
  private items: T[] = [];
  private droppedCount = 0;
  private readonly maxSize: number;
  private readonly onOverflow?: (dropped: number) => void;

  constructor(options: EventBufferOptions = {}) {
    this.maxSize = options.maxSize ?? Number.POSITIVE_INFINITY;
    this.onOverflow = options.onOverflow;
  }

  /** Append one event. Never performs I/O. */
  enqueue(event: T): void {
    this.items.push(event);

    if (this.items.length > this.maxSize) {
      const dropped = this.items.length - this.maxSize;
      this.items.splice(0, dropped);
      this.droppedCount += dropped;
      this.onOverflow?.(dropped);
    }
  }

  /** Detach every pending event and leave the buffer empty. */
  drain(): Batch<T> {
    const batch = this.items;
    this.items = [];
    return Object.freeze(batch);
  }

  get size(): number {
    return this.items.length;
  }

  /** Total events discarded by the overflow cap. */
  get dropped(): number {
    return this.droppedCount;
  }
}
