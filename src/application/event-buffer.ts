import { ConfigurationError } from '../domain/index.js';

export const DEFAULT_MAX_EVENTS = 100;

/**
 * Bounded FIFO of delivered records.
 *
 * Appending past capacity silently drops the oldest entry. All methods are
 * synchronous: on the single Node.js event loop each call runs to completion
 * before a transport callback or an HTTP reader can observe the buffer, so
 * append-and-evict and copy-on-read are each one critical section.
 */
export class EventBuffer<T> {
  private items: T[] = [];

  constructor(readonly capacity: number = DEFAULT_MAX_EVENTS) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new ConfigurationError(
        `Event buffer capacity must be a positive integer (received ${capacity})`,
      );
    }
  }

  append(item: T): void {
    this.items.push(item);
    if (this.items.length > this.capacity) {
      this.items.shift();
    }
  }

  /**
   * Returns a copy of the newest `limit` entries, oldest first.
   * Fractional limits are floored; anything below 1 yields an empty list.
   */
  tail(limit: number): T[] {
    const count = Math.floor(limit);
    if (Number.isNaN(count) || count < 1) return [];
    return this.items.slice(-count);
  }

  /** Newest entry, if any. */
  last(): T | undefined {
    return this.items[this.items.length - 1];
  }

  get size(): number {
    return this.items.length;
  }
}
