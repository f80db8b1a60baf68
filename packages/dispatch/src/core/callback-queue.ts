import type { PendingCallback } from '../types/index.js';

/**
 * Compact the backing array once this many consumed slots sit at its head.
 */
const COMPACT_THRESHOLD = 64;

/**
 * Unbounded FIFO of pending callbacks.
 *
 * Backed by an array plus a head index so dequeue is O(1). Consumed slots are
 * cleared immediately and the array is compacted once the dead prefix
 * dominates, so the queue never keeps a finished callback (or the state it
 * captured) reachable.
 */
export class CallbackQueue {
  private items: (PendingCallback | undefined)[] = [];
  private head = 0;

  get size(): number {
    return this.items.length - this.head;
  }

  get isEmpty(): boolean {
    return this.head === this.items.length;
  }

  enqueue(item: PendingCallback): void {
    this.items.push(item);
  }

  /**
   * Remove and return the oldest callback, or undefined when empty.
   */
  dequeue(): PendingCallback | undefined {
    if (this.head === this.items.length) return undefined;

    const item = this.items[this.head];
    this.items[this.head] = undefined;
    this.head++;

    if (this.head === this.items.length) {
      this.items = [];
      this.head = 0;
    } else if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }
}
