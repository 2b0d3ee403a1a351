// src/transport/frame-queue.ts

export const DEFAULT_QUEUE_CAPACITY = 256;

/**
 * Bounded FIFO between the socket listener and response dispatch.
 * When full, the incoming item is refused and the queued ones are kept.
 */
export class FrameQueue<T> {
  private items: T[] = [];
  private dropped: number = 0;

  constructor(public readonly capacity: number = DEFAULT_QUEUE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * @returns false when the queue was full and the item was dropped
   */
  push(item: T): boolean {
    if (this.items.length >= this.capacity) {
      this.dropped++;
      return false;
    }
    this.items.push(item);
    return true;
  }

  shift(): T | undefined {
    return this.items.shift();
  }

  get length(): number {
    return this.items.length;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  clear(): void {
    this.items = [];
  }
}
