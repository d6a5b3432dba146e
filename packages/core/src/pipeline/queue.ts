/**
 * FIFO hand-off between one producer and several consumers, holding at most
 * `capacity` items. `put` waits while full; `take` waits while empty.
 */
export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private readonly takers: Array<(item: T | undefined) => void> = [];
  private readonly putters: Array<() => void> = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Resolves true once the item is queued, false if the queue was closed
   * first. A rejected item was never handed to a consumer.
   */
  async put(item: T): Promise<boolean> {
    while (!this.closed && this.items.length >= this.capacity) {
      await new Promise<void>((resolve) => this.putters.push(resolve));
    }
    if (this.closed) return false;

    const taker = this.takers.shift();
    if (taker) {
      taker(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  /**
   * Next item, or undefined once the queue is closed and empty.
   */
  async take(): Promise<T | undefined> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      this.putters.shift()?.();
      return item;
    }
    if (this.closed) return undefined;
    return new Promise<T | undefined>((resolve) => this.takers.push(resolve));
  }

  /**
   * Stops accepting items and wakes every waiter. Queued items can still be
   * taken.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const taker of this.takers.splice(0)) taker(undefined);
    for (const putter of this.putters.splice(0)) putter();
  }
}
