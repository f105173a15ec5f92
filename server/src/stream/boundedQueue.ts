/**
 * Fixed-capacity FIFO with a drop-oldest overflow policy.
 *
 * Backed by a ring buffer so push, shift and evict are O(1). A single
 * consumer can wait on {@link BoundedQueue.take}; items pushed while it
 * waits are handed over directly and never occupy a slot.
 */
export class BoundedQueue<T> {
  private buffer: (T | undefined)[];
  private head = 0;
  private count = 0;
  private droppedCount = 0;
  private isClosed = false;
  private waiters: ((item: T | undefined) => void)[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array<T | undefined>(capacity).fill(undefined);
  }

  /** Returns the evicted item when the queue was full. */
  push(item: T): T | undefined {
    if (this.isClosed) return undefined;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return undefined;
    }

    let evicted: T | undefined;
    if (this.count === this.capacity) {
      evicted = this.shift();
      this.droppedCount += 1;
    }

    this.buffer[(this.head + this.count) % this.capacity] = item;
    this.count += 1;
    return evicted;
  }

  shift(): T | undefined {
    if (this.count === 0) return undefined;
    const item = this.buffer[this.head];
    this.buffer[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count -= 1;
    return item;
  }

  /** Resolves with the oldest item, or `undefined` once the queue is closed. */
  take(): Promise<T | undefined> {
    if (this.count > 0) {
      return Promise.resolve(this.shift());
    }
    if (this.isClosed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  peekNewest(): T | undefined {
    if (this.count === 0) return undefined;
    return this.buffer[(this.head + this.count - 1) % this.capacity];
  }

  toArray(): T[] {
    const items: T[] = [];
    for (let i = 0; i < this.count; i += 1) {
      const item = this.buffer[(this.head + i) % this.capacity];
      if (item !== undefined) items.push(item);
    }
    return items;
  }

  clear(): void {
    this.buffer.fill(undefined);
    this.head = 0;
    this.count = 0;
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.clear();
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach((resolve) => resolve(undefined));
  }

  get size(): number {
    return this.count;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get closed(): boolean {
    return this.isClosed;
  }
}
