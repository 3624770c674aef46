/**
 * Bounded FIFO with an async read side.
 *
 * `push` never blocks: when the queue is full the oldest item is dropped,
 * since readers only need the latest progress, not every tick. `shift`
 * resolves immediately when an item is queued, otherwise on the next push.
 */
export class BoundedAsyncQueue<T extends object> {
  private items: T[] = [];
  private readonly waiters: ((item: T) => void)[] = [];
  private droppedCount = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`queue capacity must be a positive integer (got ${capacity})`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  /** Items discarded because the queue was full. */
  get dropped(): number {
    return this.droppedCount;
  }

  push(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return;
    }

    if (this.items.length >= this.capacity) {
      this.items.shift();
      this.droppedCount++;
    }
    this.items.push(item);
  }

  shift(): Promise<T> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
    return new Promise<T>((resolve) => {
      this.waiters.push(resolve);
    });
  }
}
