interface Waiter<T> {
  resolve: (item: T) => void;
  timer: NodeJS.Timeout | undefined;
}

/**
 * FIFO queue whose `take` waits for an item, optionally bounded by a timeout.
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];

  constructor(initial: Iterable<T> = []) {
    this.items.push(...initial);
  }

  get size(): number {
    return this.items.length;
  }

  put(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(item);
      return;
    }
    this.items.push(item);
  }

  /** Resolves with the next item, or `undefined` once `timeoutMs` elapses. */
  take(timeoutMs?: number): Promise<T | undefined> {
    const item = this.items.shift();
    if (item !== undefined) return Promise.resolve(item);

    return new Promise((resolve) => {
      const waiter: Waiter<T> = { resolve, timer: undefined };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) this.waiters.splice(index, 1);
          resolve(undefined);
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  /** Remove and return every queued item. */
  drain(): T[] {
    return this.items.splice(0, this.items.length);
  }
}
