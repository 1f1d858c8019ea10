/**
 * Unbounded single-consumer queue that can be drained with `for await`.
 * Closing lets the consumer finish once buffered items are read.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private waiters: Array<(result: IteratorResult<T>) => void> = [];
  private closed = false;

  push(item: T): void {
    if (this.closed) {
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
    } else {
      this.items.push(item);
    }
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters) {
      waiter({ value: undefined, done: true });
    }
    this.waiters = [];
  }

  next(): Promise<IteratorResult<T>> {
    if (this.items.length > 0) {
      const value = this.items.shift();
      if (value !== undefined) {
        return Promise.resolve({ value, done: false });
      }
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() };
  }
}

/**
 * Runs `worker` over `items` with at most `limit` calls in flight. Stops
 * pulling new items once `signal` aborts.
 */
export async function runWithConcurrency<T>(
  items: Iterator<T>,
  limit: number,
  worker: (item: T) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  const runners = Array.from({ length: Math.max(1, limit) }, async () => {
    while (!signal?.aborted) {
      const next = items.next();
      if (next.done) {
        return;
      }
      await worker(next.value);
    }
  });

  await Promise.all(runners);
}
