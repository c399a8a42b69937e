/**
 * Runs queued tasks with at most `concurrency` in flight.
 */
export class WorkerPool {
  private active = 0;
  private readonly queue: Array<() => void> = [];
  private readonly concurrency: number;

  constructor(concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Worker pool concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
  }

  get running(): number {
    return this.active;
  }

  get pending(): number {
    return this.queue.length;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => {
        this.active++;
        task()
          .then(resolve, reject)
          .finally(() => {
            this.active--;
            this.drain();
          });
      });
      this.drain();
    });
  }

  private drain(): void {
    while (this.active < this.concurrency && this.queue.length > 0) {
      const start = this.queue.shift();
      start?.();
    }
  }
}

/**
 * Map `items` through `fn` on a bounded pool. Results keep input order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const pool = new WorkerPool(concurrency);
  return Promise.all(items.map((item, index) => pool.run(() => fn(item, index))));
}
