/**
 * Bounded concurrency for filesystem and provider work.
 *
 * At most `maxWorkers` tasks run at once; the rest wait in FIFO order and start
 * as soon as a slot frees up.
 */
export class WorkerPool {
  private readonly maxWorkers: number;
  private activeWorkers = 0;
  private readonly queue: Array<() => void> = [];

  constructor(maxWorkers: number) {
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${maxWorkers}`);
    }
    this.maxWorkers = maxWorkers;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const wrappedTask = () => {
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            this.activeWorkers -= 1;
            this.processQueue();
          });
      };

      // Claim the slot before starting so simultaneous submissions cannot overshoot.
      if (this.activeWorkers < this.maxWorkers) {
        this.activeWorkers += 1;
        wrappedTask();
      } else {
        this.queue.push(wrappedTask);
      }
    });
  }

  getStats(): { active: number; queued: number; max: number } {
    return {
      active: this.activeWorkers,
      queued: this.queue.length,
      max: this.maxWorkers,
    };
  }

  private processQueue(): void {
    while (this.queue.length > 0 && this.activeWorkers < this.maxWorkers) {
      const next = this.queue.shift();
      if (next) {
        this.activeWorkers += 1;
        next();
      }
    }
  }
}

/** Maps `items` through `worker` on a pool, keeping the input order in the result. */
export const mapWithPool = async <T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  pool: WorkerPool,
): Promise<R[]> => Promise.all(items.map((item, index) => pool.run(() => worker(item, index))));
