export interface PoolConfig {
  maxWorkers: number;
}

/**
 * Fixed-size pool of async workers. Work beyond `maxWorkers` waits in FIFO
 * order for a free slot.
 */
export class WorkerPool {
  private readonly maxWorkers: number;
  private active = 0;
  private completed = 0;
  private readonly queue: Array<() => void> = [];
  private idleWaiters: Array<() => void> = [];

  constructor(config: PoolConfig) {
    if (!Number.isInteger(config.maxWorkers) || config.maxWorkers < 1) {
      throw new Error(`maxWorkers must be a positive integer, got ${config.maxWorkers}`);
    }
    this.maxWorkers = config.maxWorkers;
  }

  get activeCount(): number {
    return this.active;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  get completedCount(): number {
    return this.completed;
  }

  get idle(): boolean {
    return this.active === 0 && this.queue.length === 0;
  }

  submit<T>(label: string, run: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = (): void => {
        this.active++;
        Promise.resolve()
          .then(run)
          .then(
            (result) => {
              this.finish();
              resolve(result);
            },
            (err: unknown) => {
              this.finish();
              reject(err instanceof Error ? err : new Error(`${label}: ${String(err)}`));
            }
          );
      };

      if (this.active < this.maxWorkers) {
        start();
      } else {
        this.queue.push(start);
      }
    });
  }

  /**
   * Resolves once nothing is running or queued
   */
  onIdle(): Promise<void> {
    if (this.idle) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private finish(): void {
    this.active--;
    this.completed++;

    let next = this.active < this.maxWorkers ? this.queue.shift() : undefined;
    while (next) {
      next();
      next = this.active < this.maxWorkers ? this.queue.shift() : undefined;
    }

    if (this.idle) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }
}
