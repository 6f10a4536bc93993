/**
 * Promise-chained mutual exclusion: callers run one at a time, in the order
 * they asked for the lock.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  get pending(): number {
    return this._pending;
  }

  get locked(): boolean {
    return this._pending > 0;
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    this._pending++;

    let release: () => void = () => {};
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);

    await previous;
    try {
      return await fn();
    } finally {
      this._pending--;
      release();
    }
  }
}
