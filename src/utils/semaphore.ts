/**
 * Counting Semaphore
 *
 * Bounds how many async operations hold a permit at once. Waiters are served
 * in FIFO order. Use `use()` rather than `acquire()` so the permit is returned
 * on every exit path.
 *
 * @example
 * const dbPermits = new Semaphore(10);
 * const wallet = await dbPermits.use(() => pool.transaction(loadWallet));
 */

export type ReleaseFn = () => void;

export class Semaphore {
  private available: number;
  private readonly waiters: Array<(release: ReleaseFn) => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.available = capacity;
  }

  /** Permits not currently held */
  get availablePermits(): number {
    return this.available;
  }

  /** Callers blocked in acquire() */
  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Take a permit, waiting for one to be released if none is free.
   * The returned function gives the permit back; calling it twice is a no-op.
   */
  acquire(): Promise<ReleaseFn> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve(this.createRelease());
    }
    return new Promise<ReleaseFn>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Run `fn` while holding a permit
   */
  async use<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): ReleaseFn {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      // Hand the permit straight to the next waiter, if any
      const next = this.waiters.shift();
      if (next) {
        next(this.createRelease());
      } else {
        this.available++;
      }
    };
  }
}
