/**
 * Counting semaphore for the worker-slot pool.
 *
 * `acquire()` resolves with a release function. Releasing twice is a no-op,
 * so a slot cannot be returned more often than it was taken. Waiters are
 * served in FIFO order.
 */
export class Semaphore {
  private count: number;
  private queue: Array<() => void> = [];
  readonly capacity: number;

  constructor(max: number) {
    if (!Number.isInteger(max) || max < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${max}`);
    }
    this.capacity = max;
    this.count = max;
  }

  /** Slots currently held. */
  get inUse(): number {
    return this.capacity - this.count;
  }

  /** Callers waiting for a slot. */
  get waiting(): number {
    return this.queue.length;
  }

  async acquire(): Promise<() => void> {
    if (this.count > 0) {
      this.count -= 1;
      return this.releaser();
    }
    return new Promise<() => void>((resolve) => {
      this.queue.push(() => {
        this.count -= 1;
        resolve(this.releaser());
      });
    });
  }

  /**
   * Runs `task` while holding a slot. The slot is released however `task`
   * settles.
   */
  async use<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    this.count += 1;
    const next = this.queue.shift();
    if (next) next();
  }
}
