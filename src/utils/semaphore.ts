/**
 * Counting semaphore. At most `limit` holders at a time; waiters are admitted
 * in FIFO order.
 */
export class Semaphore {
  private active = 0;
  private peak = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`);
    }
  }

  get inUse(): number {
    return this.active;
  }

  /** Highest number of simultaneous holders seen so far. */
  get maxInUse(): number {
    return this.peak;
  }

  get pending(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.take();
      return;
    }
    await new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Slot passes straight to the next waiter
      next();
      return;
    }
    if (this.active === 0) {
      throw new Error("Semaphore released more times than acquired");
    }
    this.active--;
  }

  async use<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private take(): void {
    this.active++;
    this.peak = Math.max(this.peak, this.active);
  }
}
