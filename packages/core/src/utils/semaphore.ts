/**
 * Counting semaphore. Waiters are released in FIFO order.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];
  private _peak = 0;

  constructor(readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore permits must be a positive integer, got ${permits}`);
    }
    this.available = permits;
  }

  /** Permits currently held */
  get inUse(): number {
    return this.permits - this.available;
  }

  /** Highest number of permits held at once */
  get peak(): number {
    return this._peak;
  }

  get pending(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.take();
      return;
    }
    await new Promise<void>(resolve => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // permit passes straight to the waiter
      next();
      return;
    }
    if (this.available < this.permits) this.available += 1;
  }

  async withPermit<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private take(): void {
    this.available -= 1;
    this._peak = Math.max(this._peak, this.inUse);
  }
}
