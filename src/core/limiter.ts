/**
 * Dossier - Concurrency Limiter
 *
 * Fixed-capacity counting semaphore. Waiters are admitted in FIFO order.
 */

export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Semaphore capacity must be a positive integer (got ${capacity})`);
    }
    this.available = capacity;
  }

  /** Slots currently held. */
  get inFlight(): number {
    return this.capacity - this.available;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return;
    }
    await new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Hand the slot straight to the next waiter
      next();
      return;
    }
    if (this.available >= this.capacity) {
      throw new Error('Semaphore released more times than acquired');
    }
    this.available++;
  }

  /** Run fn once a slot is free, releasing the slot however fn settles. */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
