/**
 * Concurrency Limiter
 *
 * Semaphore with a FIFO queue. Bounds how many fresh computations run at
 * once so a burst of distinct channels cannot flood the providers.
 *
 * @module resolution/limiter
 */

export interface LimiterStats {
  /** Operations holding a slot */
  running: number;
  /** Operations waiting for a slot */
  queued: number;
  limit: number;
}

/**
 * @example
 * ```typescript
 * const limiter = new ConcurrencyLimiter(4);
 * const record = await limiter.run(() => computation.compute(channelId));
 * ```
 */
export class ConcurrencyLimiter {
  private readonly limit: number;
  private running = 0;
  private readonly queue: Array<() => void> = [];

  /**
   * @throws Error if limit is not a positive integer
   */
  constructor(limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`Concurrency limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
  }

  /**
   * Wait for a slot. Resolves immediately when one is free.
   */
  async acquire(): Promise<void> {
    if (this.running < this.limit) {
      this.running++;
      return;
    }
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /**
   * Give a slot back; the oldest waiter takes it over directly.
   *
   * @throws Error when no slot is held
   */
  release(): void {
    if (this.running <= 0) {
      throw new Error('ConcurrencyLimiter.release() called without a matching acquire()');
    }
    const next = this.queue.shift();
    if (next) {
      next();
      return;
    }
    this.running--;
  }

  /**
   * Run `fn` inside a slot, releasing it however `fn` settles
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getStats(): LimiterStats {
    return { running: this.running, queued: this.queue.length, limit: this.limit };
  }
}
