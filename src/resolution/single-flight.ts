/**
 * Single-Flight Coordinator
 *
 * At most one in-flight computation per channel id in this process.
 * A caller arriving while a computation runs attaches to it and receives
 * the same result or the same failure. The entry is removed once the
 * computation settles, so the next request starts afresh.
 *
 * Computations for different channels run in parallel, bounded by the
 * limiter.
 *
 * @module resolution/single-flight
 */

import type { Logger } from '../logging/index.js';
import { ConcurrencyLimiter } from './limiter.js';

export interface SingleFlightOptions<T> {
  /** The expensive work, keyed by channel id */
  compute: (channelId: string) => Promise<T>;
  /** Simultaneous computations across all channels (default: 4) */
  maxConcurrent?: number;
  logger?: Logger;
}

export class SingleFlightCoordinator<T> {
  private readonly compute: (channelId: string) => Promise<T>;
  private readonly limiter: ConcurrencyLimiter;
  private readonly logger?: Logger;
  private readonly inFlight: Map<string, Promise<T>> = new Map();

  constructor(options: SingleFlightOptions<T>) {
    this.compute = options.compute;
    this.limiter = new ConcurrencyLimiter(options.maxConcurrent ?? 4);
    this.logger = options.logger;
  }

  /**
   * Join the computation in flight for `channelId`, or start one
   */
  run(channelId: string): Promise<T> {
    const pending = this.inFlight.get(channelId);
    if (pending) {
      this.logger?.debug(`[single-flight] Joining computation for ${channelId}`);
      return pending;
    }

    this.logger?.debug(`[single-flight] Starting computation for ${channelId}`);
    const flight = this.limiter
      .run(() => this.compute(channelId))
      .finally(() => {
        this.inFlight.delete(channelId);
      });
    this.inFlight.set(channelId, flight);
    return flight;
  }

  isInFlight(channelId: string): boolean {
    return this.inFlight.has(channelId);
  }

  get size(): number {
    return this.inFlight.size;
  }

  getStats() {
    return { inFlight: this.inFlight.size, ...this.limiter.getStats() };
  }
}
