import { logger } from '../config/logger.js';
import { systemClock, type Clock } from '../utils/clock.js';

export interface TokenBucketOptions {
  capacity: number;
  /** Tokens added at each refill tick. */
  refillAmount: number;
  refillIntervalMs: number;
  clock?: Clock;
}

export interface TokenBucketStatus {
  tokens: number;
  capacity: number;
  waits: number;
  exhausted: number;
}

/**
 * Process-wide send budget shared by every dispatch. Refills in fixed ticks;
 * waiting callers sleep until the next tick instead of spinning.
 */
export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private waits = 0;
  private exhausted = 0;
  private readonly clock: Clock;

  constructor(private readonly options: TokenBucketOptions) {
    if (options.capacity < 1 || options.refillAmount < 1 || options.refillIntervalMs < 1) {
      throw new Error('Token bucket needs a positive capacity, refill amount and interval');
    }
    this.clock = options.clock ?? systemClock;
    this.tokens = options.capacity;
    this.lastRefill = this.clock.now().getTime();
  }

  tryAcquire(): boolean {
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  /**
   * Wait for a token for at most `maxWaitMs`. Resolves false when the deadline passes first.
   */
  async acquire(maxWaitMs: number): Promise<boolean> {
    const deadline = this.clock.now().getTime() + maxWaitMs;
    let waited = false;

    while (!this.tryAcquire()) {
      const now = this.clock.now().getTime();
      if (now >= deadline) {
        this.exhausted++;
        logger.warn('Rate budget deadline elapsed', { maxWaitMs });
        return false;
      }
      if (!waited) {
        this.waits++;
        waited = true;
      }
      const untilRefill = this.lastRefill + this.options.refillIntervalMs - now;
      await this.clock.sleep(Math.max(1, Math.min(untilRefill, deadline - now)));
    }

    return true;
  }

  getStatus(): TokenBucketStatus {
    this.refill();
    return {
      tokens: this.tokens,
      capacity: this.options.capacity,
      waits: this.waits,
      exhausted: this.exhausted,
    };
  }

  private refill(): void {
    const now = this.clock.now().getTime();
    const ticks = Math.floor((now - this.lastRefill) / this.options.refillIntervalMs);
    if (ticks <= 0) {
      return;
    }
    this.tokens = Math.min(this.options.capacity, this.tokens + ticks * this.options.refillAmount);
    this.lastRefill += ticks * this.options.refillIntervalMs;
  }
}
