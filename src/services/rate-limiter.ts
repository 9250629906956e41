/**
 * Provider Rate Limiter
 *
 * Token bucket shared by every caller that targets the same provider.
 * Holds `burst` tokens and refills one token every `minIntervalMs`. A caller
 * that finds the bucket empty waits for the next token; calls are delayed,
 * never dropped.
 *
 * Acquisitions are chained on a single promise so concurrent pipelines take
 * tokens strictly one after another (FIFO), which is what keeps the bucket
 * state consistent without a lock.
 */

import { Clock, systemClock } from '../utils/clock';

export interface RateLimiterConfig {
  /** Minimum spacing between calls once the burst is spent */
  minIntervalMs: number;
  /** Calls allowed back to back from a full bucket (default 1) */
  burst?: number;
}

export interface RateLimiterStatus {
  providerId: string;
  availableTokens: number;
  burst: number;
  minIntervalMs: number;
  waiting: number;
}

export class TokenBucketRateLimiter {
  private readonly minIntervalMs: number;
  private readonly burst: number;
  private tokens: number;
  private lastRefillAt: number;
  private queue: Promise<void> = Promise.resolve();
  private waiting = 0;

  constructor(
    readonly providerId: string,
    config: RateLimiterConfig,
    private readonly clock: Clock = systemClock
  ) {
    if (config.minIntervalMs <= 0) {
      throw new Error('minIntervalMs must be positive');
    }
    const burst = config.burst ?? 1;
    if (!Number.isInteger(burst) || burst < 1) {
      throw new Error('burst must be a positive integer');
    }

    this.minIntervalMs = config.minIntervalMs;
    this.burst = burst;
    this.tokens = burst;
    this.lastRefillAt = clock.now();
  }

  /**
   * Wait until a token is available and take it.
   * Rejects with FetchAbortedError if the signal fires while waiting.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    this.waiting++;
    const turn = this.queue.then(() => this.takeToken(signal));
    this.queue = turn.then(
      () => undefined,
      () => undefined
    );
    return turn.finally(() => {
      this.waiting--;
    });
  }

  getStatus(): RateLimiterStatus {
    this.refill();
    return {
      providerId: this.providerId,
      availableTokens: this.tokens,
      burst: this.burst,
      minIntervalMs: this.minIntervalMs,
      waiting: this.waiting,
    };
  }

  private async takeToken(signal?: AbortSignal): Promise<void> {
    this.refill();

    if (this.tokens < 1) {
      const waitMs = Math.ceil((1 - this.tokens) * this.minIntervalMs);
      await this.clock.sleep(waitMs, signal);
      this.refill();
    }

    this.tokens -= 1;
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsed = Math.max(0, now - this.lastRefillAt);
    this.tokens = Math.min(this.burst, this.tokens + elapsed / this.minIntervalMs);
    this.lastRefillAt = now;
  }
}

/**
 * One limiter per provider, created once and handed to every client of
 * that provider.
 */
export class RateLimiterRegistry {
  private readonly limiters = new Map<string, TokenBucketRateLimiter>();

  constructor(
    private readonly defaults: RateLimiterConfig,
    private readonly clock: Clock = systemClock
  ) {}

  forProvider(providerId: string, config?: RateLimiterConfig): TokenBucketRateLimiter {
    let limiter = this.limiters.get(providerId);
    if (!limiter) {
      limiter = new TokenBucketRateLimiter(providerId, config ?? this.defaults, this.clock);
      this.limiters.set(providerId, limiter);
    }
    return limiter;
  }

  getStatus(): RateLimiterStatus[] {
    return Array.from(this.limiters.values()).map((limiter) => limiter.getStatus());
  }
}
