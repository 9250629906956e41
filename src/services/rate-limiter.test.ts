import * as fc from 'fast-check';
import { RateLimiterRegistry, TokenBucketRateLimiter } from './rate-limiter';
import { FakeClock } from '../test/fake-clock';
import { FetchAbortedError } from '../adapters/http/errors';

describe('TokenBucketRateLimiter', () => {
  it('lets the burst through without waiting', async () => {
    const clock = new FakeClock();
    const limiter = new TokenBucketRateLimiter('COINGECKO', { minIntervalMs: 1000, burst: 3 }, clock);

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    expect(clock.sleeps).toEqual([]);
  });

  it('delays a call beyond the burst by the spacing instead of dropping it', async () => {
    const clock = new FakeClock();
    const limiter = new TokenBucketRateLimiter('COINGECKO', { minIntervalMs: 1000, burst: 2 }, clock);

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);

    expect(clock.sleeps).toEqual([1000]);
  });

  it('spaces back-to-back calls by minIntervalMs once the burst is spent', async () => {
    const clock = new FakeClock();
    const start = clock.now();
    const limiter = new TokenBucketRateLimiter('COINMARKETCAP', { minIntervalMs: 500 }, clock);

    await Promise.all([0, 1, 2, 3].map(() => limiter.acquire()));

    expect(clock.sleeps).toEqual([500, 500, 500]);
    expect(clock.now() - start).toBe(1500);
  });

  it('refills tokens as time passes', async () => {
    const clock = new FakeClock();
    const limiter = new TokenBucketRateLimiter('COINGECKO', { minIntervalMs: 1000, burst: 2 }, clock);

    await limiter.acquire();
    await limiter.acquire();
    clock.advance(2000);
    await limiter.acquire();

    expect(clock.sleeps).toEqual([]);
    expect(limiter.getStatus().availableTokens).toBe(1);
  });

  it('rejects a waiting acquisition when the signal is aborted', async () => {
    const clock = new FakeClock();
    const limiter = new TokenBucketRateLimiter('COINGECKO', { minIntervalMs: 1000 }, clock);
    const controller = new AbortController();

    await limiter.acquire();
    controller.abort();

    await expect(limiter.acquire(controller.signal)).rejects.toBeInstanceOf(FetchAbortedError);
    // The failed waiter does not block the queue
    await limiter.acquire();
    expect(clock.sleeps).toEqual([1000]);
  });

  it('rejects invalid configuration', () => {
    expect(() => new TokenBucketRateLimiter('COINGECKO', { minIntervalMs: 0 })).toThrow(
      'minIntervalMs must be positive'
    );
    expect(() => new TokenBucketRateLimiter('COINGECKO', { minIntervalMs: 100, burst: 0 })).toThrow(
      'burst must be a positive integer'
    );
  });

  it('never grants more than burst + elapsed / interval calls', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 1, max: 5 }),
        fc.integer({ min: 1, max: 2000 }),
        fc.integer({ min: 1, max: 20 }),
        async (burst, minIntervalMs, calls) => {
          const clock = new FakeClock();
          const start = clock.now();
          const limiter = new TokenBucketRateLimiter('COINGECKO', { minIntervalMs, burst }, clock);

          await Promise.all(Array.from({ length: calls }, () => limiter.acquire()));

          const elapsed = clock.now() - start;
          expect(calls).toBeLessThanOrEqual(burst + Math.floor(elapsed / minIntervalMs) + 1);
          expect(elapsed).toBeGreaterThanOrEqual(Math.max(0, calls - burst) * minIntervalMs);
        }
      ),
      { numRuns: 50 }
    );
  });
});

describe('RateLimiterRegistry', () => {
  it('hands out one shared limiter per provider', () => {
    const registry = new RateLimiterRegistry({ minIntervalMs: 1000 }, new FakeClock());

    const a = registry.forProvider('COINGECKO');
    const b = registry.forProvider('COINGECKO');
    const c = registry.forProvider('COINMARKETCAP');

    expect(a).toBe(b);
    expect(a).not.toBe(c);
    expect(registry.getStatus().map((s) => s.providerId)).toEqual(['COINGECKO', 'COINMARKETCAP']);
  });
});
