import { describe, expect, it } from 'vitest';
import { createRateLimiter, type LimiterClock } from '../src/providers/rateLimiter';

function fakeClock() {
  const sleeps: number[] = [];
  let now = 0;
  const clock: LimiterClock = {
    now: () => now,
    sleep: async (ms) => {
      sleeps.push(ms);
      now += ms;
    },
  };
  return { clock, sleeps, advance: (ms: number) => (now += ms) };
}

describe('token bucket', () => {
  it('queues for the next token when the bucket is empty', async () => {
    const { clock, sleeps } = fakeClock();
    const limiter = createRateLimiter(
      { strategy: 'token_bucket', capacity: 2, refillPerSecond: 1, policy: { mode: 'queue', maxWaitMs: 5_000 } },
      clock,
    );

    expect(await limiter.acquire()).toBe(true);
    expect(await limiter.acquire()).toBe(true);
    expect(await limiter.acquire()).toBe(true);
    expect(sleeps).toEqual([1_000]);
  });

  it('gives up when the wait would exceed maxWaitMs', async () => {
    const { clock, sleeps } = fakeClock();
    const limiter = createRateLimiter(
      { strategy: 'token_bucket', capacity: 1, refillPerSecond: 1, policy: { mode: 'queue', maxWaitMs: 500 } },
      clock,
    );

    expect(await limiter.acquire()).toBe(true);
    expect(await limiter.acquire()).toBe(false);
    expect(sleeps).toEqual([]);
  });

  it('rejects immediately under the reject policy', async () => {
    const { clock, advance } = fakeClock();
    const limiter = createRateLimiter(
      { strategy: 'token_bucket', capacity: 1, refillPerSecond: 2, policy: { mode: 'reject' } },
      clock,
    );

    expect(await limiter.acquire()).toBe(true);
    expect(await limiter.acquire()).toBe(false);
    advance(500);
    expect(await limiter.acquire()).toBe(true);
  });
});

describe('fixed window', () => {
  it('allows maxRequests per window and resets at the boundary', async () => {
    const { clock, advance } = fakeClock();
    const limiter = createRateLimiter(
      { strategy: 'fixed_window', maxRequests: 2, windowMs: 1_000, policy: { mode: 'reject' } },
      clock,
    );

    expect(await limiter.acquire()).toBe(true);
    expect(await limiter.acquire()).toBe(true);
    expect(await limiter.acquire()).toBe(false);
    advance(1_000);
    expect(await limiter.acquire()).toBe(true);
  });

  it('waits out the rest of the window when queueing', async () => {
    const { clock, sleeps, advance } = fakeClock();
    const limiter = createRateLimiter(
      { strategy: 'fixed_window', maxRequests: 1, windowMs: 1_000, policy: { mode: 'queue', maxWaitMs: 2_000 } },
      clock,
    );

    expect(await limiter.acquire()).toBe(true);
    advance(300);
    expect(await limiter.acquire()).toBe(true);
    expect(sleeps).toEqual([700]);
  });
});
