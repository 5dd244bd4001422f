import { sleep as defaultSleep } from '../util/async';

/**
 * `queue` waits up to `maxWaitMs` for a free slot; `reject` fails at once.
 */
export type RateLimitPolicy = { mode: 'queue'; maxWaitMs: number } | { mode: 'reject' };

export type RateLimitConfig =
  | { strategy: 'token_bucket'; capacity: number; refillPerSecond: number; policy: RateLimitPolicy }
  | { strategy: 'fixed_window'; maxRequests: number; windowMs: number; policy: RateLimitPolicy };

export interface LimiterClock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

const systemClock: LimiterClock = { now: Date.now, sleep: defaultSleep };

export abstract class RateLimiter {
  protected constructor(
    private readonly policy: RateLimitPolicy,
    protected readonly clock: LimiterClock,
  ) {}

  /**
   * Try to take one slot now. Returns 0 on success, otherwise the number of
   * ms until a slot may free up.
   */
  protected abstract tryTake(now: number): number;

  /** Resolves `true` once a slot is taken, `false` when the policy gives up. Rejects if `signal` aborts. */
  async acquire(signal?: AbortSignal): Promise<boolean> {
    const startedAt = this.clock.now();
    for (;;) {
      const now = this.clock.now();
      const waitMs = this.tryTake(now);
      if (waitMs === 0) return true;
      if (this.policy.mode === 'reject') return false;

      const remaining = startedAt + this.policy.maxWaitMs - now;
      if (waitMs > remaining) return false;
      await this.clock.sleep(waitMs, signal);
    }
  }
}

export class TokenBucketLimiter extends RateLimiter {
  private tokens: number;
  private lastRefill: number;

  constructor(
    private readonly capacity: number,
    private readonly refillPerSecond: number,
    policy: RateLimitPolicy,
    clock: LimiterClock = systemClock,
  ) {
    super(policy, clock);
    this.tokens = capacity;
    this.lastRefill = clock.now();
  }

  protected tryTake(now: number): number {
    const elapsed = Math.max(0, now - this.lastRefill);
    this.tokens = Math.min(this.capacity, this.tokens + (elapsed / 1000) * this.refillPerSecond);
    this.lastRefill = now;

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return 0;
    }
    if (this.refillPerSecond <= 0) return Number.POSITIVE_INFINITY;
    return Math.max(1, Math.ceil(((1 - this.tokens) / this.refillPerSecond) * 1000));
  }
}

export class FixedWindowLimiter extends RateLimiter {
  private windowStart: number;
  private count = 0;

  constructor(
    private readonly maxRequests: number,
    private readonly windowMs: number,
    policy: RateLimitPolicy,
    clock: LimiterClock = systemClock,
  ) {
    super(policy, clock);
    this.windowStart = clock.now();
  }

  protected tryTake(now: number): number {
    if (now - this.windowStart >= this.windowMs) {
      this.windowStart = now;
      this.count = 0;
    }
    if (this.count < this.maxRequests) {
      this.count += 1;
      return 0;
    }
    return Math.max(1, this.windowStart + this.windowMs - now);
  }
}

export function createRateLimiter(config: RateLimitConfig, clock: LimiterClock = systemClock): RateLimiter {
  switch (config.strategy) {
    case 'token_bucket':
      return new TokenBucketLimiter(config.capacity, config.refillPerSecond, config.policy, clock);
    case 'fixed_window':
      return new FixedWindowLimiter(config.maxRequests, config.windowMs, config.policy, clock);
  }
}
