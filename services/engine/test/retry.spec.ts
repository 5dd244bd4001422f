import { describe, expect, it, vi } from 'vitest';
import { failure, success, type ProviderResult } from '../src/contracts/results';
import { backoffDelay, retryResult } from '../src/providers/retry';
import { AbortedError } from '../src/util/async';

describe('backoffDelay', () => {
  it('doubles the ceiling per attempt up to the cap', () => {
    expect(backoffDelay(1, 250, 4_000, () => 0.5)).toBe(125);
    expect(backoffDelay(3, 250, 4_000, () => 0.5)).toBe(500);
    expect(backoffDelay(10, 250, 4_000, () => 0.999)).toBe(3_996);
    expect(backoffDelay(2, 250, 4_000, () => 0)).toBe(0);
  });
});

describe('retryResult', () => {
  it('retries retriable failures and returns the first success', async () => {
    const sleeps: number[] = [];
    const outcomes: ProviderResult<string>[] = [
      failure('RateLimited', 'slow down', true),
      failure('UpstreamUnavailable', 'HTTP 503', true),
      success('ok'),
    ];
    const attemptFn = vi.fn(async (attempt: number) => outcomes[attempt - 1] ?? failure('Internal', 'unexpected'));

    const result = await retryResult(attemptFn, {
      maxAttempts: 3,
      random: () => 1,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });

    expect(result.ok && result.data).toBe('ok');
    expect(attemptFn).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([250, 500]);
  });

  it('stops at a non-retriable failure', async () => {
    const attemptFn = vi.fn(async () => failure('UpstreamRejected', 'invalid API key', false));
    const result = await retryResult(attemptFn, { maxAttempts: 3, sleep: async () => {} });
    expect(result).toEqual({ ok: false, kind: 'UpstreamRejected', message: 'invalid API key', retriable: false });
    expect(attemptFn).toHaveBeenCalledTimes(1);
  });

  it('returns the last failure once attempts are spent', async () => {
    const attemptFn = vi.fn(async (attempt: number) => failure('UpstreamUnavailable', `attempt ${attempt}`, true));
    const result = await retryResult(attemptFn, { maxAttempts: 2, sleep: async () => {} });
    expect(!result.ok && result.message).toBe('attempt 2');
    expect(attemptFn).toHaveBeenCalledTimes(2);
  });

  it('reports a Timeout when the deadline fires during backoff', async () => {
    const result = await retryResult(async () => failure('RateLimited', 'slow down', true), {
      maxAttempts: 3,
      sleep: async () => {
        throw new AbortedError();
      },
    });
    expect(result).toEqual({
      ok: false,
      kind: 'Timeout',
      message: 'deadline expired while backing off after: slow down',
      retriable: false,
    });
  });
});
