import { failure, type ProviderResult } from '../contracts/results';
import { AbortedError, sleep as defaultSleep } from '../util/async';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  signal?: AbortSignal;
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onRetry?: (attempt: number, result: ProviderResult<unknown>, delayMs: number) => void;
}

/** Exponential backoff with full jitter. `attempt` is the attempt that just failed (1-based). */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number, random: () => number): number {
  const ceiling = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
  return Math.floor(random() * ceiling);
}

/**
 * Runs `attemptFn` until it succeeds, fails non-retriably, or `maxAttempts`
 * is spent. The last failure is returned as-is.
 */
export async function retryResult<T>(
  attemptFn: (attempt: number) => Promise<ProviderResult<T>>,
  options: RetryOptions,
): Promise<ProviderResult<T>> {
  const maxAttempts = Math.max(1, options.maxAttempts);
  const baseDelayMs = options.baseDelayMs ?? 250;
  const maxDelayMs = options.maxDelayMs ?? 4_000;
  const random = options.random ?? Math.random;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    const result = await attemptFn(attempt);
    if (result.ok || !result.retriable || attempt >= maxAttempts) return result;

    const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs, random);
    options.onRetry?.(attempt, result, delayMs);
    try {
      await sleep(delayMs, options.signal);
    } catch (err) {
      if (err instanceof AbortedError) {
        return failure('Timeout', `deadline expired while backing off after: ${result.message}`, false);
      }
      throw err;
    }
  }
}
