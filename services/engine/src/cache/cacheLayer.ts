import type { CacheStore } from '../contracts/cacheStore';
import { errorMessage, failure, type ProviderResult } from '../contracts/results';
import { createComponentLogger, type Logger } from '../logger';
import { abortable, AbortedError } from '../util/async';
import { deriveCacheKey, type CacheKeySpec } from './keys';

/** TTL presets in seconds, by how fast the underlying data moves. */
export const CacheTTL = {
  realtime: 30,
  short: 300,
  medium: 3600,
  long: 86400,
} as const;

export type TtlPreset = keyof typeof CacheTTL;

export type CacheEntrySource = 'cache' | 'upstream' | 'abandoned';

export interface CacheEntry<T> {
  key: string;
  value: ProviderResult<T>;
  /** Epoch ms. */
  storedAt: number;
  ttlSeconds: number;
  staleOk: boolean;
  /** Set when an expired entry was served because its refresh failed. */
  stale: boolean;
  source: CacheEntrySource;
}

export interface GetOrFetchOptions<T = unknown> {
  /** Caller deadline. Abandons the wait only; the shared fetch keeps running. */
  signal?: AbortSignal;
  /** Keep success entries this much longer and serve them if a refresh fails. */
  staleIfErrorSeconds?: number;
  /** A success this returns true for is kept only as long as a failure would be. */
  isPartial?: (data: T) => boolean;
}

export interface CacheLayerOptions {
  negativeTtlSeconds?: number;
  now?: () => number;
  logger?: Logger;
}

interface StoredRecord<T> {
  value: ProviderResult<T>;
  storedAt: number;
  ttlSeconds: number;
  staleOk: boolean;
}

interface FlightOutcome {
  raw: string;
  source: 'cache' | 'upstream';
  stale: boolean;
}

const DEFAULT_NEGATIVE_TTL_SECONDS = 30;

export function resolveTtl(ttl: number | TtlPreset): number {
  return typeof ttl === 'number' ? ttl : CacheTTL[ttl];
}

function parseRecord<T>(raw: string): StoredRecord<T> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!parsed || typeof parsed !== 'object') return null;
  if (!('value' in parsed) || !('storedAt' in parsed) || !('ttlSeconds' in parsed)) return null;
  if (typeof parsed.storedAt !== 'number' || typeof parsed.ttlSeconds !== 'number') return null;
  return parsed as StoredRecord<T>;
}

/**
 * Cache-aside access to upstream fetches.
 *
 * Concurrent callers for one key share a single in-flight fetch; the
 * registration is dropped as soon as that fetch settles so the next caller
 * after expiry starts a fresh one. Failures are cached for the shorter
 * negative TTL. Store outages degrade to pass-through.
 */
export class CacheLayer {
  private readonly inflight = new Map<string, Promise<FlightOutcome>>();
  private readonly negativeTtlSeconds: number;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(private readonly store: CacheStore, options: CacheLayerOptions = {}) {
    this.negativeTtlSeconds = options.negativeTtlSeconds ?? DEFAULT_NEGATIVE_TTL_SECONDS;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createComponentLogger('cache');
  }

  async open(): Promise<void> {
    await this.store.ping();
    this.log.info({ store: this.store.name }, 'cache store ready');
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  async ping(): Promise<void> {
    await this.store.ping();
  }

  keyFor(spec: CacheKeySpec): string {
    return deriveCacheKey(spec);
  }

  get pendingFlights(): number {
    return this.inflight.size;
  }

  async getOrFetch<T>(
    spec: CacheKeySpec,
    fetchFn: () => Promise<ProviderResult<T>>,
    ttl: number | TtlPreset,
    options: GetOrFetchOptions<T> = {},
  ): Promise<CacheEntry<T>> {
    const key = deriveCacheKey(spec);
    const ttlSeconds = resolveTtl(ttl);

    let flight = this.inflight.get(key);
    if (flight) {
      this.log.debug({ key }, 'joining in-flight fetch');
    } else {
      flight = this.runFlight(key, fetchFn, ttlSeconds, options).finally(() => {
        this.inflight.delete(key);
      });
      this.inflight.set(key, flight);
    }

    try {
      const outcome = await abortable(flight, options.signal);
      return this.toEntry<T>(key, outcome);
    } catch (err) {
      if (!(err instanceof AbortedError)) throw err;
      this.log.warn({ key, op: spec.operation }, 'caller deadline expired while waiting on fetch');
      return {
        key,
        value: failure('Timeout', `${spec.provider} ${spec.operation} exceeded the caller deadline`, true),
        storedAt: this.now(),
        ttlSeconds: 0,
        staleOk: false,
        stale: false,
        source: 'abandoned',
      };
    }
  }

  async invalidate(specOrKey: CacheKeySpec | string): Promise<boolean> {
    const key = typeof specOrKey === 'string' ? specOrKey : deriveCacheKey(specOrKey);
    try {
      return await this.store.delete(key);
    } catch (err) {
      this.log.error({ err, key }, 'cache invalidate failed');
      return false;
    }
  }

  private async runFlight<T>(
    key: string,
    fetchFn: () => Promise<ProviderResult<T>>,
    ttlSeconds: number,
    options: GetOrFetchOptions<T>,
  ): Promise<FlightOutcome> {
    const staleIfErrorSeconds = options.staleIfErrorSeconds ?? 0;
    const existingRaw = await this.readStore(key);
    let staleRaw: string | null = null;

    if (existingRaw) {
      const existing = parseRecord<T>(existingRaw);
      if (existing && this.now() < existing.storedAt + existing.ttlSeconds * 1000) {
        this.log.debug({ key }, 'cache hit');
        return { raw: existingRaw, source: 'cache', stale: false };
      }
      if (existing && existing.staleOk && existing.value.ok) staleRaw = existingRaw;
    }

    this.log.debug({ key }, 'cache miss');

    let result: ProviderResult<T>;
    try {
      result = await fetchFn();
    } catch (err) {
      this.log.error({ err, key }, 'fetch function threw');
      result = failure('UpstreamUnavailable', errorMessage(err), true);
    }

    if (!result.ok && staleRaw) {
      this.log.warn({ key, kind: result.kind }, 'refresh failed, serving stale entry');
      return { raw: staleRaw, source: 'cache', stale: true };
    }

    const complete = result.ok && options.isPartial?.(result.data) !== true;
    const effectiveTtl = complete ? ttlSeconds : Math.min(this.negativeTtlSeconds, ttlSeconds);
    const staleOk = complete && staleIfErrorSeconds > 0;
    const record: StoredRecord<T> = {
      value: result,
      storedAt: this.now(),
      ttlSeconds: effectiveTtl,
      staleOk,
    };
    const raw = JSON.stringify(record);

    const retentionSeconds = effectiveTtl + (staleOk ? staleIfErrorSeconds : 0);
    if (retentionSeconds > 0) {
      await this.writeStore(key, raw, retentionSeconds * 1000);
    }

    return { raw, source: 'upstream', stale: false };
  }

  private toEntry<T>(key: string, outcome: FlightOutcome): CacheEntry<T> {
    const record = parseRecord<T>(outcome.raw);
    if (!record) {
      // Only reachable if the store handed back something other than what we wrote.
      return {
        key,
        value: failure('Internal', 'cache record could not be decoded'),
        storedAt: this.now(),
        ttlSeconds: 0,
        staleOk: false,
        stale: false,
        source: outcome.source,
      };
    }
    return {
      key,
      value: record.value,
      storedAt: record.storedAt,
      ttlSeconds: record.ttlSeconds,
      staleOk: record.staleOk,
      stale: outcome.stale,
      source: outcome.source,
    };
  }

  private async readStore(key: string): Promise<string | null> {
    try {
      return await this.store.get(key);
    } catch (err) {
      this.log.error({ err, key }, 'cache read failed, treating as miss');
      return null;
    }
  }

  private async writeStore(key: string, raw: string, ttlMs: number): Promise<void> {
    try {
      await this.store.set(key, raw, ttlMs);
    } catch (err) {
      this.log.error({ err, key }, 'cache write failed');
    }
  }
}
