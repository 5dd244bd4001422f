/**
 * Key-value boundary the cache layer sits on. Implementations must honor an
 * independent TTL per key; eviction beyond TTL expiry is not required.
 */
export interface CacheStore {
  readonly name: string;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlMs: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  /** Remaining TTL in ms, `-1` when the key never expires, `null` when missing. */
  ttl(key: string): Promise<number | null>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
