import type { CacheStore } from '../contracts/cacheStore';

interface MemoryEntry {
  value: string;
  expiresAt: number;
}

export interface MemoryCacheStoreOptions {
  now?: () => number;
  /** Expired entries are swept once the map grows past this size. */
  sweepThreshold?: number;
}

/** In-process store for single-node deployments and tests. */
export class MemoryCacheStore implements CacheStore {
  readonly name = 'memory';
  private readonly entries = new Map<string, MemoryEntry>();
  private readonly now: () => number;
  private readonly sweepThreshold: number;

  constructor(options: MemoryCacheStoreOptions = {}) {
    this.now = options.now ?? Date.now;
    this.sweepThreshold = options.sweepThreshold ?? 1000;
  }

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
    if (this.entries.size > this.sweepThreshold) this.sweep();
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async ttl(key: string): Promise<number | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    const remaining = entry.expiresAt - this.now();
    if (remaining <= 0) {
      this.entries.delete(key);
      return null;
    }
    return remaining;
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {
    this.entries.clear();
  }

  private sweep() {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) this.entries.delete(key);
    }
  }
}
