import type { CacheStore } from '../contracts/cacheStore';

const KEY_PREFIX = 'mkt:';

/** The ioredis commands the store relies on; `Redis` satisfies it. */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'PX', ttlMs: number): Promise<unknown>;
  del(key: string): Promise<number>;
  pttl(key: string): Promise<number>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
}

export class RedisCacheStore implements CacheStore {
  readonly name = 'redis';

  constructor(private readonly redis: RedisCommands) {}

  async get(key: string): Promise<string | null> {
    return this.redis.get(this.prefixed(key));
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    await this.redis.set(this.prefixed(key), value, 'PX', Math.max(1, Math.ceil(ttlMs)));
  }

  async delete(key: string): Promise<boolean> {
    const removed = await this.redis.del(this.prefixed(key));
    return removed > 0;
  }

  async ttl(key: string): Promise<number | null> {
    const ttl = await this.redis.pttl(this.prefixed(key));
    if (ttl === -2) return null; // missing
    if (ttl === -1) return -1;   // no ttl set
    return ttl;
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }

  private prefixed(key: string) {
    return key.startsWith(KEY_PREFIX) ? key : `${KEY_PREFIX}${key}`;
  }
}
