import { CacheBackendError } from '@stepwise/core';
import type { CacheBackend } from '@stepwise/cache';

/**
 * The slice of the node-redis client the cache backend uses.
 */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, options?: { EX: number }): Promise<unknown>;
  del(key: string): Promise<number>;
  scan(cursor: number, options: { MATCH: string; COUNT: number }): Promise<{ cursor: number; keys: string[] }>;
  ping(): Promise<unknown>;
  quit(): Promise<unknown>;
}

/**
 * Escape Redis glob metacharacters our patterns do not use.
 * `*` and `?` pass through.
 */
export function toRedisMatch(glob: string): string {
  return glob.replace(/[[\]\\]/g, '\\$&');
}

export interface RedisCacheBackendOptions {
  /** Keys fetched per SCAN round trip (default: 100) */
  scanCount?: number;
}

/**
 * Networked cache tier. Every command failure surfaces as a CacheBackendError.
 */
export class RedisCacheBackend implements CacheBackend {
  readonly name = 'redis';
  private readonly scanCount: number;

  constructor(
    private readonly redis: RedisCommands,
    options?: RedisCacheBackendOptions
  ) {
    this.scanCount = options?.scanCount ?? 100;
  }

  async get(key: string): Promise<string | undefined> {
    const raw = await this.call('get', () => this.redis.get(key));
    return raw ?? undefined;
  }

  async set(key: string, raw: string, ttlSeconds: number): Promise<void> {
    await this.call('set', () =>
      ttlSeconds > 0 ? this.redis.set(key, raw, { EX: Math.ceil(ttlSeconds) }) : this.redis.set(key, raw)
    );
  }

  async delete(key: string): Promise<boolean> {
    return (await this.call('delete', () => this.redis.del(key))) > 0;
  }

  async keys(pattern: string): Promise<string[]> {
    const match = toRedisMatch(pattern);
    const found = new Set<string>();
    await this.call('keys', async () => {
      let cursor = 0;
      do {
        const reply = await this.redis.scan(cursor, { MATCH: match, COUNT: this.scanCount });
        for (const key of reply.keys) found.add(key);
        cursor = reply.cursor;
      } while (cursor !== 0);
    });
    return [...found];
  }

  async ping(): Promise<void> {
    await this.call('ping', () => this.redis.ping());
  }

  async close(): Promise<void> {
    await this.call('close', () => this.redis.quit());
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new CacheBackendError(this.name, operation, err);
    }
  }
}
