import { createHash } from 'node:crypto';
import { canonicalize } from 'json-canonicalize';
import type { CacheLookup } from '@stepwise/core';

/**
 * SHA-256 hex digest of the RFC 8785 canonical JSON of `value`,
 * so equal values hash equally regardless of property order.
 */
export function fingerprint(value: unknown): string {
  return createHash('sha256').update(canonicalize(value)).digest('hex');
}

/**
 * `namespace:<fingerprint>` for a parameter object.
 *
 * @example
 * cacheKey('query', { mutation: 'EGFR L858R', page: 1 })
 */
export function cacheKey(namespace: string, params: unknown): string {
  return `${namespace}:${fingerprint(params)}`;
}

/** Minimal cache surface `cached` needs */
export interface AsyncCache {
  get(key: string): Promise<CacheLookup<unknown>>;
  set(key: string, value: unknown, ttlSeconds?: number): Promise<void>;
}

export interface CachedOptions<A extends unknown[], V> {
  /** Namespace for generated keys */
  namespace: string;
  ttlSeconds?: number;
  /** Custom key; defaults to `cacheKey(namespace, args)` */
  key?: (...args: A) => string;
  /** Turn a stored JSON value back into `V`; undefined is a miss */
  decode: (stored: unknown) => V | undefined;
}

/**
 * Memoize an async upstream call through a cache.
 * Failed calls are not cached.
 */
export function cached<A extends unknown[], V>(
  cache: AsyncCache,
  fn: (...args: A) => Promise<V>,
  options: CachedOptions<A, V>
): (...args: A) => Promise<V> {
  return async (...args: A) => {
    const key = options.key ? options.key(...args) : cacheKey(options.namespace, args);
    const lookup = await cache.get(key);
    if (lookup.hit) {
      const value = options.decode(lookup.value);
      if (value !== undefined) return value;
    }
    const value = await fn(...args);
    await cache.set(key, value, options.ttlSeconds);
    return value;
  };
}
