export type CacheLookup<V> = { hit: true; value: V } | { hit: false };

/**
 * Cache surface the engine reads through and writes back to.
 * Implementations must not throw for backend failures; a failed read is a miss.
 */
export interface FlowCache {
  get(key: string): Promise<CacheLookup<unknown>>;
  getSync(key: string): CacheLookup<unknown>;
  set(key: string, value: unknown, ttlSeconds?: number): Promise<void>;
  setSync(key: string, value: unknown, ttlSeconds?: number): void;
}
