/**
 * Storage protocol for cache tiers.
 * Values are opaque strings; expiry bookkeeping lives in the encoded entry.
 */
export interface CacheBackend {
  /** Short name used in logs, events and errors */
  readonly name: string;

  get(key: string): Promise<string | undefined>;

  /**
   * Store `raw` under `key`. A `ttlSeconds` of 0 or less keeps it until deleted.
   */
  set(key: string, raw: string, ttlSeconds: number): Promise<void>;

  /** @returns whether the key existed */
  delete(key: string): Promise<boolean>;

  /** Keys matching a glob (`*` and `?`) */
  keys(pattern: string): Promise<string[]>;

  /** Rejects when the backend is unreachable */
  ping(): Promise<void>;

  close?(): Promise<void>;
}

/**
 * Synchronous twin of {@link CacheBackend}, offered by in-process tiers.
 */
export interface SyncCacheBackend {
  getSync(key: string): string | undefined;
  setSync(key: string, raw: string, ttlSeconds: number): void;
  deleteSync(key: string): boolean;
  keysSync(pattern: string): string[];
}
