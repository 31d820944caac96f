import {
  createConsoleLogger,
  describeError,
  guardEvents,
  systemClock,
  type CacheConfig,
  type CacheLookup,
  type Clock,
  type FlowCache,
  type GuardedEvents,
  type Logger,
  type MetricsCollector,
  type ResilienceEvents,
  type ResilienceRuntime,
} from '@stepwise/core';
import type { CacheBackend } from './backend';
import {
  createEntry,
  decodeEntry,
  encodeEntry,
  isExpired,
  remainingTtlSeconds,
  touch,
  type CacheEntry,
} from './entry';
import { KeyedMutex } from './keyed-mutex';
import { MemoryCacheBackend } from './memory-backend';
import { namespaceOf, toGlob } from './pattern';

export type ResultCacheSettings = Omit<CacheConfig, 'redisUrl'>;

export interface ResultCacheOptions extends Partial<ResultCacheSettings> {
  /** Networked tier. Without one, the cache is local only. */
  primary?: CacheBackend;
  /** In-process tier (default: a fresh MemoryCacheBackend) */
  local?: MemoryCacheBackend;
  clock?: Clock;
  logger?: Logger;
  events?: ResilienceEvents;
  metrics?: MetricsCollector;
}

export const DEFAULT_CACHE_SETTINGS: ResultCacheSettings = {
  defaultTtlSeconds: 3600,
  maxEntries: 1000,
  keyPrefix: 'stepwise',
  healthCheckIntervalMs: 30_000,
  sweepIntervalMs: 60_000,
  analyticsWindowMs: 300_000,
};

export interface PatternStats {
  hits: number;
  misses: number;
  hitRate: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  sets: number;
  deletes: number;
  errors: number;
  invalidations: number;
  evictions: number;
  expirations: number;
  totalRequests: number;
  /** Lifetime hit rate */
  hitRate: number;
  /** Hit rate over the last `analyticsWindowMs` */
  windowHitRate: number;
  windowRequests: number;
  /** Lookups per key namespace, e.g. `query:*` */
  byPattern: Record<string, PatternStats>;
  degraded: boolean;
  primary?: string;
  localEntries: number;
}

interface Counters {
  hits: number;
  misses: number;
  sets: number;
  deletes: number;
  errors: number;
  invalidations: number;
  evictions: number;
  expirations: number;
}

/** Share of `maxEntries` freed beyond the overflow on each eviction pass */
const EVICTION_HEADROOM = 0.1;

function zeroCounters(): Counters {
  return { hits: 0, misses: 0, sets: 0, deletes: 0, errors: 0, invalidations: 0, evictions: 0, expirations: 0 };
}

function rate(hits: number, total: number): number {
  return total === 0 ? 0 : hits / total;
}

/**
 * Two-tier TTL cache for upstream results.
 *
 * Reads go to the primary backend while it is healthy and fall back to the
 * local tier otherwise. Every entry written or read through the primary is
 * mirrored locally, so synchronous runs (which only see the local tier) find
 * it too. Backend failures are counted and logged, never thrown.
 *
 * Deletes and invalidations the primary misses (degraded mode, a failed call,
 * or a sync call) are queued and replayed before the primary serves again.
 */
export class ResultCache implements FlowCache {
  readonly settings: ResultCacheSettings;
  private readonly primary?: CacheBackend;
  private readonly local: MemoryCacheBackend;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly events: GuardedEvents;
  private readonly metrics?: MetricsCollector;
  private readonly mutex = new KeyedMutex();

  private counters = zeroCounters();
  private patterns = new Map<string, { hits: number; misses: number }>();
  private window: Array<{ at: number; hit: boolean }> = [];

  private degradedSince?: number;
  private nextProbeAt = 0;
  /** Invalidations the primary has not applied yet (storage keys and globs) */
  private readonly pendingKeys = new Set<string>();
  private readonly pendingGlobs = new Set<string>();
  private cancelSweep?: () => void;

  constructor(options: ResultCacheOptions = {}) {
    const { primary, local, clock, logger, events, metrics, ...settings } = options;
    this.settings = { ...DEFAULT_CACHE_SETTINGS, ...settings };
    this.primary = primary;
    this.clock = clock ?? systemClock;
    this.local = local ?? new MemoryCacheBackend({ clock: this.clock });
    this.logger = logger ?? createConsoleLogger({ scope: 'Cache' });
    this.events = guardEvents(events, this.logger);
    this.metrics = metrics;
  }

  /** True while the primary backend is considered down */
  get degraded(): boolean {
    return this.degradedSince !== undefined;
  }

  // ── Reads ─────────────────────────────────────────────────────────

  async get(key: string): Promise<CacheLookup<unknown>> {
    const storageKey = this.storageKey(key);
    let entry: CacheEntry | undefined;
    try {
      entry = await this.mutex.run(storageKey, async () => {
        const primary = await this.healthyPrimary();
        if (primary) {
          try {
            const found = await this.readTier(primary, storageKey);
            if (found) {
              this.mirror(storageKey, found);
              return found;
            }
          } catch (err) {
            this.primaryFailed('get', err);
          }
        }
        return this.readLocal(storageKey);
      });
    } catch (err) {
      this.recordError('get', err);
    }
    return this.recordLookup(key, entry);
  }

  /** Local tier only */
  getSync(key: string): CacheLookup<unknown> {
    let entry: CacheEntry | undefined;
    try {
      entry = this.readLocal(this.storageKey(key));
    } catch (err) {
      this.recordError('get', err);
    }
    return this.recordLookup(key, entry);
  }

  /**
   * Whether a live entry exists, without counting a lookup or a hit.
   */
  async has(key: string): Promise<boolean> {
    const storageKey = this.storageKey(key);
    const primary = await this.healthyPrimary();
    if (primary) {
      try {
        const entry = this.liveEntry(await primary.get(storageKey));
        if (entry) return true;
      } catch (err) {
        this.primaryFailed('get', err);
      }
    }
    return this.liveEntry(this.local.getSync(storageKey)) !== undefined;
  }

  /**
   * Live entries whose key matches `pattern` (glob or prefix).
   * Primary entries win over local copies.
   */
  async entries(pattern = '*'): Promise<CacheEntry[]> {
    const glob = this.storageKey(toGlob(pattern));
    const found = new Map<string, CacheEntry>();
    for (const storageKey of this.local.keysSync(glob)) {
      const entry = this.liveEntry(this.local.getSync(storageKey));
      if (entry) found.set(storageKey, entry);
    }
    const primary = await this.healthyPrimary();
    if (primary) {
      try {
        for (const storageKey of await primary.keys(glob)) {
          const entry = this.liveEntry(await primary.get(storageKey));
          if (entry) found.set(storageKey, entry);
        }
      } catch (err) {
        this.primaryFailed('keys', err);
      }
    }
    return [...found.values()];
  }

  // ── Writes ────────────────────────────────────────────────────────

  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    const ttl = ttlSeconds ?? this.settings.defaultTtlSeconds;
    const storageKey = this.storageKey(key);
    let raw: string;
    try {
      raw = encodeEntry(createEntry(key, value, ttl, this.clock.now()));
    } catch (err) {
      this.recordError('set', err);
      return;
    }
    try {
      await this.mutex.run(storageKey, async () => {
        const primary = await this.healthyPrimary();
        if (primary) {
          try {
            await primary.set(storageKey, raw, ttl);
          } catch (err) {
            this.primaryFailed('set', err);
          }
        }
        this.writeLocal(storageKey, raw, ttl);
      });
      this.counters.sets++;
    } catch (err) {
      this.recordError('set', err);
    }
  }

  /** Local tier only */
  setSync(key: string, value: unknown, ttlSeconds?: number): void {
    const ttl = ttlSeconds ?? this.settings.defaultTtlSeconds;
    try {
      const raw = encodeEntry(createEntry(key, value, ttl, this.clock.now()));
      this.writeLocal(this.storageKey(key), raw, ttl);
      this.counters.sets++;
    } catch (err) {
      this.recordError('set', err);
    }
  }

  async delete(key: string): Promise<boolean> {
    const storageKey = this.storageKey(key);
    let removed = this.local.deleteSync(storageKey);
    const primary = await this.healthyPrimary();
    if (primary) {
      try {
        removed = (await primary.delete(storageKey)) || removed;
      } catch (err) {
        this.primaryFailed('delete', err);
        this.pendingKeys.add(storageKey);
      }
    } else if (this.primary) {
      this.pendingKeys.add(storageKey);
    }
    if (removed) this.counters.deletes++;
    return removed;
  }

  /** Local tier now, the primary on its next use */
  deleteSync(key: string): boolean {
    const storageKey = this.storageKey(key);
    const removed = this.local.deleteSync(storageKey);
    if (this.primary) this.pendingKeys.add(storageKey);
    if (removed) this.counters.deletes++;
    return removed;
  }

  /**
   * Remove every key matching a glob (`*`, `?`) or a plain prefix.
   * @returns number of distinct keys removed
   */
  async invalidatePattern(pattern: string): Promise<number> {
    const glob = this.storageKey(toGlob(pattern));
    const keys = new Set(this.local.keysSync(glob));
    for (const key of keys) this.local.deleteSync(key);

    const primary = await this.healthyPrimary();
    if (primary) {
      try {
        for (const key of await primary.keys(glob)) {
          await primary.delete(key);
          keys.add(key);
        }
      } catch (err) {
        this.primaryFailed('invalidate', err);
        this.pendingGlobs.add(glob);
      }
    } else if (this.primary) {
      this.pendingGlobs.add(glob);
    }
    this.noteInvalidated(pattern, keys.size);
    return keys.size;
  }

  /** Local tier now, the primary on its next use */
  invalidatePatternSync(pattern: string): number {
    const glob = this.storageKey(toGlob(pattern));
    const keys = this.local.keysSync(glob);
    for (const key of keys) this.local.deleteSync(key);
    if (this.primary) this.pendingGlobs.add(glob);
    this.noteInvalidated(pattern, keys.length);
    return keys.length;
  }

  /**
   * Remove specific keys from both tiers.
   * @returns number of keys that existed
   */
  async invalidateKeys(keys: readonly string[]): Promise<number> {
    let removed = 0;
    for (const key of keys) {
      if (await this.delete(key)) removed++;
    }
    this.counters.invalidations += removed;
    return removed;
  }

  // ── Maintenance ───────────────────────────────────────────────────

  /**
   * Drop expired entries from the local tier.
   * @returns number removed
   */
  sweep(): number {
    let removed = this.local.purgeExpired();
    const now = this.clock.now();
    for (const storageKey of this.local.keysSync(this.storageKey('*'))) {
      const raw = this.local.getSync(storageKey);
      const entry = raw === undefined ? undefined : decodeEntry(raw);
      if (!entry || isExpired(entry, now)) {
        this.local.deleteSync(storageKey);
        removed++;
      }
    }
    this.counters.expirations += removed;
    if (removed > 0) this.logger.debug(`Swept ${removed} expired entries`);
    return removed;
  }

  /**
   * Run `sweep` (and a primary health check) every `intervalMs`.
   * @returns stop function
   */
  startSweeper(intervalMs = this.settings.sweepIntervalMs): () => void {
    this.stopSweeper();
    const tick = () => {
      this.sweep();
      if (this.primary) {
        this.checkHealth().catch((err: unknown) => this.logger.error('Health check failed', { error: describeError(err) }));
      }
      this.cancelSweep = this.clock.schedule(tick, intervalMs, { background: true });
    };
    this.cancelSweep = this.clock.schedule(tick, intervalMs, { background: true });
    return () => this.stopSweeper();
  }

  stopSweeper(): void {
    this.cancelSweep?.();
    this.cancelSweep = undefined;
  }

  /**
   * Ping the primary. Enters or leaves degraded mode accordingly.
   * @returns whether the primary is usable
   */
  async checkHealth(): Promise<boolean> {
    const primary = this.primary;
    if (!primary) return false;
    try {
      await primary.ping();
    } catch (err) {
      if (this.degradedSince === undefined) {
        this.primaryFailed('ping', err);
      } else {
        this.nextProbeAt = this.clock.now() + this.settings.healthCheckIntervalMs;
      }
      return false;
    }
    if (!(await this.flushPending(primary))) return false;
    this.recover();
    return true;
  }

  async close(): Promise<void> {
    this.stopSweeper();
    if (this.primary?.close) {
      try {
        await this.primary.close();
      } catch (err) {
        this.logger.warn(`Closing "${this.primary.name}" failed`, { error: describeError(err) });
      }
    }
  }

  // ── Stats ─────────────────────────────────────────────────────────

  stats(): CacheStats {
    const c = this.counters;
    const total = c.hits + c.misses;
    this.pruneWindow();
    const windowHits = this.window.filter(l => l.hit).length;
    const byPattern: Record<string, PatternStats> = {};
    for (const [pattern, p] of [...this.patterns].sort(([a], [b]) => a.localeCompare(b))) {
      byPattern[pattern] = { hits: p.hits, misses: p.misses, hitRate: rate(p.hits, p.hits + p.misses) };
    }
    return {
      ...c,
      totalRequests: total,
      hitRate: rate(c.hits, total),
      windowHitRate: rate(windowHits, this.window.length),
      windowRequests: this.window.length,
      byPattern,
      degraded: this.degraded,
      primary: this.primary?.name,
      localEntries: this.local.size,
    };
  }

  resetStats(): void {
    this.counters = zeroCounters();
    this.patterns = new Map();
    this.window = [];
  }

  // ── Internals ─────────────────────────────────────────────────────

  private storageKey(key: string): string {
    return `${this.settings.keyPrefix}:${key}`;
  }

  private liveEntry(raw: string | undefined): CacheEntry | undefined {
    if (raw === undefined) return undefined;
    const entry = decodeEntry(raw);
    if (!entry || isExpired(entry, this.clock.now())) return undefined;
    return entry;
  }

  private async readTier(backend: CacheBackend, storageKey: string): Promise<CacheEntry | undefined> {
    const raw = await backend.get(storageKey);
    if (raw === undefined) return undefined;
    const now = this.clock.now();
    const entry = decodeEntry(raw);
    if (!entry || isExpired(entry, now)) {
      await backend.delete(storageKey);
      if (entry) this.counters.expirations++;
      return undefined;
    }
    const touched = touch(entry, now);
    await backend.set(storageKey, encodeEntry(touched), remainingTtlSeconds(entry, now));
    return touched;
  }

  private readLocal(storageKey: string): CacheEntry | undefined {
    const raw = this.local.getSync(storageKey);
    if (raw === undefined) return undefined;
    const now = this.clock.now();
    const entry = decodeEntry(raw);
    if (!entry || isExpired(entry, now)) {
      this.local.deleteSync(storageKey);
      if (entry) this.counters.expirations++;
      return undefined;
    }
    const touched = touch(entry, now);
    this.local.setSync(storageKey, encodeEntry(touched), remainingTtlSeconds(entry, now));
    return touched;
  }

  private mirror(storageKey: string, entry: CacheEntry): void {
    this.writeLocal(storageKey, encodeEntry(entry), remainingTtlSeconds(entry, this.clock.now()));
  }

  private writeLocal(storageKey: string, raw: string, ttlSeconds: number): void {
    this.local.setSync(storageKey, raw, ttlSeconds);
    this.enforceCapacity(storageKey);
  }

  /**
   * Evict the least-hit local entries (oldest access first on ties) once the
   * tier exceeds `maxEntries`, down to 10% below it so the scan runs once per
   * batch of writes. The entry just written is never the victim.
   */
  private enforceCapacity(protect: string): void {
    const { maxEntries } = this.settings;
    if (this.local.size <= maxEntries) return;
    this.local.purgeExpired();
    if (this.local.size <= maxEntries) return;
    const excess = this.local.size - maxEntries + Math.floor(maxEntries * EVICTION_HEADROOM);

    const candidates: Array<{ key: string; hits: number; lastAccessedAt: number }> = [];
    for (const key of this.local.keysSync('*')) {
      if (key === protect) continue;
      const raw = this.local.getSync(key);
      const entry = raw === undefined ? undefined : decodeEntry(raw);
      candidates.push({ key, hits: entry ? entry.hitCount : -1, lastAccessedAt: entry ? entry.lastAccessedAt : 0 });
    }
    candidates.sort((a, b) => a.hits - b.hits || a.lastAccessedAt - b.lastAccessedAt);

    const victims = candidates.slice(0, excess);
    for (const victim of victims) this.local.deleteSync(victim.key);
    this.counters.evictions += victims.length;
    this.metrics?.increment('cache_evictions_total', undefined, victims.length);
    this.logger.debug(`Evicted ${victims.length} entries over capacity`, { maxEntries });
  }

  private recordLookup(key: string, entry: CacheEntry | undefined): CacheLookup<unknown> {
    const hit = entry !== undefined;
    if (hit) this.counters.hits++;
    else this.counters.misses++;

    const namespace = namespaceOf(key);
    const p = this.patterns.get(namespace) ?? { hits: 0, misses: 0 };
    if (hit) p.hits++;
    else p.misses++;
    this.patterns.set(namespace, p);

    this.window.push({ at: this.clock.now(), hit });
    this.pruneWindow();
    this.metrics?.increment('cache_requests_total', { result: hit ? 'hit' : 'miss' });

    return entry ? { hit: true, value: entry.value } : { hit: false };
  }

  private pruneWindow(): void {
    const cutoff = this.clock.now() - this.settings.analyticsWindowMs;
    let drop = 0;
    while (drop < this.window.length && this.window[drop].at <= cutoff) drop++;
    if (drop > 0) this.window.splice(0, drop);
  }

  private noteInvalidated(pattern: string, removed: number): void {
    this.counters.invalidations += removed;
    this.logger.info(`Invalidated ${removed} entries matching "${pattern}"`);
  }

  private recordError(operation: string, err: unknown): void {
    this.counters.errors++;
    this.metrics?.increment('cache_errors_total', { operation });
    this.logger.error(`Cache ${operation} failed`, { error: describeError(err) });
  }

  private async healthyPrimary(): Promise<CacheBackend | undefined> {
    const primary = this.primary;
    if (!primary) return undefined;
    if (this.degradedSince !== undefined) {
      if (this.clock.now() < this.nextProbeAt) return undefined;
      return (await this.checkHealth()) ? primary : undefined;
    }
    return (await this.flushPending(primary)) ? primary : undefined;
  }

  /**
   * Replay queued invalidations on the primary. What fails stays queued.
   * @returns whether the queue is empty
   */
  private async flushPending(primary: CacheBackend): Promise<boolean> {
    const queued = this.pendingKeys.size + this.pendingGlobs.size;
    if (queued === 0) return true;
    try {
      for (const storageKey of [...this.pendingKeys]) {
        await primary.delete(storageKey);
        this.pendingKeys.delete(storageKey);
      }
      for (const glob of [...this.pendingGlobs]) {
        for (const storageKey of await primary.keys(glob)) await primary.delete(storageKey);
        this.pendingGlobs.delete(glob);
      }
    } catch (err) {
      this.primaryFailed('invalidate', err);
      return false;
    }
    this.logger.info(`Replayed ${queued} invalidation(s) on "${primary.name}"`);
    return true;
  }

  private primaryFailed(operation: string, err: unknown): void {
    this.counters.errors++;
    this.metrics?.increment('cache_errors_total', { operation });
    const now = this.clock.now();
    this.nextProbeAt = now + this.settings.healthCheckIntervalMs;
    if (this.degradedSince !== undefined) return;

    this.degradedSince = now;
    const backend = this.primary?.name ?? 'primary';
    const error = describeError(err);
    this.logger.warn(`Backend "${backend}" unavailable, serving from local tier`, { operation, error });
    this.metrics?.setGauge('cache_degraded', 1);
    this.events.onCacheDegraded({ backend, error });
  }

  private recover(): void {
    const since = this.degradedSince;
    if (since === undefined) return;
    this.degradedSince = undefined;
    const backend = this.primary?.name ?? 'primary';
    const degradedForMs = this.clock.now() - since;
    this.logger.info(`Backend "${backend}" recovered`, { degradedForMs });
    this.metrics?.setGauge('cache_degraded', 0);
    this.events.onCacheRecovered({ backend, degradedForMs });
  }
}

/**
 * Build a cache from the runtime's configuration and attach it, so cached
 * nodes use it and `runtime.shutdown()` closes it.
 */
export function createResultCache(
  runtime: ResilienceRuntime,
  options?: { primary?: CacheBackend; local?: MemoryCacheBackend }
): ResultCache {
  const { redisUrl: _redisUrl, ...settings } = runtime.config.cache;
  const cache = new ResultCache({
    ...settings,
    primary: options?.primary,
    local: options?.local,
    clock: runtime.clock,
    logger: runtime.logger.child('Cache'),
    events: runtime.events,
    metrics: runtime.metrics,
  });
  runtime.attachCache(cache);
  return cache;
}
