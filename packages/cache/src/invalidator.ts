import {
  createConsoleLogger,
  describeError,
  guardEvents,
  systemClock,
  type Clock,
  type GuardedEvents,
  type Logger,
  type ResilienceEvents,
} from '@stepwise/core';
import type { ResultCache } from './result-cache';

/**
 * Returns the cache keys to drop for a trigger context.
 */
export type InvalidationRule = (context: string) => readonly string[] | Promise<readonly string[]>;

/**
 * Pattern templates may reference the trigger context as `{context}`,
 * e.g. `query:{context}:*`.
 */
export type InvalidationTrigger = readonly string[] | InvalidationRule;

export interface InvalidationStats {
  total: number;
  byPattern: number;
  byRule: number;
  byAge: number;
  byHits: number;
  lastInvalidationAt?: number;
}

export interface CacheInvalidatorOptions {
  clock?: Clock;
  logger?: Logger;
  events?: ResilienceEvents;
}

/**
 * Named invalidation triggers plus age- and hit-based cleanup.
 */
export class CacheInvalidator {
  private readonly triggers = new Map<string, InvalidationTrigger[]>();
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly events: GuardedEvents;
  private counts: InvalidationStats = { total: 0, byPattern: 0, byRule: 0, byAge: 0, byHits: 0 };
  private cancelSweep?: () => void;

  constructor(
    private readonly cache: ResultCache,
    options?: CacheInvalidatorOptions
  ) {
    this.clock = options?.clock ?? systemClock;
    this.logger = options?.logger ?? createConsoleLogger({ scope: 'Invalidator' });
    this.events = guardEvents(options?.events, this.logger);
  }

  /**
   * Register patterns or a rule under a trigger name. Several may share a name.
   */
  addTrigger(name: string, trigger: InvalidationTrigger): void {
    const list = this.triggers.get(name) ?? [];
    list.push(trigger);
    this.triggers.set(name, list);
    this.logger.info(`Added trigger "${name}"`);
  }

  removeTrigger(name: string): boolean {
    return this.triggers.delete(name);
  }

  /**
   * Run every pattern list and rule registered under `name`.
   * A failing rule is logged and the others still run.
   * @returns entries removed; 0 for an unknown trigger
   */
  async fire(name: string, context = ''): Promise<number> {
    const list = this.triggers.get(name);
    if (!list) {
      this.logger.warn(`Unknown trigger "${name}"`);
      return 0;
    }

    let byPattern = 0;
    let byRule = 0;
    for (const trigger of list) {
      try {
        if (typeof trigger === 'function') {
          byRule += await this.cache.invalidateKeys(await trigger(context));
        } else {
          for (const template of trigger) {
            byPattern += await this.cache.invalidatePattern(template.split('{context}').join(context));
          }
        }
      } catch (err) {
        this.logger.error(`Rule for trigger "${name}" failed`, { error: describeError(err) });
      }
    }

    this.count({ byPattern, byRule });
    this.events.onInvalidation({ reason: `trigger:${name}`, removed: byPattern + byRule });
    return byPattern + byRule;
  }

  /**
   * Remove every key matching a glob or prefix.
   */
  async invalidatePattern(pattern: string): Promise<number> {
    const removed = await this.cache.invalidatePattern(pattern);
    this.count({ byPattern: removed });
    this.events.onInvalidation({ reason: `pattern:${pattern}`, removed });
    return removed;
  }

  /**
   * Remove entries written more than `maxAgeSeconds` ago.
   */
  async invalidateOlderThan(maxAgeSeconds: number): Promise<number> {
    const cutoff = this.clock.now() - maxAgeSeconds * 1000;
    const stale = (await this.cache.entries()).filter(e => e.createdAt <= cutoff).map(e => e.key);
    const removed = await this.cache.invalidateKeys(stale);
    this.count({ byAge: removed });
    this.logger.info(`Removed ${removed} entries older than ${maxAgeSeconds}s`);
    this.events.onInvalidation({ reason: `age:${maxAgeSeconds}s`, removed });
    return removed;
  }

  /**
   * Remove entries with fewer than `minHitCount` hits, fewest first.
   * With `targetSize`, stops once that many entries remain.
   */
  async evictLowHitEntries(minHitCount = 2, targetSize?: number): Promise<number> {
    const entries = await this.cache.entries();
    const candidates = entries
      .filter(e => e.hitCount < minHitCount)
      .sort((a, b) => a.hitCount - b.hitCount || a.lastAccessedAt - b.lastAccessedAt);
    const limit = targetSize === undefined ? candidates.length : Math.max(0, entries.length - targetSize);
    const removed = await this.cache.invalidateKeys(candidates.slice(0, limit).map(e => e.key));
    this.count({ byHits: removed });
    this.logger.info(`Removed ${removed} entries under ${minHitCount} hits`);
    this.events.onInvalidation({ reason: `hits<${minHitCount}`, removed });
    return removed;
  }

  /**
   * Drop expired entries every `intervalMs`.
   * @returns stop function
   */
  startPeriodicSweep(intervalMs: number): () => void {
    if (!(intervalMs > 0)) throw new RangeError('intervalMs must be > 0');
    this.stop();
    const tick = () => {
      const removed = this.cache.sweep();
      if (removed > 0) this.events.onInvalidation({ reason: 'expired', removed });
      this.cancelSweep = this.clock.schedule(tick, intervalMs, { background: true });
    };
    this.cancelSweep = this.clock.schedule(tick, intervalMs, { background: true });
    return () => this.stop();
  }

  stop(): void {
    this.cancelSweep?.();
    this.cancelSweep = undefined;
  }

  stats(): InvalidationStats {
    return { ...this.counts };
  }

  private count(delta: Partial<Omit<InvalidationStats, 'total' | 'lastInvalidationAt'>>): void {
    const byPattern = delta.byPattern ?? 0;
    const byRule = delta.byRule ?? 0;
    const byAge = delta.byAge ?? 0;
    const byHits = delta.byHits ?? 0;
    this.counts = {
      total: this.counts.total + byPattern + byRule + byAge + byHits,
      byPattern: this.counts.byPattern + byPattern,
      byRule: this.counts.byRule + byRule,
      byAge: this.counts.byAge + byAge,
      byHits: this.counts.byHits + byHits,
      lastInvalidationAt: this.clock.now(),
    };
  }
}
