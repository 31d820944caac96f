import { describe, it, expect, beforeEach } from 'vitest';
import { CacheAnalytics, CacheInvalidator, CacheWarmer, RECOMMENDATIONS, type ResultCache } from '../src/index';
import { setup } from './fixtures';

/** Let every pending promise callback run */
const flush = () => new Promise<void>(resolve => setImmediate(resolve));

describe('CacheWarmer', () => {
  let env: ReturnType<typeof setup>;
  let warmer: CacheWarmer;

  beforeEach(() => {
    env = setup();
    warmer = new CacheWarmer(env.cache, {
      clock: env.clock,
      logger: env.logger.child('Warmer'),
      events: env.t.runtime.events,
    });
  });

  it('runs strategies by priority, skipping cached keys and logging failures', async () => {
    await env.cache.set('query:KRAS', 'cached-before');
    const loaded: string[] = [];
    warmer.addStrategy({
      name: 'trending',
      priority: 2,
      keys: ['query:TP53'],
      load: async key => {
        loaded.push(key);
        return `v:${key}`;
      },
    });
    warmer.addStrategy({
      name: 'common',
      priority: 1,
      keys: ['query:EGFR', 'query:KRAS', 'query:BRAF'],
      load: async key => {
        loaded.push(key);
        if (key === 'query:BRAF') throw new Error('upstream down');
        return `v:${key}`;
      },
    });

    const results = await warmer.warmAll();

    expect(results).toEqual([
      { strategy: 'common', warmed: 1, skipped: 1, failed: 1, durationMs: 0 },
      { strategy: 'trending', warmed: 1, skipped: 0, failed: 0, durationMs: 0 },
    ]);
    expect(loaded).toHaveLength(3);
    expect(loaded[2]).toBe('query:TP53');
    expect(env.cache.getSync('query:EGFR')).toEqual({ hit: true, value: 'v:query:EGFR' });
    expect(env.cache.getSync('query:KRAS')).toEqual({ hit: true, value: 'cached-before' });
    expect(env.logger.messages('error')).toEqual(['Failed to warm "query:BRAF"']);
    expect(env.t.eventsOf('onWarmingCompleted')).toHaveLength(2);
    expect(warmer.stats()).toEqual({
      totalKeys: 4,
      warmed: 2,
      skipped: 1,
      failed: 1,
      runs: 2,
      lastRunAt: 0,
      lastDurationMs: 0,
    });
  });

  it('never loads more keys at once than maxConcurrent', async () => {
    let inFlight = 0;
    let peak = 0;
    warmer.addStrategy({
      name: 'capped',
      maxConcurrent: 2,
      keys: ['a', 'b', 'c', 'd', 'e'],
      load: async key => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await flush();
        inFlight--;
        return key;
      },
    });

    const [result] = await warmer.warmAll();

    expect(result.warmed).toBe(5);
    expect(peak).toBe(2);
  });

  it('applies the strategy TTL to warmed entries', async () => {
    warmer.addStrategy({ name: 'short', keys: ['k'], ttlSeconds: 30, load: async () => 'v' });
    await warmer.run('short');

    env.clock.advance(30_000);
    expect(env.cache.getSync('k').hit).toBe(false);
  });

  it('re-runs periodic strategies until stopped', async () => {
    let loads = 0;
    warmer.addStrategy({
      name: 'refresh',
      schedule: 'periodic',
      intervalMs: 60_000,
      ttlSeconds: 30,
      keys: ['k'],
      load: async () => ++loads,
    });

    expect(await warmer.warmOnStartup()).toEqual([]);

    warmer.start();
    expect(warmer.running).toBe(true);

    env.clock.advance(60_000);
    await flush();
    expect(loads).toBe(1);

    env.clock.advance(60_000);
    await flush();
    expect(loads).toBe(2);

    warmer.stop();
    expect(warmer.running).toBe(false);
    expect(env.clock.pendingTimers).toBe(0);
  });

  it('rejects periodic strategies without an interval', () => {
    expect(() => warmer.addStrategy({ name: 'bad', schedule: 'periodic', keys: [], load: async () => 1 })).toThrow(
      RangeError
    );
  });

  it('rejects an unknown strategy name', async () => {
    await expect(warmer.run('missing')).rejects.toThrow('Unknown warming strategy "missing"');
  });
});

describe('CacheInvalidator', () => {
  let env: ReturnType<typeof setup>;
  let cache: ResultCache;
  let invalidator: CacheInvalidator;

  beforeEach(() => {
    env = setup();
    cache = env.cache;
    invalidator = new CacheInvalidator(cache, {
      clock: env.clock,
      logger: env.logger.child('Invalidator'),
      events: env.t.runtime.events,
    });
  });

  it('fires pattern triggers with the context substituted', async () => {
    cache.setSync('query:EGFR:1', 1);
    cache.setSync('summary:EGFR:1', 2);
    cache.setSync('query:KRAS:1', 3);
    invalidator.addTrigger('mutation_update', ['query:{context}:*', 'summary:{context}:*']);

    expect(await invalidator.fire('mutation_update', 'EGFR')).toBe(2);

    expect(cache.getSync('query:KRAS:1').hit).toBe(true);
    expect(cache.getSync('query:EGFR:1').hit).toBe(false);
    expect(invalidator.stats()).toEqual({
      total: 2,
      byPattern: 2,
      byRule: 0,
      byAge: 0,
      byHits: 0,
      lastInvalidationAt: 0,
    });
    expect(env.t.eventsOf('onInvalidation')).toEqual([{ reason: 'trigger:mutation_update', removed: 2 }]);
  });

  it('fires rule triggers and keeps going when one throws', async () => {
    cache.setSync('trial:NCT1', 'open');
    cache.setSync('page:NCT1', 'listing');
    invalidator.addTrigger('trial_closed', () => {
      throw new Error('rule broke');
    });
    invalidator.addTrigger('trial_closed', ctx => [`trial:${ctx}`, 'trial:missing']);
    invalidator.addTrigger('trial_closed', ['page:{context}']);

    expect(await invalidator.fire('trial_closed', 'NCT1')).toBe(2);
    expect(invalidator.stats().byRule).toBe(1);
    expect(invalidator.stats().byPattern).toBe(1);
    expect(env.logger.messages('error')).toEqual(['Rule for trigger "trial_closed" failed']);
  });

  it('ignores unknown triggers', async () => {
    expect(await invalidator.fire('nope')).toBe(0);
    expect(env.logger.messages('warn')).toEqual(['Unknown trigger "nope"']);
  });

  it('removes entries older than a given age', async () => {
    await cache.set('old', 1);
    env.clock.advance(120_000);
    await cache.set('new', 2);

    expect(await invalidator.invalidateOlderThan(60)).toBe(1);
    expect(cache.getSync('old').hit).toBe(false);
    expect(cache.getSync('new').hit).toBe(true);
  });

  it('evicts entries under the hit threshold', async () => {
    cache.setSync('a', 1);
    cache.setSync('b', 2);
    cache.setSync('c', 3);
    for (let i = 0; i < 3; i++) cache.getSync('a');
    cache.getSync('b');

    expect(await invalidator.evictLowHitEntries(2)).toBe(2);
    expect(cache.getSync('a').hit).toBe(true);
    expect(cache.stats().localEntries).toBe(1);
  });

  it('stops evicting once the target size is reached', async () => {
    for (const key of ['a', 'b', 'c', 'd']) cache.setSync(key, key);
    for (let i = 0; i < 3; i++) cache.getSync('a');

    expect(await invalidator.evictLowHitEntries(2, 3)).toBe(1);
    expect(cache.getSync('b').hit).toBe(false);
    expect(cache.getSync('c').hit).toBe(true);
    expect(cache.getSync('d').hit).toBe(true);
  });

  it('sweeps expired entries periodically', () => {
    cache.setSync('short', 1, 10);
    invalidator.startPeriodicSweep(30_000);

    env.clock.advance(30_000);
    expect(env.t.eventsOf('onInvalidation')).toEqual([{ reason: 'expired', removed: 1 }]);

    invalidator.stop();
    expect(env.clock.pendingTimers).toBe(0);
  });
});

describe('CacheAnalytics', () => {
  it('recommends warming and more usage for a cold cache', () => {
    const { cache } = setup();
    const analysis = new CacheAnalytics(cache).analyze();

    expect(analysis).toEqual({
      hitRate: 0,
      errorRate: 0,
      totalRequests: 0,
      efficiencyScore: 0,
      recommendations: [RECOMMENDATIONS.lowHitRate, RECOMMENDATIONS.lowUsage],
    });
  });

  it('has nothing to recommend for a busy, healthy cache', () => {
    const { cache } = setup();
    cache.setSync('query:a', 1);
    for (let i = 0; i < 100; i++) cache.getSync('query:a');

    const analysis = new CacheAnalytics(cache).analyze();
    expect(analysis.efficiencyScore).toBe(100);
    expect(analysis.recommendations).toEqual([]);
  });

  it('flags a high error rate', () => {
    const { cache } = setup();
    cache.setSync('query:a', 1);
    for (let i = 0; i < 10; i++) cache.getSync('query:a');
    for (let i = 0; i < 10; i++) cache.setSync(`bad:${i}`, { n: 1n });

    const analysis = new CacheAnalytics(cache).analyze();
    expect(analysis.errorRate).toBe(1);
    expect(analysis.efficiencyScore).toBe(0);
    expect(analysis.recommendations).toEqual([RECOMMENDATIONS.highErrorRate, RECOMMENDATIONS.lowUsage]);
  });

  it('renders a markdown report', () => {
    const { cache, clock, logger } = setup();
    const warmer = new CacheWarmer(cache, { clock, logger });
    const invalidator = new CacheInvalidator(cache, { clock, logger });
    cache.setSync('query:a', 1);
    for (let i = 0; i < 100; i++) cache.getSync('query:a');

    const lines = new CacheAnalytics(cache, warmer, invalidator).report().split('\n');

    expect(lines[0]).toBe('# Cache Performance Report');
    expect(lines).toContain('- Hit Rate: 100.00%');
    expect(lines).toContain('- Total Requests: 100');
    expect(lines).toContain('- query:*: 100.00% of 100');
    expect(lines).toContain('- Last Warming: never');
    expect(lines).toContain('- Total Invalidations: 0');
    expect(lines).toContain('- Efficiency Score: 100.0');
    expect(lines.slice(-2)).toEqual(['## Recommendations', '']);
  });
});
