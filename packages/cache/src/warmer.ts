import {
  Semaphore,
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

export type WarmingSchedule = 'startup' | 'periodic' | 'on_demand';

export interface WarmingStrategy {
  name: string;
  /** Cache keys to fill */
  keys: readonly string[];
  /** Lower runs first (default: 1) */
  priority?: number;
  /** Keys loaded at once (default: 5) */
  maxConcurrent?: number;
  /** TTL for warmed entries; the cache default when omitted */
  ttlSeconds?: number;
  schedule?: WarmingSchedule;
  /** Period for `periodic` strategies */
  intervalMs?: number;
  /** Fetch the value for one key */
  load(key: string): Promise<unknown>;
}

export interface WarmingResult {
  strategy: string;
  warmed: number;
  skipped: number;
  failed: number;
  durationMs: number;
}

export interface WarmingStats {
  totalKeys: number;
  warmed: number;
  skipped: number;
  failed: number;
  runs: number;
  lastRunAt?: number;
  lastDurationMs?: number;
}

export interface CacheWarmerOptions {
  clock?: Clock;
  logger?: Logger;
  events?: ResilienceEvents;
}

type KeyOutcome = 'warmed' | 'skipped' | 'failed';

/**
 * Preloads known-hot keys into the cache.
 */
export class CacheWarmer {
  private readonly strategies = new Map<string, WarmingStrategy>();
  private readonly timers = new Map<string, () => void>();
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly events: GuardedEvents;
  private totals: WarmingStats = { totalKeys: 0, warmed: 0, skipped: 0, failed: 0, runs: 0 };

  constructor(
    private readonly cache: ResultCache,
    options?: CacheWarmerOptions
  ) {
    this.clock = options?.clock ?? systemClock;
    this.logger = options?.logger ?? createConsoleLogger({ scope: 'Warmer' });
    this.events = guardEvents(options?.events, this.logger);
  }

  addStrategy(strategy: WarmingStrategy): void {
    const maxConcurrent = strategy.maxConcurrent ?? 5;
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`Strategy "${strategy.name}": maxConcurrent must be a positive integer`);
    }
    if (strategy.schedule === 'periodic' && !(strategy.intervalMs !== undefined && strategy.intervalMs > 0)) {
      throw new RangeError(`Strategy "${strategy.name}": periodic strategies need intervalMs > 0`);
    }
    this.strategies.set(strategy.name, strategy);
    this.logger.info(`Added strategy "${strategy.name}"`, { keys: strategy.keys.length });
  }

  removeStrategy(name: string): boolean {
    this.timers.get(name)?.();
    this.timers.delete(name);
    return this.strategies.delete(name);
  }

  /** Registered strategies by ascending priority */
  list(): WarmingStrategy[] {
    return [...this.strategies.values()].sort((a, b) => (a.priority ?? 1) - (b.priority ?? 1));
  }

  /**
   * Run one strategy. Keys already cached are skipped; a key whose load
   * fails is logged and counted, the rest still run.
   */
  async warm(strategy: WarmingStrategy): Promise<WarmingResult> {
    const started = this.clock.now();
    const semaphore = new Semaphore(strategy.maxConcurrent ?? 5);
    this.logger.info(`Warming "${strategy.name}"`, { keys: strategy.keys.length });

    const outcomes = await Promise.all(
      strategy.keys.map(key => semaphore.withPermit(() => this.warmKey(strategy, key)))
    );

    const result: WarmingResult = {
      strategy: strategy.name,
      warmed: outcomes.filter(o => o === 'warmed').length,
      skipped: outcomes.filter(o => o === 'skipped').length,
      failed: outcomes.filter(o => o === 'failed').length,
      durationMs: this.clock.now() - started,
    };

    this.totals = {
      totalKeys: this.totals.totalKeys + strategy.keys.length,
      warmed: this.totals.warmed + result.warmed,
      skipped: this.totals.skipped + result.skipped,
      failed: this.totals.failed + result.failed,
      runs: this.totals.runs + 1,
      lastRunAt: this.clock.now(),
      lastDurationMs: result.durationMs,
    };

    this.logger.info(
      `Strategy "${strategy.name}" done: ${result.warmed + result.skipped}/${strategy.keys.length} cached`,
      { ...result }
    );
    this.events.onWarmingCompleted(result);
    return result;
  }

  /** Run a registered strategy by name */
  async run(name: string): Promise<WarmingResult> {
    const strategy = this.strategies.get(name);
    if (!strategy) throw new Error(`Unknown warming strategy "${name}"`);
    return this.warm(strategy);
  }

  /**
   * Every strategy, one after another by ascending priority.
   */
  async warmAll(): Promise<WarmingResult[]> {
    const results: WarmingResult[] = [];
    for (const strategy of this.list()) {
      results.push(await this.warm(strategy));
    }
    return results;
  }

  /** Strategies scheduled for `startup` (the default schedule) */
  async warmOnStartup(): Promise<WarmingResult[]> {
    const results: WarmingResult[] = [];
    for (const strategy of this.list()) {
      if ((strategy.schedule ?? 'startup') !== 'startup') continue;
      results.push(await this.warm(strategy));
    }
    return results;
  }

  /**
   * Schedule every `periodic` strategy on its interval. Idempotent.
   */
  start(): void {
    for (const strategy of this.list()) {
      if (strategy.schedule !== 'periodic' || this.timers.has(strategy.name)) continue;
      const interval = strategy.intervalMs ?? 0;
      const tick = async () => {
        try {
          await this.warm(strategy);
        } catch (err) {
          this.logger.error(`Strategy "${strategy.name}" failed`, { error: describeError(err) });
        }
        if (this.timers.has(strategy.name)) {
          this.timers.set(strategy.name, this.clock.schedule(fire, interval, { background: true }));
        }
      };
      const fire = () => void tick();
      this.timers.set(strategy.name, this.clock.schedule(fire, interval, { background: true }));
    }
  }

  stop(): void {
    for (const cancel of this.timers.values()) cancel();
    this.timers.clear();
  }

  get running(): boolean {
    return this.timers.size > 0;
  }

  stats(): WarmingStats {
    return { ...this.totals };
  }

  private async warmKey(strategy: WarmingStrategy, key: string): Promise<KeyOutcome> {
    try {
      if (await this.cache.has(key)) {
        this.logger.debug(`"${key}" already cached`);
        return 'skipped';
      }
      const value = await strategy.load(key);
      await this.cache.set(key, value, strategy.ttlSeconds);
      return 'warmed';
    } catch (err) {
      this.logger.error(`Failed to warm "${key}"`, { strategy: strategy.name, error: describeError(err) });
      return 'failed';
    }
  }
}
