import { ConnectionError, type Clock, type StepwiseConfigInput } from '@stepwise/core';
import { TestHarness } from '@stepwise/core/test';
import { MemoryCacheBackend, createResultCache, type CacheBackend } from '../src/index';

/**
 * Primary backend that can be switched off to simulate an outage.
 */
export class FlakyBackend implements CacheBackend {
  readonly name = 'flaky';
  readonly inner: MemoryCacheBackend;
  readonly calls: string[] = [];
  down = false;

  constructor(clock: Clock) {
    this.inner = new MemoryCacheBackend({ clock });
  }

  async get(key: string): Promise<string | undefined> {
    this.check('get');
    return this.inner.get(key);
  }

  async set(key: string, raw: string, ttlSeconds: number): Promise<void> {
    this.check('set');
    return this.inner.set(key, raw, ttlSeconds);
  }

  async delete(key: string): Promise<boolean> {
    this.check('delete');
    return this.inner.delete(key);
  }

  async keys(pattern: string): Promise<string[]> {
    this.check('keys');
    return this.inner.keys(pattern);
  }

  async ping(): Promise<void> {
    this.check('ping');
  }

  private check(operation: string): void {
    this.calls.push(operation);
    if (this.down) throw new ConnectionError('connection refused');
  }
}

export interface CacheSetup {
  cache?: StepwiseConfigInput['cache'];
  /** Attach a FlakyBackend as the primary tier */
  withPrimary?: boolean;
}

export function setup(options?: CacheSetup) {
  const t = new TestHarness({ config: { cache: options?.cache } });
  const primary = options?.withPrimary ? new FlakyBackend(t.clock) : undefined;
  const cache = createResultCache(t.runtime, { primary });
  return { t, clock: t.clock, logger: t.logger, cache, primary };
}

/** Values shaped like upstream search results */
export function trialPage(mutation: string, count: number) {
  return {
    mutation,
    studies: Array.from({ length: count }, (_, i) => ({ id: `NCT${String(i + 1).padStart(8, '0')}`, phase: 'PHASE2' })),
  };
}
