import { systemClock, type Clock } from '@stepwise/core';
import type { CacheBackend, SyncCacheBackend } from './backend';
import { globToRegExp } from './pattern';

interface Slot {
  raw: string;
  expiresAt: number;
}

/**
 * In-process tier. Also the fallback when the primary backend is down.
 */
export class MemoryCacheBackend implements CacheBackend, SyncCacheBackend {
  readonly name = 'memory';
  private readonly slots = new Map<string, Slot>();
  private readonly clock: Clock;

  constructor(options?: { clock?: Clock }) {
    this.clock = options?.clock ?? systemClock;
  }

  /** Stored keys, including any expired ones not yet reaped */
  get size(): number {
    return this.slots.size;
  }

  getSync(key: string): string | undefined {
    const slot = this.slots.get(key);
    if (!slot) return undefined;
    if (slot.expiresAt <= this.clock.now()) {
      this.slots.delete(key);
      return undefined;
    }
    return slot.raw;
  }

  setSync(key: string, raw: string, ttlSeconds: number): void {
    const expiresAt = ttlSeconds > 0 ? this.clock.now() + ttlSeconds * 1000 : Number.POSITIVE_INFINITY;
    // Re-insert so iteration order follows write order
    this.slots.delete(key);
    this.slots.set(key, { raw, expiresAt });
  }

  deleteSync(key: string): boolean {
    return this.slots.delete(key);
  }

  keysSync(pattern: string): string[] {
    const re = globToRegExp(pattern);
    const now = this.clock.now();
    const out: string[] = [];
    for (const [key, slot] of this.slots) {
      if (slot.expiresAt <= now) continue;
      if (re.test(key)) out.push(key);
    }
    return out;
  }

  /**
   * Drop slots whose backend TTL has passed.
   * @returns number removed
   */
  purgeExpired(): number {
    const now = this.clock.now();
    let removed = 0;
    for (const [key, slot] of this.slots) {
      if (slot.expiresAt <= now) {
        this.slots.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.slots.clear();
  }

  async get(key: string): Promise<string | undefined> {
    return this.getSync(key);
  }

  async set(key: string, raw: string, ttlSeconds: number): Promise<void> {
    this.setSync(key, raw, ttlSeconds);
  }

  async delete(key: string): Promise<boolean> {
    return this.deleteSync(key);
  }

  async keys(pattern: string): Promise<string[]> {
    return this.keysSync(pattern);
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {
    this.clear();
  }
}
