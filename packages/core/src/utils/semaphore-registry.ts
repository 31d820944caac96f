import type { Logger } from '../interfaces/logger';
import { Semaphore } from './semaphore';

export interface SemaphoreInfo {
  key: string;
  permits: number;
  inUse: number;
  pending: number;
  peak: number;
}

/**
 * Named semaphores shared by everything that calls the same service.
 * The first `get` for a key fixes its limit until `reset`.
 */
export class SemaphoreRegistry {
  private readonly semaphores = new Map<string, Semaphore>();

  constructor(
    private readonly defaultLimit: number,
    private readonly logger?: Logger
  ) {}

  get(key: string, limit?: number): Semaphore {
    let semaphore = this.semaphores.get(key);
    if (!semaphore) {
      semaphore = new Semaphore(limit ?? this.defaultLimit);
      this.semaphores.set(key, semaphore);
      this.logger?.debug(`Created semaphore "${key}"`, { permits: semaphore.permits });
    }
    return semaphore;
  }

  info(): SemaphoreInfo[] {
    return [...this.semaphores].map(([key, s]) => ({
      key,
      permits: s.permits,
      inUse: s.inUse,
      pending: s.pending,
      peak: s.peak,
    }));
  }

  /**
   * Forget a semaphore so the next `get` creates it afresh.
   * Holders of the old one keep it until they release.
   */
  reset(key: string): boolean {
    return this.semaphores.delete(key);
  }

  clear(): void {
    this.semaphores.clear();
  }
}
