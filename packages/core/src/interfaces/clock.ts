export interface ScheduleOptions {
  /** Do not keep the process alive for this timer (default: false) */
  background?: boolean;
}

/**
 * Source of time for every component.
 * Injected so breakers, TTLs and backoff can run against simulated time.
 */
export interface Clock {
  /** Milliseconds since epoch */
  now(): number;

  /**
   * Wait without blocking the event loop.
   * Rejects with the signal's reason if it aborts first.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;

  /** Block the calling thread. Used only by the synchronous driver. */
  sleepSync(ms: number): void;

  /**
   * Run `fn` after `ms`.
   * @returns cancel function
   */
  schedule(fn: () => void, ms: number, options?: ScheduleOptions): () => void;
}
