import type { Clock, ScheduleOptions } from '../interfaces/clock';

let blocker: Int32Array | undefined;

/**
 * Wall-clock time backed by timers.
 */
export const systemClock: Clock = {
  now(): number {
    return Date.now();
  },

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(signal?.reason);
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, Math.max(0, ms));
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  },

  sleepSync(ms: number): void {
    if (ms <= 0) return;
    blocker ??= new Int32Array(new SharedArrayBuffer(4));
    Atomics.wait(blocker, 0, 0, ms);
  },

  schedule(fn: () => void, ms: number, options?: ScheduleOptions): () => void {
    const timer = setTimeout(fn, Math.max(0, ms));
    if (options?.background) timer.unref();
    return () => clearTimeout(timer);
  },
};
