import { suspend, type Task } from '../task/task';
import { CacheRead, CacheWrite, ExecAttempt, type AttemptCalls } from '../task/suspensions';
import type { ExecSettings, NodeEnvironment } from './types';

export interface ExecStep<P, E> {
  operation: string;
  calls: (prepared: P) => AttemptCalls<E>;
  settings: ExecSettings<P, E>;
}

/**
 * Cache read, then retry-wrapped attempts, then cache write-back.
 * `onAttempt` sees each attempt number before the call.
 */
export function* execPipeline<P, E>(
  step: ExecStep<P, E>,
  prepared: P,
  env: NodeEnvironment,
  onAttempt: (attempt: number) => void
): Task<E> {
  const { settings } = step;
  const cache = settings.cache && env.cache ? { options: settings.cache, store: env.cache } : undefined;
  const key = cache?.options.key(prepared);

  if (cache && key !== undefined) {
    const lookup = yield* suspend(new CacheRead(cache.store, key));
    if (lookup.hit) {
      const decoded = cache.options.decode(lookup.value);
      if (decoded !== undefined) return decoded;
      env.logger.debug('Cached value rejected by decoder', { operation: step.operation, key });
    }
  }

  const calls = step.calls(prepared);
  const timeoutMs = settings.timeoutMs ?? env.defaultTimeoutMs;
  const permits = settings.concurrencyKey
    ? env.semaphores.get(settings.concurrencyKey, settings.concurrencyLimit)
    : undefined;
  const value = yield* env.retry.task(
    step.operation,
    attempt => {
      onAttempt(attempt);
      return suspend(new ExecAttempt(step.operation, calls, timeoutMs, permits));
    },
    {
      policy: settings.retry === false ? { maxAttempts: 1 } : settings.retry,
      circuitBreaker: settings.circuitBreaker,
    }
  );

  if (cache && key !== undefined) {
    yield* suspend(new CacheWrite(cache.store, key, value, cache.options.ttlSeconds));
  }
  return value;
}
