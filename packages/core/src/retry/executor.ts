import type { Clock } from '../interfaces/clock';
import type { Logger } from '../interfaces/logger';
import { guardEvents, type GuardedEvents } from '../interfaces/event-bus';
import { systemClock } from '../impl/system-clock';
import { silentLogger } from '../impl/console-logger';
import type { CircuitBreakerRegistry } from '../circuit-breaker/registry';
import type { CircuitBreakerConfig, CircuitTicket } from '../circuit-breaker/types';
import type { MetricsCollector } from '../metrics/collector';
import { CircuitOpenError, RetryExhaustedError, describeError } from '../types/errors';
import { driveAsync, driveSync, suspend, type Task } from '../task/task';
import { ExecAttempt, Sleep, type AsyncCall, type SyncCall } from '../task/suspensions';
import { backoffDelay, createRetryPolicy, DEFAULT_RETRY_POLICY, type RetryPolicy } from './policy';

export interface RetryExecutorOptions {
  policy?: Partial<RetryPolicy>;
  breakers?: CircuitBreakerRegistry;
  metrics?: MetricsCollector;
  logger?: Logger;
  events?: GuardedEvents;
  clock?: Clock;
  /** Source for jitter, returns [0, 1) (default: Math.random) */
  random?: () => number;
}

export interface RetryOptions {
  policy?: Partial<RetryPolicy>;
  /** Breaker overrides, or false to bypass the breaker */
  circuitBreaker?: Partial<CircuitBreakerConfig> | false;
}

export interface ExecuteOptions extends RetryOptions {
  /** Per-attempt deadline, 0 for none (default: 0) */
  timeoutMs?: number;
  /** Interrupts backoff sleeps */
  signal?: AbortSignal;
}

/**
 * Runs an operation under retry with exponential backoff,
 * consulting the operation's circuit breaker before every attempt.
 */
export class RetryExecutor {
  readonly policy: RetryPolicy;
  private readonly breakers?: CircuitBreakerRegistry;
  private readonly metrics?: MetricsCollector;
  private readonly logger: Logger;
  private readonly events: GuardedEvents;
  private readonly clock: Clock;
  private readonly random: () => number;

  constructor(options?: RetryExecutorOptions) {
    this.policy = createRetryPolicy(options?.policy, DEFAULT_RETRY_POLICY);
    this.breakers = options?.breakers;
    this.metrics = options?.metrics;
    this.logger = options?.logger ?? silentLogger;
    this.clock = options?.clock ?? systemClock;
    this.events = options?.events ?? guardEvents(undefined, this.logger);
    this.random = options?.random ?? Math.random;
  }

  /**
   * Retry loop as a task, for composition inside a larger task.
   * `makeAttempt` receives the 1-based attempt number.
   */
  *task<T>(operation: string, makeAttempt: (attempt: number) => Task<T>, options?: RetryOptions): Task<T> {
    const policy = options?.policy ? createRetryPolicy(options.policy, this.policy) : this.policy;
    const breaker =
      options?.circuitBreaker === false ? undefined : this.breakers?.get(operation, options?.circuitBreaker);

    for (let attempt = 1; ; attempt++) {
      let ticket: CircuitTicket | undefined;
      if (breaker) {
        const admission = breaker.tryAcquire();
        if (!admission.allowed) {
          this.logger.debug(`Circuit open for "${operation}", not attempting`, { attempt });
          throw new CircuitOpenError(operation, admission.retryAfterMs, attempt - 1);
        }
        ticket = admission.ticket;
      }

      const timer = this.metrics?.timer('retry_attempt', { operation });
      try {
        const value = yield* makeAttempt(attempt);
        breaker?.recordSuccess(ticket);
        timer?.stop('success');
        return value;
      } catch (err) {
        breaker?.recordFailure(err, ticket);
        if (!policy.isRetryable(err)) {
          timer?.stop('failure');
          throw err;
        }
        if (attempt >= policy.maxAttempts) {
          timer?.stop('retry_exhausted');
          this.logger.warn(`"${operation}" exhausted ${attempt} attempt(s)`, { error: describeError(err) });
          throw new RetryExhaustedError(operation, attempt, err);
        }
        timer?.stop('failure');
        if (breaker?.state === 'open') {
          this.logger.debug(`Circuit opened for "${operation}", not retrying`, { attempt });
          throw new CircuitOpenError(operation, breaker.retryAfterMs, attempt);
        }
        const delayMs = backoffDelay(policy, attempt, this.random);
        this.logger.debug(`"${operation}" attempt ${attempt} failed, retrying in ${Math.round(delayMs)}ms`, {
          error: describeError(err),
        });
        this.events.onRetry({
          operation,
          attempt,
          maxAttempts: policy.maxAttempts,
          delayMs,
          error: describeError(err),
        });
        yield* suspend(new Sleep(delayMs));
      }
    }
  }

  /**
   * Call an async upstream operation under retry.
   */
  execute<T>(operation: string, fn: AsyncCall<T>, options?: ExecuteOptions): Promise<T> {
    const timeoutMs = options?.timeoutMs ?? 0;
    const task = this.task(operation, () => suspend(new ExecAttempt(operation, { async: fn }, timeoutMs)), options);
    return driveAsync(task, { clock: this.clock, logger: this.logger, signal: options?.signal });
  }

  /**
   * Call a blocking upstream operation under retry. Backoff blocks the thread.
   */
  executeSync<T>(operation: string, fn: SyncCall<T>, options?: Omit<ExecuteOptions, 'signal'>): T {
    const timeoutMs = options?.timeoutMs ?? 0;
    const task = this.task(operation, () => suspend(new ExecAttempt(operation, { sync: fn }, timeoutMs)), options);
    return driveSync(task, { clock: this.clock, logger: this.logger });
  }
}
