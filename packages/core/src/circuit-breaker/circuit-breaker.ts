import type { Clock } from '../interfaces/clock';
import type { Logger } from '../interfaces/logger';
import { systemClock } from '../impl/system-clock';
import { silentLogger } from '../impl/console-logger';
import type { MetricsCollector } from '../metrics/collector';
import { CircuitOpenError } from '../types/errors';
import {
  CIRCUIT_STATE_CODES,
  DEFAULT_CIRCUIT_CONFIG,
  type CircuitAdmission,
  type CircuitBreakerConfig,
  type CircuitBreakerSnapshot,
  type CircuitState,
  type CircuitStateChange,
  type CircuitTicket,
} from './types';

export type StateChangeListener = (change: CircuitStateChange) => void;

export interface CircuitBreakerOptions extends Partial<CircuitBreakerConfig> {
  clock?: Clock;
  logger?: Logger;
  metrics?: MetricsCollector;
}

/**
 * Per-operation circuit breaker.
 *
 * CLOSED counts consecutive failures and opens at the threshold.
 * OPEN rejects without calling until the recovery timeout has passed
 * since it opened, then becomes HALF_OPEN.
 * HALF_OPEN admits exactly one trial: success closes, failure reopens.
 *
 * Every recorded failure counts, whatever its class.
 * Mutations are synchronous, so each call is atomic on the event loop.
 * A caller granted admission must report back with `recordSuccess`
 * or `recordFailure`, otherwise a half-open trial slot stays taken.
 * While HALF_OPEN only the outcome carrying the trial's ticket moves the
 * state; outcomes of calls admitted before are counted and otherwise ignored.
 */
export class CircuitBreaker {
  readonly config: CircuitBreakerConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly metrics?: MetricsCollector;
  private readonly listeners = new Set<StateChangeListener>();

  private _state: CircuitState = 'closed';
  private consecutiveFailures = 0;
  private lastFailureAt: number | null = null;
  private lastTransitionAt: number;
  private openedAt = 0;
  private trialInFlight = false;
  /** Bumped on every transition */
  private generation = 0;
  private readonly totals = { calls: 0, successes: 0, failures: 0, rejections: 0, transitions: 0 };

  constructor(
    readonly operation: string,
    options?: CircuitBreakerOptions
  ) {
    this.config = {
      failureThreshold: options?.failureThreshold ?? DEFAULT_CIRCUIT_CONFIG.failureThreshold,
      recoveryTimeoutMs: options?.recoveryTimeoutMs ?? DEFAULT_CIRCUIT_CONFIG.recoveryTimeoutMs,
    };
    if (!Number.isInteger(this.config.failureThreshold) || this.config.failureThreshold < 1) {
      throw new RangeError(`failureThreshold must be a positive integer, got ${this.config.failureThreshold}`);
    }
    if (this.config.recoveryTimeoutMs < 0) {
      throw new RangeError(`recoveryTimeoutMs must be >= 0, got ${this.config.recoveryTimeoutMs}`);
    }
    this.clock = options?.clock ?? systemClock;
    this.logger = options?.logger ?? silentLogger;
    this.metrics = options?.metrics;
    this.lastTransitionAt = this.clock.now();
    this.metrics?.setGauge('circuit_breaker_state', CIRCUIT_STATE_CODES.closed, { operation });
  }

  /**
   * Current state. Reading it moves an expired OPEN circuit to HALF_OPEN.
   */
  get state(): CircuitState {
    if (this._state === 'open' && this.clock.now() - this.openedAt >= this.config.recoveryTimeoutMs) {
      this.transition('half_open');
    }
    return this._state;
  }

  /**
   * Ask for admission without throwing.
   */
  tryAcquire(): CircuitAdmission {
    const state = this.state;

    if (state === 'closed') {
      this.totals.calls++;
      return { allowed: true, state, ticket: { trial: false, generation: this.generation } };
    }

    if (state === 'half_open') {
      if (this.trialInFlight) {
        this.totals.rejections++;
        return { allowed: false, state, retryAfterMs: 0 };
      }
      this.trialInFlight = true;
      this.totals.calls++;
      return { allowed: true, state, ticket: { trial: true, generation: this.generation } };
    }

    this.totals.rejections++;
    return {
      allowed: false,
      state,
      retryAfterMs: this.retryAfterMs,
    };
  }

  /**
   * Ask for admission.
   * @throws CircuitOpenError when the call must not be attempted
   */
  allow(): CircuitTicket {
    const admission = this.tryAcquire();
    if (!admission.allowed) {
      throw new CircuitOpenError(this.operation, admission.retryAfterMs);
    }
    return admission.ticket;
  }

  /** Time left in OPEN, 0 in any other state */
  get retryAfterMs(): number {
    if (this.state !== 'open') return 0;
    return Math.max(0, this.openedAt + this.config.recoveryTimeoutMs - this.clock.now());
  }

  recordSuccess(ticket?: CircuitTicket): void {
    this.totals.successes++;
    const state = this.state;
    if (state === 'half_open') {
      if (this.isStale(ticket)) return;
      this.trialInFlight = false;
      this.consecutiveFailures = 0;
      this.transition('closed');
      return;
    }
    if (state === 'closed') {
      this.consecutiveFailures = 0;
    }
  }

  recordFailure(error?: unknown, ticket?: CircuitTicket): void {
    this.totals.failures++;
    this.lastFailureAt = this.clock.now();
    const state = this.state;
    if (state === 'half_open' && this.isStale(ticket)) return;
    this.consecutiveFailures++;

    if (state === 'half_open') {
      this.trialInFlight = false;
      this.open(error);
      return;
    }
    if (state === 'closed' && this.consecutiveFailures >= this.config.failureThreshold) {
      this.open(error);
    }
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const ticket = this.allow();
    try {
      const result = await fn();
      this.recordSuccess(ticket);
      return result;
    } catch (err) {
      this.recordFailure(err, ticket);
      throw err;
    }
  }

  executeSync<T>(fn: () => T): T {
    const ticket = this.allow();
    try {
      const result = fn();
      this.recordSuccess(ticket);
      return result;
    } catch (err) {
      this.recordFailure(err, ticket);
      throw err;
    }
  }

  /**
   * Force CLOSED with a clean failure count.
   */
  reset(): void {
    this.consecutiveFailures = 0;
    this.trialInFlight = false;
    this.lastFailureAt = null;
    if (this._state !== 'closed') this.transition('closed');
  }

  /**
   * Subscribe to transitions.
   * @returns unsubscribe function
   */
  onStateChange(listener: StateChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  snapshot(): CircuitBreakerSnapshot {
    return {
      operation: this.operation,
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      failureThreshold: this.config.failureThreshold,
      recoveryTimeoutMs: this.config.recoveryTimeoutMs,
      lastFailureAt: this.lastFailureAt,
      lastTransitionAt: this.lastTransitionAt,
      trialInFlight: this.trialInFlight,
      totals: { ...this.totals },
    };
  }

  /** Untracked outcomes (no ticket) are applied as they come */
  private isStale(ticket: CircuitTicket | undefined): boolean {
    return ticket !== undefined && !(ticket.trial && ticket.generation === this.generation);
  }

  private open(error: unknown): void {
    this.openedAt = this.clock.now();
    this.transition('open');
    this.logger.warn(`Circuit "${this.operation}" opened`, {
      consecutiveFailures: this.consecutiveFailures,
      retryInMs: this.config.recoveryTimeoutMs,
      error: error instanceof Error ? error.message : error === undefined ? undefined : String(error),
    });
  }

  private transition(to: CircuitState): void {
    const from = this._state;
    if (from === to) return;
    const at = this.clock.now();
    this._state = to;
    this.generation++;
    this.lastTransitionAt = at;
    this.totals.transitions++;
    if (to === 'closed') this.consecutiveFailures = 0;

    this.metrics?.increment('circuit_breaker_transitions_total', { operation: this.operation, from, to });
    this.metrics?.setGauge('circuit_breaker_state', CIRCUIT_STATE_CODES[to], { operation: this.operation });
    this.logger.info(`Circuit "${this.operation}" ${from} -> ${to}`);

    const change: CircuitStateChange = {
      operation: this.operation,
      from,
      to,
      at,
      consecutiveFailures: this.consecutiveFailures,
    };
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (err) {
        this.logger.warn('State change listener threw', { error: err instanceof Error ? err.message : String(err) });
      }
    }
  }
}
