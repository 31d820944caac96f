import type { Clock } from '../interfaces/clock';
import type { Logger } from '../interfaces/logger';
import { systemClock } from '../impl/system-clock';
import { silentLogger } from '../impl/console-logger';
import type { MetricsCollector } from '../metrics/collector';
import { CircuitBreaker, type StateChangeListener } from './circuit-breaker';
import { DEFAULT_CIRCUIT_CONFIG, type CircuitBreakerConfig, type CircuitBreakerSnapshot } from './types';

export interface CircuitBreakerRegistryOptions {
  defaults?: Partial<CircuitBreakerConfig>;
  clock?: Clock;
  logger?: Logger;
  metrics?: MetricsCollector;
}

/**
 * One breaker per operation name, created on first use.
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly listeners = new Set<StateChangeListener>();
  private readonly defaults: CircuitBreakerConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly metrics?: MetricsCollector;

  constructor(options?: CircuitBreakerRegistryOptions) {
    this.defaults = { ...DEFAULT_CIRCUIT_CONFIG, ...options?.defaults };
    this.clock = options?.clock ?? systemClock;
    this.logger = options?.logger ?? silentLogger;
    this.metrics = options?.metrics;
  }

  /**
   * Breaker for `operation`. Overrides apply only when it is created.
   */
  get(operation: string, overrides?: Partial<CircuitBreakerConfig>): CircuitBreaker {
    let breaker = this.breakers.get(operation);
    if (!breaker) {
      breaker = new CircuitBreaker(operation, {
        ...this.defaults,
        ...overrides,
        clock: this.clock,
        logger: this.logger,
        metrics: this.metrics,
      });
      breaker.onStateChange(change => {
        for (const listener of this.listeners) {
          try {
            listener(change);
          } catch (err) {
            this.logger.warn('State change listener threw', { error: err instanceof Error ? err.message : String(err) });
          }
        }
      });
      this.breakers.set(operation, breaker);
    }
    return breaker;
  }

  has(operation: string): boolean {
    return this.breakers.has(operation);
  }

  names(): string[] {
    return [...this.breakers.keys()];
  }

  /**
   * Listen to transitions of every breaker, including ones created later.
   */
  onStateChange(listener: StateChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  snapshot(): CircuitBreakerSnapshot[] {
    return [...this.breakers.values()].map(b => b.snapshot());
  }

  resetAll(): void {
    for (const breaker of this.breakers.values()) breaker.reset();
  }
}
