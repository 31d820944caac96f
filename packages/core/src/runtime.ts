import type { Clock } from './interfaces/clock';
import type { Logger } from './interfaces/logger';
import type { FlowCache } from './interfaces/flow-cache';
import { guardEvents, type GuardedEvents, type ResilienceEvents } from './interfaces/event-bus';
import { systemClock } from './impl/system-clock';
import { createConsoleLogger } from './impl/console-logger';
import { MetricsCollector } from './metrics/collector';
import { CircuitBreakerRegistry } from './circuit-breaker/registry';
import { RetryExecutor } from './retry/executor';
import { resolveConfig } from './config/load';
import type { StepwiseConfig, StepwiseConfigInput } from './config/types';
import { describeError } from './types/errors';
import { SemaphoreRegistry } from './utils/semaphore-registry';

export interface RuntimeOverrides {
  clock?: Clock;
  logger?: Logger;
  events?: ResilienceEvents;
  metrics?: MetricsCollector;
  /** Jitter source for retry backoff */
  random?: () => number;
}

export type ShutdownHook = () => void | Promise<void>;

/**
 * Process-wide services, created once at startup and passed to every
 * component that needs them.
 */
export class ResilienceRuntime {
  readonly clock: Clock;
  readonly logger: Logger;
  readonly events: GuardedEvents;
  readonly metrics: MetricsCollector;
  readonly breakers: CircuitBreakerRegistry;
  readonly retry: RetryExecutor;
  /** Concurrency caps shared across flows, by service */
  readonly semaphores: SemaphoreRegistry;
  private _cache?: FlowCache;
  private readonly shutdownHooks: ShutdownHook[] = [];
  private shutdownPromise?: Promise<void>;

  constructor(
    readonly config: StepwiseConfig,
    overrides?: RuntimeOverrides
  ) {
    this.clock = overrides?.clock ?? systemClock;
    this.logger = overrides?.logger ?? createConsoleLogger({ level: config.logLevel, scope: 'stepwise' });
    this.events = guardEvents(overrides?.events, this.logger);
    this.metrics =
      overrides?.metrics ??
      new MetricsCollector({
        histogramRetention: config.metrics.histogramRetention,
        maxSamples: config.metrics.maxSamples,
        clock: this.clock,
      });
    this.breakers = new CircuitBreakerRegistry({
      defaults: config.circuitBreaker,
      clock: this.clock,
      logger: this.logger.child('CircuitBreaker'),
      metrics: this.metrics,
    });
    this.breakers.onStateChange(change => this.events.onCircuitStateChange(change));
    this.retry = new RetryExecutor({
      policy: config.retry,
      breakers: this.breakers,
      metrics: this.metrics,
      logger: this.logger.child('Retry'),
      events: this.events,
      clock: this.clock,
      random: overrides?.random,
    });
    this.semaphores = new SemaphoreRegistry(config.execution.serviceConcurrency, this.logger.child('Semaphores'));
  }

  /** Cache used by cached nodes, if one is attached */
  get cache(): FlowCache | undefined {
    return this._cache;
  }

  /**
   * Attach the flow cache. Its `close` runs on shutdown.
   */
  attachCache(cache: FlowCache & { close?(): Promise<void> | void }): void {
    this._cache = cache;
    const close = cache.close;
    if (close) this.onShutdown(() => close.call(cache));
  }

  onShutdown(hook: ShutdownHook): void {
    this.shutdownHooks.push(hook);
  }

  /**
   * Run shutdown hooks in reverse registration order. Idempotent.
   */
  shutdown(): Promise<void> {
    this.shutdownPromise ??= this.runShutdown();
    return this.shutdownPromise;
  }

  private async runShutdown(): Promise<void> {
    for (const hook of [...this.shutdownHooks].reverse()) {
      try {
        await hook();
      } catch (err) {
        this.logger.error('Shutdown hook failed', { error: describeError(err) });
      }
    }
  }
}

/**
 * Build a runtime from plain configuration values.
 */
export function createRuntime(config?: StepwiseConfig | StepwiseConfigInput, overrides?: RuntimeOverrides): ResilienceRuntime {
  return new ResilienceRuntime(resolveConfig(config), overrides);
}
