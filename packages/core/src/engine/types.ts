import type { Clock } from '../interfaces/clock';
import type { Logger } from '../interfaces/logger';
import type { ExecutionMode, GuardedEvents } from '../interfaces/event-bus';
import type { FlowCache } from '../interfaces/flow-cache';
import type { MetricsCollector } from '../metrics/collector';
import type { RetryExecutor } from '../retry/executor';
import type { RetryPolicy } from '../retry/policy';
import type { CircuitBreakerConfig } from '../circuit-breaker/types';
import type { ErrorClass } from '../types/errors';
import type { SemaphoreRegistry } from '../utils/semaphore-registry';

export type { ExecutionMode };

/** Edge name returned by `post`; undefined follows `default` or ends the flow */
export type EdgeName = string | undefined;

/**
 * Services available to a node while it runs.
 */
export interface NodeEnvironment {
  flow: string;
  mode: ExecutionMode;
  clock: Clock;
  logger: Logger;
  events: GuardedEvents;
  metrics: MetricsCollector;
  retry: RetryExecutor;
  cache?: FlowCache;
  /** Per-attempt deadline for nodes that set none */
  defaultTimeoutMs: number;
  /** Items in flight for batch nodes that set none */
  batchConcurrency: number;
  semaphores: SemaphoreRegistry;
}

/**
 * Read-through caching of exec results.
 */
export interface NodeCacheOptions<P, E> {
  /** Key for a prepared input; undefined skips the cache */
  key: (prepared: P) => string | undefined;
  /** Entry lifetime (default: cache default) */
  ttlSeconds?: number;
  /** Validate a cached value; undefined treats it as a miss */
  decode: (value: unknown) => E | undefined;
}

/**
 * How exec is wrapped: shared by Node and BatchNode.
 */
export interface ExecSettings<P, E> {
  /** Breaker and metrics name (default: node id) */
  operation?: string;
  /** Policy overrides, or false for a single attempt */
  retry?: Partial<RetryPolicy> | false;
  /** Breaker overrides, or false to bypass the breaker */
  circuitBreaker?: Partial<CircuitBreakerConfig> | false;
  /** Per-attempt deadline, 0 for none */
  timeoutMs?: number;
  cache?: NodeCacheOptions<P, E>;
  /**
   * Service whose async attempts share one runtime-wide cap, across every
   * node and flow that names it
   */
  concurrencyKey?: string;
  /** Cap for `concurrencyKey` when it is first used (default: config `serviceConcurrency`) */
  concurrencyLimit?: number;
}

export interface NodeStats {
  executions: number;
  failures: number;
  totalDurationMs: number;
  averageDurationMs: number;
  lastDurationMs: number;
}

/** Why one batch item failed */
export interface ItemFailure {
  index: number;
  errorClass: ErrorClass;
  attempts: number;
  message: string;
  cause: unknown;
}

export type BatchOutcome<E> =
  | { status: 'fulfilled'; value: E }
  | { status: 'rejected'; error: ItemFailure };
