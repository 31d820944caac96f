import type { LogLevel } from '../interfaces/logger';

/** How a flow run is scheduled; `auto` picks per flow */
export type ExecutionModeSetting = 'sync' | 'async' | 'auto';

export interface ExecutionConfig {
  mode: ExecutionModeSetting;
  /** Node visits allowed per run */
  maxSteps: number;
  /** Items in flight per BatchNode in async mode */
  batchConcurrency: number;
  /** Default cap for a `concurrencyKey` that sets no limit */
  serviceConcurrency: number;
  /** Default per-attempt deadline, 0 for none */
  execTimeoutMs: number;
}

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
  jitter: boolean;
}

export interface CircuitBreakerSettings {
  failureThreshold: number;
  recoveryTimeoutMs: number;
}

export interface CacheConfig {
  defaultTtlSeconds: number;
  maxEntries: number;
  keyPrefix: string;
  /** Networked primary tier; in-memory only when absent */
  redisUrl?: string;
  healthCheckIntervalMs: number;
  sweepIntervalMs: number;
  /** Width of the sliding hit-rate window */
  analyticsWindowMs: number;
}

export interface MetricsConfig {
  histogramRetention: number;
  maxSamples: number;
}

export interface StepwiseConfig {
  execution: ExecutionConfig;
  retry: RetryConfig;
  circuitBreaker: CircuitBreakerSettings;
  cache: CacheConfig;
  metrics: MetricsConfig;
  logLevel: LogLevel;
}

/** Plain configuration values; anything omitted takes its default */
export interface StepwiseConfigInput {
  execution?: Partial<ExecutionConfig>;
  retry?: Partial<RetryConfig>;
  circuitBreaker?: Partial<CircuitBreakerSettings>;
  cache?: Partial<CacheConfig>;
  metrics?: Partial<MetricsConfig>;
  logLevel?: LogLevel;
}
