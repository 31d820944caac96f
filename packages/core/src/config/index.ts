export { loadConfig, resolveConfig } from './load';
export { configSchema, ENV_VARS } from './schema';
export type {
  StepwiseConfig,
  StepwiseConfigInput,
  ExecutionModeSetting,
  ExecutionConfig,
  RetryConfig,
  CircuitBreakerSettings,
  CacheConfig,
  MetricsConfig,
} from './types';
