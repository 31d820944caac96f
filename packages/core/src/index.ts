// Errors
export {
  StepwiseError,
  TransientError,
  TimeoutError,
  ConnectionError,
  RateLimitError,
  ServerError,
  PermanentError,
  ValidationError,
  AuthenticationError,
  CircuitOpenError,
  RetryExhaustedError,
  CacheBackendError,
  NodeExecutionError,
  FlowValidationError,
  FlowWiringError,
  FlowConfigurationError,
  FlowCancelledError,
  ConfigurationError,
  classifyError,
  isTransient,
  describeError,
  type ValidationIssue,
  type ErrorClass,
  type NodePhase,
} from './types/errors';

// Interfaces
export type { Clock, ScheduleOptions } from './interfaces/clock';
export type { Logger, LogLevel, LogFields } from './interfaces/logger';
export type { FlowCache, CacheLookup } from './interfaces/flow-cache';
export { guardEvents, type ResilienceEvents, type GuardedEvents, type ExecutionMode } from './interfaces/event-bus';

// Implementations
export { systemClock } from './impl/system-clock';
export { createConsoleLogger, silentLogger, type ConsoleLoggerOptions } from './impl/console-logger';

// Utils
export { Semaphore } from './utils/semaphore';
export { SemaphoreRegistry, type SemaphoreInfo } from './utils/semaphore-registry';

// Metrics
export * from './metrics';

// Circuit breaker
export * from './circuit-breaker';

// Retry
export * from './retry';

// Tasks
export * from './task';

// Engine
export * from './engine';

// Config
export * from './config';

// Runtime
export { ResilienceRuntime, createRuntime, type RuntimeOverrides, type ShutdownHook } from './runtime';
