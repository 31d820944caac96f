const positiveInt = (def: number) => ({ type: 'integer', minimum: 1, default: def });
const nonNegative = (def: number) => ({ type: 'number', minimum: 0, default: def });

/**
 * JSON schema for StepwiseConfig, with defaults filled by ajv.
 */
export const configSchema = {
  type: 'object',
  additionalProperties: false,
  required: ['execution', 'retry', 'circuitBreaker', 'cache', 'metrics', 'logLevel'],
  properties: {
    execution: {
      type: 'object',
      additionalProperties: false,
      properties: {
        mode: { type: 'string', enum: ['sync', 'async', 'auto'], default: 'auto' },
        maxSteps: positiveInt(1000),
        batchConcurrency: positiveInt(5),
        serviceConcurrency: positiveInt(10),
        execTimeoutMs: nonNegative(30_000),
      },
    },
    retry: {
      type: 'object',
      additionalProperties: false,
      properties: {
        maxAttempts: positiveInt(3),
        initialDelayMs: nonNegative(1000),
        backoffFactor: { type: 'number', minimum: 1, default: 2 },
        maxDelayMs: nonNegative(60_000),
        jitter: { type: 'boolean', default: true },
      },
    },
    circuitBreaker: {
      type: 'object',
      additionalProperties: false,
      properties: {
        failureThreshold: positiveInt(5),
        recoveryTimeoutMs: nonNegative(60_000),
      },
    },
    cache: {
      type: 'object',
      additionalProperties: false,
      properties: {
        defaultTtlSeconds: { type: 'number', default: 3600 },
        maxEntries: positiveInt(1000),
        keyPrefix: { type: 'string', minLength: 1, default: 'stepwise' },
        redisUrl: { type: 'string', format: 'uri' },
        healthCheckIntervalMs: positiveInt(30_000),
        sweepIntervalMs: positiveInt(60_000),
        analyticsWindowMs: positiveInt(300_000),
      },
    },
    metrics: {
      type: 'object',
      additionalProperties: false,
      properties: {
        histogramRetention: positiveInt(1000),
        maxSamples: positiveInt(10_000),
      },
    },
    logLevel: { type: 'string', enum: ['debug', 'info', 'warn', 'error', 'silent'], default: 'info' },
  },
} as const;

/**
 * Environment variable for each configuration path.
 */
export const ENV_VARS = {
  STEPWISE_MODE: ['execution', 'mode'],
  STEPWISE_MAX_STEPS: ['execution', 'maxSteps'],
  STEPWISE_BATCH_CONCURRENCY: ['execution', 'batchConcurrency'],
  STEPWISE_SERVICE_CONCURRENCY: ['execution', 'serviceConcurrency'],
  STEPWISE_EXEC_TIMEOUT_MS: ['execution', 'execTimeoutMs'],
  RETRY_MAX_ATTEMPTS: ['retry', 'maxAttempts'],
  RETRY_INITIAL_DELAY_MS: ['retry', 'initialDelayMs'],
  RETRY_BACKOFF_FACTOR: ['retry', 'backoffFactor'],
  RETRY_MAX_DELAY_MS: ['retry', 'maxDelayMs'],
  RETRY_JITTER: ['retry', 'jitter'],
  CIRCUIT_BREAKER_FAILURE_THRESHOLD: ['circuitBreaker', 'failureThreshold'],
  CIRCUIT_BREAKER_RECOVERY_TIMEOUT_MS: ['circuitBreaker', 'recoveryTimeoutMs'],
  CACHE_TTL_SECONDS: ['cache', 'defaultTtlSeconds'],
  CACHE_MAX_ENTRIES: ['cache', 'maxEntries'],
  CACHE_KEY_PREFIX: ['cache', 'keyPrefix'],
  REDIS_URL: ['cache', 'redisUrl'],
  CACHE_HEALTH_CHECK_INTERVAL_MS: ['cache', 'healthCheckIntervalMs'],
  CACHE_SWEEP_INTERVAL_MS: ['cache', 'sweepIntervalMs'],
  METRICS_HISTOGRAM_RETENTION: ['metrics', 'histogramRetention'],
  LOG_LEVEL: ['logLevel'],
} as const satisfies Record<string, readonly [string] | readonly [string, string]>;
