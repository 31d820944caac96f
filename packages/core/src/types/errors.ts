/**
 * Base error for all Stepwise errors.
 */
export class StepwiseError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StepwiseError';
  }
}

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
  readonly severity: 'error' | 'warning';
}

/**
 * How a failure is treated by retry and by callers of a flow.
 */
export type ErrorClass = 'transient' | 'permanent' | 'circuit_open' | 'cancelled' | 'unknown';

// === Transient (retryable) ===

/**
 * Failure expected to clear up on its own. Retried per retry policy.
 */
export class TransientError extends StepwiseError {
  constructor(message: string, code = 'TRANSIENT', options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = 'TransientError';
  }
}

/**
 * An attempt exceeded its deadline.
 */
export class TimeoutError extends TransientError {
  constructor(
    public readonly timeoutMs: number,
    operation?: string
  ) {
    super(`${operation ? `"${operation}" ` : ''}timed out after ${timeoutMs}ms`, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

export class ConnectionError extends TransientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONNECTION', options);
    this.name = 'ConnectionError';
  }
}

export class RateLimitError extends TransientError {
  constructor(
    message: string,
    public readonly retryAfterMs?: number
  ) {
    super(message, 'RATE_LIMITED');
    this.name = 'RateLimitError';
  }
}

/**
 * Upstream answered with a 5xx-equivalent.
 */
export class ServerError extends TransientError {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message, 'SERVER_ERROR');
    this.name = 'ServerError';
  }
}

// === Permanent (non-retryable) ===

/**
 * Failure that retrying cannot fix. Surfaced immediately.
 */
export class PermanentError extends StepwiseError {
  constructor(message: string, code = 'PERMANENT', options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = 'PermanentError';
  }
}

/**
 * Malformed input.
 */
export class ValidationError extends PermanentError {
  constructor(message: string) {
    super(message, 'VALIDATION');
    this.name = 'ValidationError';
  }
}

export class AuthenticationError extends PermanentError {
  constructor(message: string) {
    super(message, 'AUTHENTICATION');
    this.name = 'AuthenticationError';
  }
}

// === Resilience ===

/**
 * Call rejected without being attempted because the operation's circuit is open.
 */
export class CircuitOpenError extends StepwiseError {
  constructor(
    public readonly operation: string,
    public readonly retryAfterMs: number,
    public readonly attempts = 0
  ) {
    super('CIRCUIT_OPEN', `Circuit for "${operation}" is open, retry in ${retryAfterMs}ms`);
    this.name = 'CircuitOpenError';
  }
}

/**
 * Every allowed attempt failed with a retryable error.
 */
export class RetryExhaustedError extends StepwiseError {
  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(
      'RETRY_EXHAUSTED',
      `"${operation}" failed after ${attempts} attempt(s): ${describeError(lastError)}`,
      { cause: lastError }
    );
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Cache backend unreachable or misbehaving. Never surfaced to a flow.
 */
export class CacheBackendError extends StepwiseError {
  constructor(
    public readonly backend: string,
    public readonly operation: string,
    cause: unknown
  ) {
    super('CACHE_BACKEND', `Cache backend "${backend}" failed on ${operation}: ${describeError(cause)}`, { cause });
    this.name = 'CacheBackendError';
  }
}

// === Flow ===

export type NodePhase = 'prep' | 'exec' | 'post';

/**
 * A node failed in a way the flow cannot recover from.
 */
export class NodeExecutionError extends StepwiseError {
  readonly errorClass: ErrorClass;

  constructor(
    public readonly nodeId: string,
    public readonly phase: NodePhase,
    public readonly operation: string,
    public readonly attempts: number,
    cause: unknown
  ) {
    super(
      'NODE_FAILED',
      `Node "${nodeId}" failed during ${phase} after ${attempts} attempt(s): ${describeError(cause)}`,
      { cause }
    );
    this.name = 'NodeExecutionError';
    this.errorClass = classifyError(cause);
  }
}

/**
 * Flow graph is invalid.
 */
export class FlowValidationError extends StepwiseError {
  constructor(
    public readonly flowName: string,
    public readonly issues: ValidationIssue[]
  ) {
    super('FLOW_INVALID', `Flow "${flowName}" is invalid: ${issues[0]?.message}`);
    this.name = 'FlowValidationError';
  }
}

/**
 * A node returned an edge that has no registered target.
 */
export class FlowWiringError extends StepwiseError {
  constructor(
    public readonly nodeId: string,
    public readonly edge: string,
    public readonly available: string[]
  ) {
    super(
      'UNKNOWN_EDGE',
      `Node "${nodeId}" returned edge "${edge}" which has no target. Available: [${available.join(', ')}]`
    );
    this.name = 'FlowWiringError';
  }
}

export class FlowConfigurationError extends StepwiseError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = 'FlowConfigurationError';
  }
}

export class FlowCancelledError extends StepwiseError {
  constructor(
    public readonly flowName: string,
    public readonly nodeId?: string
  ) {
    super('FLOW_CANCELLED', `Flow "${flowName}" was cancelled${nodeId ? ` at node "${nodeId}"` : ''}`);
    this.name = 'FlowCancelledError';
  }
}

/**
 * Configuration values failed validation.
 */
export class ConfigurationError extends StepwiseError {
  constructor(public readonly issues: ValidationIssue[]) {
    super('CONFIG_INVALID', `Invalid configuration: ${issues.map(i => `${i.path} ${i.message}`).join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

// === Classification ===

const TRANSIENT_SOCKET_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND', 'EAI_AGAIN']);

function readField(error: object, field: string): unknown {
  return field in error ? Reflect.get(error, field) : undefined;
}

/**
 * Map any thrown value to an error class.
 */
export function classifyError(error: unknown): ErrorClass {
  if (error instanceof NodeExecutionError) return error.errorClass;
  if (error instanceof RetryExhaustedError) return 'transient';
  if (error instanceof CircuitOpenError) return 'circuit_open';
  if (error instanceof FlowCancelledError) return 'cancelled';
  if (error instanceof TransientError) return 'transient';
  if (error instanceof PermanentError) return 'permanent';
  if (error instanceof StepwiseError) return 'permanent';
  if (typeof error !== 'object' || error === null) return 'unknown';

  const code = readField(error, 'code');
  if (typeof code === 'string' && TRANSIENT_SOCKET_CODES.has(code)) return 'transient';

  const status = readField(error, 'status') ?? readField(error, 'statusCode');
  if (typeof status === 'number') {
    if (status >= 500 || status === 429) return 'transient';
    if (status >= 400) return 'permanent';
  }

  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return 'transient';
  }
  return 'unknown';
}

/**
 * Whether retrying may help. Unknown errors are not retried.
 */
export function isTransient(error: unknown): boolean {
  return classifyError(error) === 'transient' && !(error instanceof RetryExhaustedError);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
