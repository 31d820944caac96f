import { ConfigurationError, isTransient, type ValidationIssue } from '../types/errors';

/**
 * Immutable retry settings.
 */
export interface RetryPolicy {
  /** Total attempts including the first (default: 3) */
  readonly maxAttempts: number;
  /** Delay after the first failure (default: 1000) */
  readonly initialDelayMs: number;
  /** Multiplier per further failure (default: 2) */
  readonly backoffFactor: number;
  /** Upper bound on any delay (default: 60000) */
  readonly maxDelayMs: number;
  /** Draw each delay uniformly from [0, computed] (default: true) */
  readonly jitter: boolean;
  /** Which failures are worth another attempt (default: transient errors) */
  readonly isRetryable: (error: unknown) => boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 3,
  initialDelayMs: 1000,
  backoffFactor: 2,
  maxDelayMs: 60_000,
  jitter: true,
  isRetryable: isTransient,
});

/**
 * Fill and validate a policy.
 * @throws ConfigurationError for out-of-range values
 */
export function createRetryPolicy(overrides?: Partial<RetryPolicy>, base: RetryPolicy = DEFAULT_RETRY_POLICY): RetryPolicy {
  const policy: RetryPolicy = { ...base, ...overrides };
  const issues: ValidationIssue[] = [];
  const check = (ok: boolean, path: string, message: string) => {
    if (!ok) issues.push({ path: `retry.${path}`, message, severity: 'error' });
  };

  check(Number.isInteger(policy.maxAttempts) && policy.maxAttempts >= 1, 'maxAttempts', 'must be an integer >= 1');
  check(policy.initialDelayMs >= 0, 'initialDelayMs', 'must be >= 0');
  check(policy.backoffFactor >= 1, 'backoffFactor', 'must be >= 1');
  check(policy.maxDelayMs >= 0, 'maxDelayMs', 'must be >= 0');

  if (issues.length > 0) throw new ConfigurationError(issues);
  return Object.freeze(policy);
}

/**
 * Delay after failed attempt `attempt` (1-based), before jitter:
 * min(initialDelay * factor^(attempt-1), maxDelay).
 */
export function computeDelay(policy: RetryPolicy, attempt: number): number {
  const raw = policy.initialDelayMs * Math.pow(policy.backoffFactor, Math.max(0, attempt - 1));
  return Math.min(raw, policy.maxDelayMs);
}

/**
 * Delay actually waited. Full jitter: uniform in [0, computed].
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const delay = computeDelay(policy, attempt);
  return policy.jitter ? random() * delay : delay;
}
