export type CircuitState = 'closed' | 'open' | 'half_open';

/** Gauge value exported for each state */
export const CIRCUIT_STATE_CODES: Record<CircuitState, number> = {
  closed: 0,
  half_open: 1,
  open: 2,
};

export interface CircuitBreakerConfig {
  /** Consecutive failures that trip the circuit (default: 5) */
  failureThreshold: number;
  /** Time in OPEN before a trial call is allowed (default: 60000) */
  recoveryTimeoutMs: number;
}

export const DEFAULT_CIRCUIT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeoutMs: 60_000,
};

export interface CircuitStateChange {
  operation: string;
  from: CircuitState;
  to: CircuitState;
  at: number;
  consecutiveFailures: number;
}

/**
 * Proof of admission, handed back with the outcome.
 * `generation` identifies the state period the call was admitted in.
 */
export interface CircuitTicket {
  trial: boolean;
  generation: number;
}

/** Result of asking a breaker for admission */
export type CircuitAdmission =
  | { allowed: true; state: CircuitState; ticket: CircuitTicket }
  | { allowed: false; state: CircuitState; retryAfterMs: number };

export interface CircuitBreakerSnapshot {
  operation: string;
  state: CircuitState;
  consecutiveFailures: number;
  failureThreshold: number;
  recoveryTimeoutMs: number;
  lastFailureAt: number | null;
  lastTransitionAt: number;
  trialInFlight: boolean;
  totals: {
    calls: number;
    successes: number;
    failures: number;
    rejections: number;
    transitions: number;
  };
}
