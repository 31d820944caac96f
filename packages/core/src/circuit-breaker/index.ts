export { CircuitBreaker, type CircuitBreakerOptions, type StateChangeListener } from './circuit-breaker';
export { CircuitBreakerRegistry, type CircuitBreakerRegistryOptions } from './registry';
export {
  CIRCUIT_STATE_CODES,
  DEFAULT_CIRCUIT_CONFIG,
  type CircuitState,
  type CircuitBreakerConfig,
  type CircuitStateChange,
  type CircuitAdmission,
  type CircuitTicket,
  type CircuitBreakerSnapshot,
} from './types';
