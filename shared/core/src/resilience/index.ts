/**
 * Resilience Module
 *
 * @module resilience
 */

export {
  CircuitBreaker,
  CircuitBreakerError,
  CircuitState
} from './circuit-breaker';
export type {
  CircuitBreakerConfig,
  CircuitBreakerDeps,
  CircuitBreakerStats
} from './circuit-breaker';

export { RetryMechanism } from './retry-mechanism';
export type {
  RetryConfig,
  RetryResult
} from './retry-mechanism';
