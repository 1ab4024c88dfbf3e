/**
 * @regionguard/core
 *
 * Shared runtime building blocks for the failover controller:
 * errors, logging, async helpers, resilience, env parsing and Redis.
 */

// Error handling
export {
  ErrorCode,
  ErrorSeverity,
  ControllerError,
  ProbeTimeoutError,
  ProbeFailureError,
  ConflictError,
  ExecutorStepFailure,
  RollbackFailure,
  OperationCancelledError,
  ConfigurationError,
  OverrideRejectedError,
  toError,
  getErrorMessage,
  isRetryableError,
  formatErrorForResponse
} from './error-handling';

// Logging
export * from './logging';

// Async
export * from './async';

// Resilience
export * from './resilience';

// Environment
export * from './utils';

// Redis
export * from './redis';
