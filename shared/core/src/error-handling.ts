/**
 * Shared Error Handling Utilities
 *
 * Error codes, severities and the controller's error taxonomy:
 *
 * | Error                   | Handling                                              |
 * |-------------------------|-------------------------------------------------------|
 * | ProbeTimeoutError       | transient, absorbed; next scheduled probe retries     |
 * | ProbeFailureError       | transient, absorbed; next scheduled probe retries     |
 * | ConflictError           | re-read and retry once, then defer to the next tick   |
 * | ExecutorStepFailure     | coordinator rolls back                                |
 * | RollbackFailure         | fatal; service ends in `aborted`                      |
 * | ConfigurationError      | fail fast at load time, before probing starts         |
 * | OverrideRejectedError   | override refused; state unchanged                     |
 * | OperationCancelledError | step cancelled by a manual abort                      |
 */

// =============================================================================
// Error Codes
// =============================================================================

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  INVALID_ARGUMENT = 1001,
  NOT_FOUND = 1002,
  INVALID_STATE = 1005,
  OPERATION_CANCELLED = 1006,

  // Probe errors (2000-2999)
  PROBE_TIMEOUT = 2000,
  PROBE_FAILURE = 2001,

  // State store errors (3000-3999)
  STATE_CONFLICT = 3000,

  // Failover errors (4000-4999)
  STEP_FAILED = 4000,
  ROLLBACK_FAILED = 4001,
  FAILOVER_ALREADY_LIVE = 4002,
  JOURNAL_ERROR = 4003,

  // Configuration errors (6000-6999)
  INVALID_CONFIG = 6000,

  // Override errors (7000-7999)
  OVERRIDE_UNAUTHORIZED = 7000
}

export enum ErrorSeverity {
  /** Expected errors that don't require action */
  INFO = 'info',
  /** Unexpected but recoverable */
  WARNING = 'warning',
  /** Failures that may impact availability */
  ERROR = 'error',
  /** Needs a human */
  CRITICAL = 'critical'
}

interface ControllerErrorOptions {
  severity?: ErrorSeverity;
  context?: Record<string, unknown>;
  cause?: Error;
}

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base error class for the controller.
 * Carries structured information for logging and the HTTP API.
 */
export class ControllerError extends Error {
  readonly code: ErrorCode;
  readonly severity: ErrorSeverity;
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;
  readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    options: ControllerErrorOptions = {}
  ) {
    super(message);
    this.name = 'ControllerError';
    this.code = code;
    this.severity = options.severity ?? ErrorSeverity.ERROR;
    this.timestamp = Date.now();
    this.context = options.context;
    this.cause = options.cause;
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      timestamp: this.timestamp,
      context: this.context,
      cause: this.cause?.message,
      stack: this.stack
    };
  }
}

// =============================================================================
// Probe Errors
// =============================================================================

export class ProbeTimeoutError extends ControllerError {
  readonly serviceId: string;
  readonly regionId: string;
  readonly timeoutMs: number;

  constructor(serviceId: string, regionId: string, timeoutMs: number) {
    super(`Probe ${serviceId}/${regionId} timed out after ${timeoutMs}ms`, ErrorCode.PROBE_TIMEOUT, {
      severity: ErrorSeverity.WARNING,
      context: { serviceId, regionId, timeoutMs }
    });
    this.name = 'ProbeTimeoutError';
    this.serviceId = serviceId;
    this.regionId = regionId;
    this.timeoutMs = timeoutMs;
  }
}

export class ProbeFailureError extends ControllerError {
  readonly serviceId: string;
  readonly regionId: string;

  constructor(serviceId: string, regionId: string, detail: string, cause?: Error) {
    super(`Probe ${serviceId}/${regionId} failed: ${detail}`, ErrorCode.PROBE_FAILURE, {
      severity: ErrorSeverity.WARNING,
      context: { serviceId, regionId },
      cause
    });
    this.name = 'ProbeFailureError';
    this.serviceId = serviceId;
    this.regionId = regionId;
  }
}

// =============================================================================
// State Store Errors
// =============================================================================

/**
 * Optimistic-concurrency collision on the region state store.
 */
export class ConflictError extends ControllerError {
  readonly key: string;
  readonly expected: string;
  readonly actual: string;

  constructor(key: string, expected: string, actual: string) {
    super(`Conflict on ${key}: expected ${expected}, found ${actual}`, ErrorCode.STATE_CONFLICT, {
      severity: ErrorSeverity.INFO,
      context: { key, expected, actual }
    });
    this.name = 'ConflictError';
    this.key = key;
    this.expected = expected;
    this.actual = actual;
  }
}

// =============================================================================
// Failover Errors
// =============================================================================

export class ExecutorStepFailure extends ControllerError {
  readonly eventId: string;
  readonly stepName: string;
  readonly attempts: number;

  constructor(eventId: string, stepName: string, attempts: number, cause?: Error) {
    super(
      `Step ${stepName} of failover ${eventId} failed after ${attempts} attempt(s)${cause ? `: ${cause.message}` : ''}`,
      ErrorCode.STEP_FAILED,
      { severity: ErrorSeverity.ERROR, context: { eventId, stepName, attempts }, cause }
    );
    this.name = 'ExecutorStepFailure';
    this.eventId = eventId;
    this.stepName = stepName;
    this.attempts = attempts;
  }
}

export class RollbackFailure extends ControllerError {
  readonly eventId: string;
  readonly stepName: string;

  constructor(eventId: string, stepName: string, cause?: Error) {
    super(
      `Compensation of ${stepName} for failover ${eventId} failed${cause ? `: ${cause.message}` : ''}`,
      ErrorCode.ROLLBACK_FAILED,
      { severity: ErrorSeverity.CRITICAL, context: { eventId, stepName }, cause }
    );
    this.name = 'RollbackFailure';
    this.eventId = eventId;
    this.stepName = stepName;
  }
}

export class OperationCancelledError extends ControllerError {
  constructor(operation: string, reason?: string) {
    super(`${operation} cancelled${reason ? `: ${reason}` : ''}`, ErrorCode.OPERATION_CANCELLED, {
      severity: ErrorSeverity.INFO,
      context: { operation, reason }
    });
    this.name = 'OperationCancelledError';
  }
}

// =============================================================================
// Configuration & Override Errors
// =============================================================================

export class ConfigurationError extends ControllerError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, ErrorCode.INVALID_CONFIG, {
      severity: ErrorSeverity.CRITICAL,
      context: { issues }
    });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class OverrideRejectedError extends ControllerError {
  constructor(message: string, code: ErrorCode.OVERRIDE_UNAUTHORIZED, context?: Record<string, unknown>) {
    super(message, code, { severity: ErrorSeverity.WARNING, context });
    this.name = 'OverrideRejectedError';
  }
}

// =============================================================================
// Error Handling Utilities
// =============================================================================

/**
 * Normalise anything thrown into an Error.
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) return error;
  return new Error(typeof error === 'string' ? error : JSON.stringify(error));
}

export function getErrorMessage(error: unknown): string {
  return toError(error).message;
}

// =============================================================================
// Error Classification
// =============================================================================

const RETRYABLE_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.PROBE_TIMEOUT,
  ErrorCode.PROBE_FAILURE,
  ErrorCode.STATE_CONFLICT
]);

const NON_RETRYABLE_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.OPERATION_CANCELLED,
  ErrorCode.INVALID_CONFIG,
  ErrorCode.ROLLBACK_FAILED,
  ErrorCode.OVERRIDE_UNAUTHORIZED
]);

/**
 * Whether an error from an external call is worth another attempt.
 * Unknown errors from capability adapters are retried; the executor's
 * bounded attempt count is the limit.
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof ControllerError) {
    if (NON_RETRYABLE_CODES.has(error.code)) return false;
    if (RETRYABLE_CODES.has(error.code)) return true;
  }
  if (error.name === 'AbortError') {
    return false;
  }
  return true;
}

// =============================================================================
// Error Formatting
// =============================================================================

export function formatErrorForResponse(error: Error): {
  code: number;
  message: string;
  details?: Record<string, unknown>;
} {
  if (error instanceof ControllerError) {
    return {
      code: error.code,
      message: error.message,
      details: error.context
    };
  }

  return {
    code: ErrorCode.UNKNOWN_ERROR,
    message: error.message
  };
}
