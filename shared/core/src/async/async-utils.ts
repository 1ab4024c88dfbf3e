/**
 * Shared Async Utilities
 *
 * Timeout, abort and delay primitives. Every suspension point in the
 * controller (probe calls, executor steps, backoff sleeps) goes through
 * one of these so none can block indefinitely.
 *
 * Used by:
 * - probe/health-probe.ts (probe timeout)
 * - execution/failover-executor.ts (step timeout, cancellation)
 * - resilience/retry-mechanism.ts (backoff sleeps)
 */

import { TimeoutError } from '@regionguard/types';
import { OperationCancelledError } from '../error-handling';

export { TimeoutError };

// =============================================================================
// Timeout Utilities
// =============================================================================

/**
 * Execute a promise with a timeout.
 * If the promise doesn't settle within timeoutMs, rejects with TimeoutError.
 *
 * @param promise The promise to execute
 * @param timeoutMs Maximum time to wait in milliseconds
 * @param operationName Optional name for error messages
 * @throws TimeoutError if the operation times out
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operationName?: string
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
    throw new TypeError(`withTimeout: timeoutMs must be a non-negative finite number, got ${timeoutMs}`);
  }

  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(operationName ?? 'operation', timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

// =============================================================================
// Abort Utilities
// =============================================================================

/**
 * Race a promise against an abort signal.
 * Rejects with OperationCancelledError as soon as the signal fires, even if
 * the underlying work ignores the signal.
 */
export async function raceAbort<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  operationName: string
): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    throw new OperationCancelledError(operationName, abortReason(signal));
  }

  let onAbort: (() => void) | undefined;
  const abortPromise = new Promise<never>((_, reject) => {
    onAbort = () => reject(new OperationCancelledError(operationName, abortReason(signal)));
    signal.addEventListener('abort', onAbort, { once: true });
  });

  try {
    return await Promise.race([promise, abortPromise]);
  } finally {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

function abortReason(signal: AbortSignal): string | undefined {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason.message;
  return typeof reason === 'string' ? reason : undefined;
}

// =============================================================================
// Delay Utilities
// =============================================================================

/**
 * Sleep for a specified duration.
 * With a signal, rejects with OperationCancelledError when aborted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (!signal) {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
  if (signal.aborted) {
    return Promise.reject(new OperationCancelledError('sleep', abortReason(signal)));
  }
  return raceAbort(new Promise<void>(resolve => {
    const timer = setTimeout(resolve, ms);
    signal.addEventListener('abort', () => clearTimeout(timer), { once: true });
  }), signal, 'sleep');
}

/**
 * Deferred promise with external resolve/reject controls.
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason?: unknown) => void;
}

export function createDeferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason?: unknown) => void = () => undefined;

  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });

  return { promise, resolve, reject };
}

// =============================================================================
// Shutdown Utilities
// =============================================================================

/**
 * Shut down resources in order, each bounded by timeoutMs.
 * A failing or slow cleanup is logged and does not stop the others.
 */
export async function gracefulShutdown(
  resources: Array<{ name: string; cleanup: () => Promise<void> }>,
  timeoutMs: number,
  logger?: { warn: (msg: string, meta?: Record<string, unknown>) => void }
): Promise<void> {
  for (const resource of resources) {
    try {
      await withTimeout(resource.cleanup(), timeoutMs, `${resource.name} cleanup`);
    } catch (error) {
      if (error instanceof TimeoutError) {
        logger?.warn(`${resource.name} cleanup timed out`, { timeoutMs });
      } else {
        logger?.warn(`${resource.name} cleanup failed`, {
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }
  }
}
