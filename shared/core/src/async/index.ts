/**
 * Async Module
 *
 * Timeout, abort, delay and shutdown helpers.
 *
 * @module async
 */

export {
  TimeoutError,
  withTimeout,
  raceAbort,
  sleep,
  createDeferred,
  gracefulShutdown
} from './async-utils';
export type { Deferred } from './async-utils';

export { clearIntervalSafe } from './lifecycle-utils';
