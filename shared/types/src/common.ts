/**
 * Common types used across all packages
 *
 * Consolidated here so the controller, config loader and core utilities
 * agree on identifiers and timing primitives.
 */

/** Region identifier, e.g. `us-east`. */
export type RegionId = string;

/** Service identifier, e.g. `checkout`. */
export type ServiceId = string;

/** Epoch milliseconds. */
export type EpochMs = number;

/**
 * Clock abstraction so time-dependent components can be driven by tests.
 */
export interface Clock {
  now(): EpochMs;
}

export const systemClock: Clock = {
  now: () => Date.now()
};

/**
 * Canonical timeout error.
 *
 * Lives in the types package so every package throws and recognises the
 * same class (instanceof checks across packages).
 */
export class TimeoutError extends Error {
  constructor(
    /** What operation timed out */
    public readonly operation: string,
    /** The timeout duration in milliseconds */
    public readonly timeoutMs: number,
    /** Optional component name for context */
    public readonly component?: string
  ) {
    super(`Timeout: ${operation} exceeded ${timeoutMs}ms${component ? ` in ${component}` : ''}`);
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
