/**
 * Lifecycle Utilities
 *
 * Clear a timer and return null for direct assignment:
 *
 * ```typescript
 * this.probeInterval = clearIntervalSafe(this.probeInterval);
 * ```
 */

/**
 * Clear an interval and return null for assignment.
 * Safe to call with null (no-op).
 */
export function clearIntervalSafe(interval: NodeJS.Timeout | null): null {
  if (interval) {
    clearInterval(interval);
  }
  return null;
}
