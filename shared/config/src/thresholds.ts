/**
 * Controller Threshold Defaults
 *
 * Applied to every service unless the fleet file overrides them,
 * first under `defaults`, then per service.
 */

import type { ControllerThresholds } from '@regionguard/types';

const MINUTE_MS = 60_000;
const DAY_MS = 24 * 60 * MINUTE_MS;

export const DEFAULT_SLO_WINDOWS: Readonly<Record<string, number>> = Object.freeze({
  short: 5 * MINUTE_MS,
  long: 30 * DAY_MS
});

export const DEFAULT_THRESHOLDS: Readonly<ControllerThresholds> = Object.freeze({
  probeIntervalMs: 10_000,
  probeTimeoutMs: 2_000,
  degradeFailureThreshold: 3,     // N
  degradeFailureWindowMs: MINUTE_MS, // T
  recoverySuccessThreshold: 5,    // M, must exceed N
  hardBurnRateThreshold: 10,
  sloWindows: DEFAULT_SLO_WINDOWS,
  verificationProbes: 5,
  stepTimeoutMs: 30_000,
  stepMaxAttempts: 3,
  stepInitialBackoffMs: 1_000,
  stepMaxBackoffMs: 10_000,
  escalationIntervalMs: MINUTE_MS
});
