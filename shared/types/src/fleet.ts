/**
 * Fleet Model Types
 *
 * Regions, services, probe samples and error budgets. Service definitions are
 * produced once by the fleet loader (@regionguard/config) and never mutated.
 */

import type { EpochMs, RegionId, ServiceId } from './common';

export type RegionRole = 'primary' | 'standby' | 'cold';

/**
 * Believed state of a region for one service, as held by the region state store.
 */
export type RegionState =
  | 'healthy'
  | 'degraded'
  | 'unreachable'
  | 'promoting'
  | 'promoted'
  | 'failed';

export interface RegionRecord {
  serviceId: ServiceId;
  regionId: RegionId;
  role: RegionRole;
  state: RegionState;
  /** Timestamp of the last recorded probe (null before the first probe) */
  lastProbeAt: EpochMs | null;
  consecutiveFailures: number;
  /** Incremented on every accepted compare-and-set write */
  version: number;
}

export type ProbeOutcome = 'success' | 'failure' | 'timeout';

export interface ProbeSample {
  serviceId: ServiceId;
  regionId: RegionId;
  timestamp: EpochMs;
  outcome: ProbeOutcome;
  latencyMs: number;
  error?: string;
}

export interface SloTarget {
  /** Target ratio of good events, e.g. 0.999 */
  target: number;
  /** Successful probes slower than this count against the budget */
  latencyCeilingMs?: number;
}

/**
 * Every tunable threshold of the detector, coordinator and executor.
 * Defaults live in @regionguard/config (thresholds.ts).
 */
export interface ControllerThresholds {
  probeIntervalMs: number;
  probeTimeoutMs: number;
  /** N: consecutive failures confirming degradation */
  degradeFailureThreshold: number;
  /** T: the N failures must fall within this interval */
  degradeFailureWindowMs: number;
  /** M: consecutive successes required per recovery step */
  recoverySuccessThreshold: number;
  hardBurnRateThreshold: number;
  /** Named SLO windows in ms; must contain `short` and `long` */
  sloWindows: Record<string, number>;
  verificationProbes: number;
  stepTimeoutMs: number;
  stepMaxAttempts: number;
  stepInitialBackoffMs: number;
  stepMaxBackoffMs: number;
  escalationIntervalMs: number;
}

export interface CandidateRegion {
  regionId: RegionId;
  role: RegionRole;
  healthEndpoint: string;
  /** Base URL of the region's control plane (promotion/routing adapters) */
  controlUrl?: string;
}

export interface ServiceDefinition {
  id: ServiceId;
  /** Failover priority order */
  candidates: readonly CandidateRegion[];
  slo: SloTarget;
  rtoMs: number;
  rpoMs: number;
  thresholds: ControllerThresholds;
}

export interface RegionDefinition {
  id: RegionId;
  displayName?: string;
}

export interface FleetDefinition {
  regions: readonly RegionDefinition[];
  services: readonly ServiceDefinition[];
}

export interface ErrorBudget {
  serviceId: ServiceId;
  regionId?: RegionId;
  window: string;
  windowStart: EpochMs;
  windowEnd: EpochMs;
  totalEvents: number;
  allowedFailures: number;
  consumedFailures: number;
  remainingFailures: number;
  compliance: number;
  burnRate: number;
}
