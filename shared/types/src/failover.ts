/**
 * Failover Types
 *
 * Failure detector states, coordinator states, failover events and the
 * override signals accepted by the coordinator.
 */

import type { EpochMs, RegionId, ServiceId } from './common';
import type { RegionState } from './fleet';

export type DetectorState =
  | 'healthy'
  | 'suspected_degraded'
  | 'degraded'
  | 'unreachable'
  | 'recovering';

export interface DetectorTransition {
  serviceId: ServiceId;
  regionId: RegionId;
  from: DetectorState;
  to: DetectorState;
  reason: string;
  timestamp: EpochMs;
}

// =============================================================================
// Coordinator
// =============================================================================

export type CoordinatorState =
  | { kind: 'stable'; primary: RegionId }
  | { kind: 'evaluating'; primary: RegionId; since: EpochMs; reason: string }
  | { kind: 'failover_in_progress'; primary: RegionId; target: RegionId; eventId: string }
  | { kind: 'verifying'; primary: RegionId; target: RegionId; eventId: string }
  | { kind: 'rolling_back'; primary: RegionId; target: RegionId; eventId: string }
  | { kind: 'aborted'; primary: RegionId; reason: string; eventId?: string };

export type CoordinatorStateKind = CoordinatorState['kind'];

// =============================================================================
// Failover Events
// =============================================================================

export type FailoverPhase =
  | 'in_progress'
  | 'verifying'
  | 'rolling_back'
  | 'completed'
  | 'rolled_back'
  | 'aborted';

export const TERMINAL_FAILOVER_PHASES: ReadonlySet<FailoverPhase> = new Set<FailoverPhase>([
  'completed',
  'rolled_back',
  'aborted'
]);

export function isTerminalPhase(phase: FailoverPhase): boolean {
  return TERMINAL_FAILOVER_PHASES.has(phase);
}

export type StepStatus =
  | 'pending'
  | 'running'
  | 'succeeded'
  | 'skipped'
  | 'failed'
  | 'cancelled'
  | 'compensated'
  | 'compensation_failed';

export interface StepRecord {
  name: string;
  status: StepStatus;
  attempts: number;
  startedAt?: EpochMs;
  finishedAt?: EpochMs;
  error?: string;
  detail?: string;
}

export type FailoverTrigger = 'automatic' | 'manual';

export interface FailoverEvent {
  id: string;
  serviceId: ServiceId;
  fromRegion: RegionId;
  toRegion: RegionId;
  trigger: FailoverTrigger;
  reason: string;
  triggeredAt: EpochMs;
  phase: FailoverPhase;
  steps: StepRecord[];
  /** Replication lag of the target when it was selected */
  replicationLagMs?: number;
  /** State of the target before it was marked promoting; restored after an abort */
  targetStateBefore?: RegionState;
  /** Operator who aborted the event */
  cancelledBy?: string;
  completedAt?: EpochMs;
}

// =============================================================================
// Manual Overrides
// =============================================================================

export type OverrideKind = 'block' | 'force_failover' | 'abort' | 'clear_abort';

export interface OverrideSignal {
  kind: OverrideKind;
  serviceId: ServiceId;
  /** Operator identity, resolved by the authorizer */
  operator: string;
  /** Credential presented with the signal */
  credential: string;
  reason: string;
  targetRegion?: RegionId;
}

export interface OverrideResult {
  accepted: boolean;
  state: CoordinatorState;
  eventId?: string;
  message: string;
}
