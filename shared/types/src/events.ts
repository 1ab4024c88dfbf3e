/**
 * Controller Event Registry
 *
 * Typed registry of every structured event the controller emits to the
 * notification sink. Use these constants instead of string literals.
 */

import type { EpochMs, RegionId, ServiceId } from './common';
import type {
  CoordinatorState,
  DetectorTransition,
  FailoverEvent,
  FailoverPhase,
  OverrideKind,
  StepRecord
} from './failover';
import type { RegionState } from './fleet';

export const ControllerEventTypes = {
  DETECTOR_TRANSITION: 'detector_transition',
  REGION_STATE_CHANGED: 'region_state_changed',
  COORDINATOR_STATE_CHANGED: 'coordinator_state_changed',
  FAILOVER_PHASE_CHANGED: 'failover_phase_changed',
  FAILOVER_STEP: 'failover_step',
  ESCALATION: 'escalation',
  OVERRIDE_APPLIED: 'override_applied'
} as const;

export type ControllerEventType = typeof ControllerEventTypes[keyof typeof ControllerEventTypes];

export type EscalationSeverity = 'warning' | 'critical';

interface EventBase {
  serviceId: ServiceId;
  timestamp: EpochMs;
}

export type ControllerEvent =
  | (EventBase & { type: 'detector_transition'; transition: DetectorTransition })
  | (EventBase & { type: 'region_state_changed'; regionId: RegionId; from: RegionState; to: RegionState })
  | (EventBase & { type: 'coordinator_state_changed'; from: CoordinatorState; to: CoordinatorState })
  | (EventBase & { type: 'failover_phase_changed'; eventId: string; phase: FailoverPhase; event: FailoverEvent })
  | (EventBase & { type: 'failover_step'; eventId: string; step: StepRecord })
  | (EventBase & { type: 'escalation'; severity: EscalationSeverity; message: string; details?: Record<string, unknown> })
  | (EventBase & { type: 'override_applied'; kind: OverrideKind; operator: string; accepted: boolean; message: string });

/**
 * Redis key layout used by the failover event journal.
 */
export const JournalKeys = {
  event: (eventId: string) => `regionguard:failover:event:${eventId}`,
  live: (serviceId: ServiceId) => `regionguard:failover:live:${serviceId}`,
  history: (serviceId: ServiceId) => `regionguard:failover:history:${serviceId}`
} as const;
