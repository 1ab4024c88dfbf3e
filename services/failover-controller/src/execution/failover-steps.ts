/**
 * Failover step definitions and the default step sequence.
 */

import type { RegionId, RegionState, ServiceId } from '@regionguard/types';
import type { FailoverCapabilities } from './capabilities';

export interface StepContext {
  eventId: string;
  serviceId: ServiceId;
  fromRegion: RegionId;
  toRegion: RegionId;
  regionState(regionId: RegionId): RegionState | undefined;
}

export interface FailoverStep {
  name: string;
  /** Overrides the executor's default step timeout */
  timeoutMs?: number;
  /** A step that does not apply is recorded as skipped */
  shouldRun?(context: StepContext): boolean;
  /** Resolves with an optional detail recorded on the step */
  run(context: StepContext, signal: AbortSignal): Promise<string | void>;
  compensate(context: StepContext, signal: AbortSignal): Promise<void>;
}

export const DEFAULT_STEP_NAMES = ['quiesce_writes', 'promote_database', 'update_routing', 'resume_writes'] as const;

export function createDefaultSteps(capabilities: FailoverCapabilities): FailoverStep[] {
  const { promotion, traffic } = capabilities;

  return [
    {
      name: 'quiesce_writes',
      // An unreachable primary cannot accept the request
      shouldRun: context => context.regionState(context.fromRegion) !== 'unreachable',
      run: async (context, signal) => {
        await promotion.quiesceWrites(context.serviceId, context.fromRegion, signal);
      },
      compensate: (context, signal) => promotion.resumeWrites(context.serviceId, context.fromRegion, signal)
    },
    {
      name: 'promote_database',
      run: async (context, signal) => promotion.promote(context.serviceId, context.toRegion, signal),
      compensate: (context, signal) => promotion.demote(context.serviceId, context.toRegion, signal)
    },
    {
      name: 'update_routing',
      run: async (context, signal) => {
        await traffic.routeTo(context.serviceId, context.toRegion, signal);
      },
      compensate: (context, signal) => traffic.routeTo(context.serviceId, context.fromRegion, signal)
    },
    {
      name: 'resume_writes',
      run: async (context, signal) => {
        await promotion.resumeWrites(context.serviceId, context.toRegion, signal);
      },
      compensate: (context, signal) => promotion.quiesceWrites(context.serviceId, context.toRegion, signal)
    }
  ];
}
