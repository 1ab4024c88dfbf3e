/**
 * Region State Store
 *
 * Authoritative believed state of every (service, region) pair and the
 * active primary of each service. Reads are free; every write is a
 * compare-and-set against the state the writer last saw, and a mismatch
 * raises ConflictError. Records handed out are frozen copies.
 */

import { ConflictError, ControllerError, ErrorCode } from '@regionguard/core';
import { systemClock } from '@regionguard/types';
import type {
  Clock,
  ProbeSample,
  RegionId,
  RegionRecord,
  RegionState,
  ServiceDefinition,
  ServiceId
} from '@regionguard/types';
import type { ControllerEventSink } from '../alerts/notifier';

export interface RegionStatePatch {
  consecutiveFailures?: number;
}

export interface ServiceSnapshot {
  serviceId: ServiceId;
  primary: RegionId;
  regions: RegionRecord[];
}

export interface RegionStateStoreDeps {
  sink?: ControllerEventSink;
  clock?: Clock;
}

interface ServiceTable {
  primary: RegionId;
  /** Candidate order preserved */
  regions: Map<RegionId, Readonly<RegionRecord>>;
}

export class RegionStateStore {
  private readonly services = new Map<ServiceId, ServiceTable>();
  private readonly sink?: ControllerEventSink;
  private readonly clock: Clock;

  constructor(deps: RegionStateStoreDeps = {}) {
    this.sink = deps.sink;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Seed records for a service: every candidate starts healthy with its
   * configured role.
   */
  register(service: ServiceDefinition): void {
    const regions = new Map<RegionId, Readonly<RegionRecord>>();
    let primary: RegionId | undefined;

    for (const candidate of service.candidates) {
      regions.set(candidate.regionId, Object.freeze({
        serviceId: service.id,
        regionId: candidate.regionId,
        role: candidate.role,
        state: 'healthy',
        lastProbeAt: null,
        consecutiveFailures: 0,
        version: 0
      }));
      if (candidate.role === 'primary') {
        primary = candidate.regionId;
      }
    }

    if (primary === undefined) {
      throw new ControllerError(`Service ${service.id} has no primary candidate`, ErrorCode.INVALID_ARGUMENT);
    }
    this.services.set(service.id, { primary, regions });
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  get(serviceId: ServiceId, regionId: RegionId): Readonly<RegionRecord> | undefined {
    return this.services.get(serviceId)?.regions.get(regionId);
  }

  require(serviceId: ServiceId, regionId: RegionId): Readonly<RegionRecord> {
    const record = this.get(serviceId, regionId);
    if (!record) {
      throw new ControllerError(`Unknown region ${regionId} for service ${serviceId}`, ErrorCode.NOT_FOUND, {
        context: { serviceId, regionId }
      });
    }
    return record;
  }

  list(serviceId: ServiceId): Readonly<RegionRecord>[] {
    return [...this.requireTable(serviceId).regions.values()];
  }

  getPrimary(serviceId: ServiceId): RegionId {
    return this.requireTable(serviceId).primary;
  }

  hasService(serviceId: ServiceId): boolean {
    return this.services.has(serviceId);
  }

  snapshot(): ServiceSnapshot[] {
    return [...this.services.entries()].map(([serviceId, table]) => ({
      serviceId,
      primary: table.primary,
      regions: [...table.regions.values()]
    }));
  }

  // ===========================================================================
  // Compare-and-set writes
  // ===========================================================================

  transition(
    serviceId: ServiceId,
    regionId: RegionId,
    expectedState: RegionState,
    nextState: RegionState,
    patch: RegionStatePatch = {}
  ): Readonly<RegionRecord> {
    const current = this.expect(serviceId, regionId, expectedState);
    const next = this.write(current, { state: nextState, ...patch });

    if (current.state !== nextState) {
      this.sink?.emit({
        type: 'region_state_changed',
        serviceId,
        regionId,
        from: current.state,
        to: nextState,
        timestamp: this.clock.now()
      });
    }
    return next;
  }

  recordProbe(
    serviceId: ServiceId,
    regionId: RegionId,
    expectedState: RegionState,
    sample: ProbeSample
  ): Readonly<RegionRecord> {
    const current = this.expect(serviceId, regionId, expectedState);
    return this.write(current, {
      lastProbeAt: sample.timestamp,
      consecutiveFailures: sample.outcome === 'success' ? 0 : current.consecutiveFailures + 1
    });
  }

  /**
   * Move the primary role. The new primary takes role `primary`, the old
   * one becomes `standby`.
   */
  setPrimary(serviceId: ServiceId, expectedPrimary: RegionId, nextPrimary: RegionId): void {
    const table = this.requireTable(serviceId);
    if (table.primary !== expectedPrimary) {
      throw new ConflictError(`${serviceId}/primary`, expectedPrimary, table.primary);
    }
    const incoming = this.require(serviceId, nextPrimary);
    const outgoing = this.require(serviceId, expectedPrimary);

    if (expectedPrimary !== nextPrimary) {
      this.write(outgoing, { role: 'standby' });
      this.write(incoming, { role: 'primary' });
    }
    table.primary = nextPrimary;
  }

  private expect(serviceId: ServiceId, regionId: RegionId, expectedState: RegionState): Readonly<RegionRecord> {
    const current = this.require(serviceId, regionId);
    if (current.state !== expectedState) {
      throw new ConflictError(`${serviceId}/${regionId}`, expectedState, current.state);
    }
    return current;
  }

  private write(current: Readonly<RegionRecord>, changes: Partial<RegionRecord>): Readonly<RegionRecord> {
    const next = Object.freeze({ ...current, ...changes, version: current.version + 1 });
    this.requireTable(current.serviceId).regions.set(current.regionId, next);
    return next;
  }

  private requireTable(serviceId: ServiceId): ServiceTable {
    const table = this.services.get(serviceId);
    if (!table) {
      throw new ControllerError(`Unknown service ${serviceId}`, ErrorCode.NOT_FOUND, { context: { serviceId } });
    }
    return table;
  }
}

/**
 * Run a read-then-write against the store; on ConflictError re-read and
 * try once more. A second conflict is rethrown and the caller defers to
 * its next tick.
 */
export function withConflictRetry<T>(attempt: () => T): T {
  try {
    return attempt();
  } catch (error) {
    if (error instanceof ConflictError) {
      return attempt();
    }
    throw error;
  }
}
