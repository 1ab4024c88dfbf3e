/**
 * Failure Detector
 *
 * Per (service, region) hysteresis over probe samples:
 *
 *   healthy → suspected_degraded → degraded → unreachable
 *   degraded | unreachable → recovering → healthy
 *
 * At most one transition per sample. Accepted transitions are written to
 * the region state store and emitted to the sink; the detector never
 * starts a failover itself.
 */

import { createLogger } from '@regionguard/core';
import type { ServiceLogger } from '@regionguard/core';
import { systemClock } from '@regionguard/types';
import type {
  Clock,
  DetectorState,
  DetectorTransition,
  EpochMs,
  ProbeSample,
  RegionId,
  RegionState,
  ServiceDefinition,
  ServiceId
} from '@regionguard/types';
import type { ControllerEventSink } from '../alerts/notifier';
import type { SloTracker } from '../slo/slo-tracker';
import { withConflictRetry } from '../state/region-state-store';
import type { RegionStateStore } from '../state/region-state-store';

export const SHORT_WINDOW = 'short';

interface RegionTracker {
  state: DetectorState;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  /** Timestamps of the current failure run, oldest first, capped at N */
  recentFailures: EpochMs[];
  failureRunStart: EpochMs | null;
  /** When the short-window burn rate last rose above the hard threshold */
  hardBurnSince: EpochMs | null;
}

export interface FailureDetectorDeps {
  store: RegionStateStore;
  slo: SloTracker;
  sink?: ControllerEventSink;
  logger?: ServiceLogger;
  clock?: Clock;
}

/**
 * Region state written for each detector state.
 */
export function toRegionState(state: DetectorState): RegionState {
  switch (state) {
    case 'healthy':
      return 'healthy';
    case 'unreachable':
      return 'unreachable';
    case 'suspected_degraded':
    case 'degraded':
    case 'recovering':
      return 'degraded';
  }
}

export class FailureDetector {
  private readonly services = new Map<ServiceId, ServiceDefinition>();
  private readonly trackers = new Map<string, RegionTracker>();
  private readonly logger: ServiceLogger;
  private readonly clock: Clock;

  constructor(private readonly deps: FailureDetectorDeps) {
    this.logger = deps.logger ?? createLogger('failure-detector');
    this.clock = deps.clock ?? systemClock;
  }

  register(service: ServiceDefinition): void {
    this.services.set(service.id, service);
    for (const candidate of service.candidates) {
      this.trackers.set(trackerKey(service.id, candidate.regionId), newTracker('healthy'));
    }
  }

  getState(serviceId: ServiceId, regionId: RegionId): DetectorState | undefined {
    return this.trackers.get(trackerKey(serviceId, regionId))?.state;
  }

  /**
   * Feed one sample. The SLO tracker must already hold it.
   */
  evaluate(sample: ProbeSample): DetectorTransition | null {
    const service = this.services.get(sample.serviceId);
    const tracker = this.trackers.get(trackerKey(sample.serviceId, sample.regionId));
    if (!service || !tracker) {
      this.logger.warn('Sample for unknown service/region ignored', {
        serviceId: sample.serviceId,
        regionId: sample.regionId
      });
      return null;
    }

    const { store } = this.deps;
    withConflictRetry(() => {
      const record = store.require(sample.serviceId, sample.regionId);
      return store.recordProbe(sample.serviceId, sample.regionId, record.state, sample);
    });

    // A region the coordinator marked failed must earn its way back through recovery
    const stored = store.require(sample.serviceId, sample.regionId).state;
    if (stored === 'failed' && (tracker.state === 'healthy' || tracker.state === 'suspected_degraded')) {
      Object.assign(tracker, newTracker('degraded'));
    }

    this.updateCounters(tracker, sample, service);

    const decision = this.decide(tracker, sample, service);
    if (!decision) {
      return null;
    }

    const transition: DetectorTransition = {
      serviceId: sample.serviceId,
      regionId: sample.regionId,
      from: tracker.state,
      to: decision.to,
      reason: decision.reason,
      timestamp: sample.timestamp
    };

    tracker.state = decision.to;
    if (decision.to === 'recovering') {
      // Recovery to healthy needs M further successes
      tracker.consecutiveSuccesses = 0;
    }

    this.writeRegionState(transition);

    this.logger.info(`Region ${sample.regionId} ${transition.from} -> ${transition.to}`, {
      serviceId: sample.serviceId,
      regionId: sample.regionId,
      reason: transition.reason
    });
    this.deps.sink?.emit({
      type: 'detector_transition',
      serviceId: sample.serviceId,
      transition,
      timestamp: this.clock.now()
    });

    return transition;
  }

  private updateCounters(tracker: RegionTracker, sample: ProbeSample, service: ServiceDefinition): void {
    const { thresholds } = service;

    if (sample.outcome === 'success') {
      tracker.consecutiveSuccesses++;
      tracker.consecutiveFailures = 0;
      tracker.recentFailures = [];
      tracker.failureRunStart = null;
    } else {
      tracker.consecutiveFailures++;
      tracker.consecutiveSuccesses = 0;
      tracker.failureRunStart ??= sample.timestamp;
      tracker.recentFailures.push(sample.timestamp);
      if (tracker.recentFailures.length > thresholds.degradeFailureThreshold) {
        tracker.recentFailures.shift();
      }
    }

    const burn = this.shortBurn(sample);
    if (burn > thresholds.hardBurnRateThreshold) {
      tracker.hardBurnSince ??= sample.timestamp;
    } else {
      tracker.hardBurnSince = null;
    }
  }

  private decide(
    tracker: RegionTracker,
    sample: ProbeSample,
    service: ServiceDefinition
  ): { to: DetectorState; reason: string } | null {
    const { thresholds } = service;
    const failed = sample.outcome !== 'success';
    const n = thresholds.degradeFailureThreshold;
    const m = thresholds.recoverySuccessThreshold;

    switch (tracker.state) {
      case 'healthy': {
        if (failed) {
          return { to: 'suspected_degraded', reason: `probe ${sample.outcome}` };
        }
        const burn = this.shortBurn(sample);
        if (burn > 1) {
          return { to: 'suspected_degraded', reason: `short-window burn rate ${formatRate(burn)} above 1` };
        }
        return null;
      }

      case 'suspected_degraded': {
        if (failed && tracker.consecutiveFailures >= n && tracker.recentFailures.length >= n) {
          const span = sample.timestamp - tracker.recentFailures[0];
          if (span <= thresholds.degradeFailureWindowMs) {
            return { to: 'degraded', reason: `${n} consecutive failures within ${span}ms` };
          }
        }
        if (!failed && tracker.consecutiveSuccesses >= m && this.shortBurn(sample) <= 1) {
          return { to: 'healthy', reason: `${m} consecutive successes` };
        }
        return null;
      }

      case 'degraded': {
        const shortWindowMs = this.deps.slo.windowLength(sample.serviceId, SHORT_WINDOW);
        if (tracker.hardBurnSince !== null && sample.timestamp - tracker.hardBurnSince >= shortWindowMs) {
          return {
            to: 'unreachable',
            reason: `short-window burn rate above ${thresholds.hardBurnRateThreshold} for ${sample.timestamp - tracker.hardBurnSince}ms`
          };
        }
        if (failed && tracker.failureRunStart !== null && sample.timestamp - tracker.failureRunStart >= service.rtoMs / 2) {
          return {
            to: 'unreachable',
            reason: `failing continuously for ${sample.timestamp - tracker.failureRunStart}ms (half the RTO)`
          };
        }
        if (!failed && tracker.consecutiveSuccesses >= m) {
          return { to: 'recovering', reason: `${m} consecutive successes` };
        }
        return null;
      }

      case 'unreachable':
        if (!failed && tracker.consecutiveSuccesses >= m) {
          return { to: 'recovering', reason: `${m} consecutive successes` };
        }
        return null;

      case 'recovering':
        if (failed) {
          return { to: 'degraded', reason: `probe ${sample.outcome} while recovering` };
        }
        if (tracker.consecutiveSuccesses >= m && this.shortBurn(sample) <= 1) {
          return { to: 'healthy', reason: `${m} further consecutive successes` };
        }
        return null;
    }
  }

  private writeRegionState(transition: DetectorTransition): void {
    const { store } = this.deps;
    const target = toRegionState(transition.to);

    withConflictRetry(() => {
      const current = store.require(transition.serviceId, transition.regionId).state;
      // Promotions belong to the coordinator
      if (current === 'promoting' || current === target) {
        return current;
      }
      store.transition(transition.serviceId, transition.regionId, current, target);
      return target;
    });
  }

  private shortBurn(sample: ProbeSample): number {
    return this.deps.slo.burnRate(sample.serviceId, SHORT_WINDOW, sample.regionId, sample.timestamp);
  }
}

function trackerKey(serviceId: ServiceId, regionId: RegionId): string {
  return `${serviceId}/${regionId}`;
}

function newTracker(state: DetectorState): RegionTracker {
  return {
    state,
    consecutiveFailures: 0,
    consecutiveSuccesses: 0,
    recentFailures: [],
    failureRunStart: null,
    hardBurnSince: null
  };
}

function formatRate(rate: number): string {
  return rate.toFixed(2);
}
