/**
 * SLO Tracker
 *
 * Keeps an ordered sample log per service and derives compliance, burn
 * rate and error budgets over any named window. Every figure is a pure
 * function of the retained samples: nothing is cached between calls.
 *
 * Evaluation time is the newest sample of the service unless the caller
 * passes `now`. A window covers (now - windowMs, now].
 */

import { ControllerError, ErrorCode } from '@regionguard/core';
import type {
  EpochMs,
  ErrorBudget,
  ProbeSample,
  RegionId,
  ServiceDefinition,
  ServiceId,
  SloTarget
} from '@regionguard/types';

interface ServiceLog {
  slo: SloTarget;
  windows: Readonly<Record<string, number>>;
  retentionMs: number;
  samples: ProbeSample[];
}

interface WindowCounts {
  total: number;
  good: number;
  windowStart: EpochMs;
  windowEnd: EpochMs;
}

export function isGoodSample(sample: ProbeSample, slo: SloTarget): boolean {
  if (sample.outcome !== 'success') return false;
  return slo.latencyCeilingMs === undefined || sample.latencyMs <= slo.latencyCeilingMs;
}

/**
 * 0 while compliance meets the target, (1 - compliance) / (1 - target) below it.
 * A burn rate of 1 spends the budget exactly over the window.
 */
export function computeBurnRate(compliance: number, target: number): number {
  if (compliance >= target) return 0;
  return (1 - compliance) / (1 - target);
}

export class SloTracker {
  private readonly logs = new Map<ServiceId, ServiceLog>();

  constructor(services: readonly ServiceDefinition[] = []) {
    for (const service of services) {
      this.register(service);
    }
  }

  register(service: ServiceDefinition): void {
    const windows = service.thresholds.sloWindows;
    this.logs.set(service.id, {
      slo: service.slo,
      windows,
      retentionMs: Math.max(...Object.values(windows)),
      samples: []
    });
  }

  record(sample: ProbeSample): void {
    const log = this.requireLog(sample.serviceId);
    const { samples } = log;

    // Samples from parallel probes can arrive slightly out of order
    let index = samples.length;
    while (index > 0 && samples[index - 1].timestamp > sample.timestamp) {
      index--;
    }
    samples.splice(index, 0, sample);

    const newest = samples[samples.length - 1].timestamp;
    const cutoff = newest - log.retentionMs;
    let evict = 0;
    while (evict < samples.length && samples[evict].timestamp <= cutoff) {
      evict++;
    }
    if (evict > 0) {
      samples.splice(0, evict);
    }
  }

  compliance(serviceId: ServiceId, window: string, regionId?: RegionId, now?: EpochMs): number {
    const counts = this.count(serviceId, window, regionId, now);
    return counts.total === 0 ? 1 : counts.good / counts.total;
  }

  burnRate(serviceId: ServiceId, window: string, regionId?: RegionId, now?: EpochMs): number {
    const log = this.requireLog(serviceId);
    return computeBurnRate(this.compliance(serviceId, window, regionId, now), log.slo.target);
  }

  errorBudget(serviceId: ServiceId, window: string, regionId?: RegionId, now?: EpochMs): ErrorBudget {
    const log = this.requireLog(serviceId);
    const counts = this.count(serviceId, window, regionId, now);
    const compliance = counts.total === 0 ? 1 : counts.good / counts.total;
    const allowedFailures = counts.total * (1 - log.slo.target);
    const consumedFailures = counts.total - counts.good;

    return {
      serviceId,
      ...(regionId !== undefined ? { regionId } : {}),
      window,
      windowStart: counts.windowStart,
      windowEnd: counts.windowEnd,
      totalEvents: counts.total,
      allowedFailures,
      consumedFailures,
      remainingFailures: allowedFailures - consumedFailures,
      compliance,
      burnRate: computeBurnRate(compliance, log.slo.target)
    };
  }

  windowLength(serviceId: ServiceId, window: string): number {
    const length = this.requireLog(serviceId).windows[window];
    if (length === undefined) {
      throw new ControllerError(`Unknown SLO window "${window}" for service ${serviceId}`, ErrorCode.INVALID_ARGUMENT, {
        context: { serviceId, window }
      });
    }
    return length;
  }

  windowNames(serviceId: ServiceId): string[] {
    return Object.keys(this.requireLog(serviceId).windows);
  }

  sampleCount(serviceId: ServiceId): number {
    return this.requireLog(serviceId).samples.length;
  }

  private count(serviceId: ServiceId, window: string, regionId: RegionId | undefined, now: EpochMs | undefined): WindowCounts {
    const log = this.requireLog(serviceId);
    const length = this.windowLength(serviceId, window);
    const samples = log.samples;
    const windowEnd = now ?? (samples.length > 0 ? samples[samples.length - 1].timestamp : 0);
    const windowStart = windowEnd - length;

    let total = 0;
    let good = 0;
    for (let i = samples.length - 1; i >= 0; i--) {
      const sample = samples[i];
      if (sample.timestamp <= windowStart) break;
      if (sample.timestamp > windowEnd) continue;
      if (regionId !== undefined && sample.regionId !== regionId) continue;
      total++;
      if (isGoodSample(sample, log.slo)) good++;
    }

    return { total, good, windowStart, windowEnd };
  }

  private requireLog(serviceId: ServiceId): ServiceLog {
    const log = this.logs.get(serviceId);
    if (!log) {
      throw new ControllerError(`Unknown service ${serviceId}`, ErrorCode.NOT_FOUND, { context: { serviceId } });
    }
    return log;
  }
}
