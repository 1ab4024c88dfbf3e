/**
 * Probe Scheduler
 *
 * One interval per (service, region). A tick that finds the previous
 * probe for the same pair still in flight is suppressed, so a slow
 * region never accumulates concurrent probes.
 */

import { clearIntervalSafe, createLogger, getErrorMessage } from '@regionguard/core';
import type { ServiceLogger } from '@regionguard/core';
import type { ProbeSample, RegionId, ServiceId } from '@regionguard/types';
import type { HealthEndpoint } from './health-endpoint';
import type { HealthProbe } from './health-probe';

export interface ProbeTarget {
  serviceId: ServiceId;
  regionId: RegionId;
  endpoint: HealthEndpoint;
  intervalMs: number;
  timeoutMs: number;
}

export interface ProbeSchedulerDeps {
  probe: HealthProbe;
  onSample: (sample: ProbeSample) => void;
  logger?: ServiceLogger;
}

interface ScheduledProbe {
  target: ProbeTarget;
  interval: NodeJS.Timeout | null;
  inFlight: Promise<void> | null;
  suppressed: number;
}

export class ProbeScheduler {
  private readonly probes = new Map<string, ScheduledProbe>();
  private readonly logger: ServiceLogger;
  private isRunning = false;

  constructor(targets: readonly ProbeTarget[], private readonly deps: ProbeSchedulerDeps) {
    this.logger = deps.logger ?? createLogger('probe-scheduler');
    for (const target of targets) {
      this.probes.set(`${target.serviceId}/${target.regionId}`, {
        target,
        interval: null,
        inFlight: null,
        suppressed: 0
      });
    }
  }

  start(): void {
    if (this.isRunning) {
      this.logger.warn('ProbeScheduler already running');
      return;
    }
    this.isRunning = true;

    for (const scheduled of this.probes.values()) {
      scheduled.interval = setInterval(() => this.runProbe(scheduled), scheduled.target.intervalMs);
    }
    this.logger.info('Probe scheduler started', { targets: this.probes.size });
  }

  /**
   * Stop scheduling and wait for in-flight probes (each bounded by its timeout).
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }
    this.isRunning = false;

    const pending: Promise<void>[] = [];
    for (const scheduled of this.probes.values()) {
      scheduled.interval = clearIntervalSafe(scheduled.interval);
      if (scheduled.inFlight) {
        pending.push(scheduled.inFlight);
      }
    }
    await Promise.allSettled(pending);
    this.logger.info('Probe scheduler stopped');
  }

  /**
   * Probe one pair immediately. Returns false when suppressed.
   */
  probeNow(serviceId: ServiceId, regionId: RegionId): boolean {
    const scheduled = this.probes.get(`${serviceId}/${regionId}`);
    if (!scheduled) {
      return false;
    }
    return this.runProbe(scheduled);
  }

  getSuppressedCount(serviceId: ServiceId, regionId: RegionId): number {
    return this.probes.get(`${serviceId}/${regionId}`)?.suppressed ?? 0;
  }

  /**
   * Resolves once every probe currently in flight has delivered its sample.
   */
  async whenIdle(): Promise<void> {
    const pending = [...this.probes.values()]
      .map(scheduled => scheduled.inFlight)
      .filter((inFlight): inFlight is Promise<void> => inFlight !== null);
    await Promise.allSettled(pending);
  }

  private runProbe(scheduled: ScheduledProbe): boolean {
    const { target } = scheduled;

    if (scheduled.inFlight) {
      scheduled.suppressed++;
      this.logger.debug('Probe suppressed, previous still in flight', {
        serviceId: target.serviceId,
        regionId: target.regionId,
        suppressed: scheduled.suppressed
      });
      return false;
    }

    scheduled.inFlight = this.deps.probe
      .probe(target.serviceId, target.regionId, target.endpoint, target.timeoutMs)
      .then(sample => {
        this.deps.onSample(sample);
      })
      .catch((error: unknown) => {
        this.logger.error('Probe sample delivery failed', {
          serviceId: target.serviceId,
          regionId: target.regionId,
          error: getErrorMessage(error)
        });
      })
      .finally(() => {
        scheduled.inFlight = null;
      });

    return true;
  }
}
