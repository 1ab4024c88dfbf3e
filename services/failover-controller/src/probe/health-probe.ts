/**
 * Health Probe
 *
 * Turns one health check into exactly one ProbeSample. Never throws and
 * never waits past its timeout, even when the endpoint ignores the abort
 * signal.
 */

import {
  ProbeFailureError,
  ProbeTimeoutError,
  TimeoutError,
  createLogger,
  getErrorMessage,
  withTimeout
} from '@regionguard/core';
import type { ServiceLogger } from '@regionguard/core';
import { systemClock } from '@regionguard/types';
import type { Clock, ProbeSample, RegionId, ServiceId } from '@regionguard/types';
import type { HealthEndpoint } from './health-endpoint';

export interface HealthProbeDeps {
  logger?: ServiceLogger;
  clock?: Clock;
}

export class HealthProbe {
  private readonly logger: ServiceLogger;
  private readonly clock: Clock;

  constructor(deps: HealthProbeDeps = {}) {
    this.logger = deps.logger ?? createLogger('health-probe');
    this.clock = deps.clock ?? systemClock;
  }

  async probe(
    serviceId: ServiceId,
    regionId: RegionId,
    endpoint: HealthEndpoint,
    timeoutMs: number
  ): Promise<ProbeSample> {
    const startedAt = this.clock.now();
    const controller = new AbortController();

    try {
      const result = await withTimeout(endpoint.check(controller.signal), timeoutMs, `probe ${serviceId}/${regionId}`);
      const latencyMs = result.latencyMs ?? this.clock.now() - startedAt;

      if (result.healthy) {
        return { serviceId, regionId, timestamp: this.clock.now(), outcome: 'success', latencyMs };
      }

      const failure = new ProbeFailureError(serviceId, regionId, result.detail ?? 'endpoint reported unhealthy');
      this.logger.debug(failure.message, { serviceId, regionId });
      return { serviceId, regionId, timestamp: this.clock.now(), outcome: 'failure', latencyMs, error: failure.message };
    } catch (error) {
      if (error instanceof TimeoutError) {
        controller.abort(error);
        const timeout = new ProbeTimeoutError(serviceId, regionId, timeoutMs);
        this.logger.debug(timeout.message, { serviceId, regionId });
        return { serviceId, regionId, timestamp: this.clock.now(), outcome: 'timeout', latencyMs: timeoutMs, error: timeout.message };
      }

      const failure = new ProbeFailureError(serviceId, regionId, getErrorMessage(error));
      this.logger.debug(failure.message, { serviceId, regionId });
      return {
        serviceId,
        regionId,
        timestamp: this.clock.now(),
        outcome: 'failure',
        latencyMs: this.clock.now() - startedAt,
        error: failure.message
      };
    }
  }
}
