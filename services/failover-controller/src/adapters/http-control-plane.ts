/**
 * HTTP Control Plane Adapter
 *
 * Implements the promotion, traffic and replication capabilities against
 * a per-region control API:
 *
 *   POST {controlUrl}/services/{serviceId}/promote        → { outcome }
 *   POST {controlUrl}/services/{serviceId}/demote
 *   POST {controlUrl}/services/{serviceId}/writes/quiesce
 *   POST {controlUrl}/services/{serviceId}/writes/resume
 *   POST {controlUrl}/services/{serviceId}/traffic/activate
 *   GET  {controlUrl}/services/{serviceId}/replication     → { lagMs }
 */

import { z } from 'zod';
import { ConfigurationError, ControllerError, ErrorCode, createLogger } from '@regionguard/core';
import type { ServiceLogger } from '@regionguard/core';
import type { RegionId, ServiceDefinition, ServiceId } from '@regionguard/types';
import type {
  FailoverCapabilities,
  PromotionApi,
  PromotionOutcome,
  ReplicationMonitor,
  TrafficManagerApi
} from '../execution/capabilities';

const PromoteResponseSchema = z.object({
  outcome: z.enum(['promoted', 'already_primary'])
});

const ReplicationResponseSchema = z.object({
  lagMs: z.number().min(0)
});

export interface HttpControlPlaneDeps {
  fetchImpl?: typeof fetch;
  logger?: ServiceLogger;
}

export class HttpControlPlane implements PromotionApi, TrafficManagerApi, ReplicationMonitor {
  private readonly urls = new Map<string, string>();
  private readonly fetchImpl: typeof fetch;
  private readonly logger: ServiceLogger;

  /**
   * Every candidate of every service must declare a controlUrl.
   */
  constructor(services: readonly ServiceDefinition[], deps: HttpControlPlaneDeps = {}) {
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.logger = deps.logger ?? createLogger('control-plane');

    const missing: string[] = [];
    for (const service of services) {
      for (const candidate of service.candidates) {
        if (candidate.controlUrl) {
          this.urls.set(key(service.id, candidate.regionId), candidate.controlUrl.replace(/\/+$/, ''));
        } else {
          missing.push(`services.${service.id}: candidate ${candidate.regionId} has no controlUrl`);
        }
      }
    }
    if (missing.length > 0) {
      throw new ConfigurationError('HTTP control plane needs a controlUrl per candidate', missing);
    }
  }

  capabilities(): FailoverCapabilities {
    return { promotion: this, traffic: this, replication: this };
  }

  async promote(serviceId: ServiceId, regionId: RegionId, signal?: AbortSignal): Promise<PromotionOutcome> {
    const body = await this.request('POST', serviceId, regionId, 'promote', signal);
    const parsed = PromoteResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw this.invalidResponse('promote', serviceId, regionId);
    }
    return parsed.data.outcome;
  }

  async demote(serviceId: ServiceId, regionId: RegionId, signal?: AbortSignal): Promise<void> {
    await this.request('POST', serviceId, regionId, 'demote', signal);
  }

  async quiesceWrites(serviceId: ServiceId, regionId: RegionId, signal?: AbortSignal): Promise<void> {
    await this.request('POST', serviceId, regionId, 'writes/quiesce', signal);
  }

  async resumeWrites(serviceId: ServiceId, regionId: RegionId, signal?: AbortSignal): Promise<void> {
    await this.request('POST', serviceId, regionId, 'writes/resume', signal);
  }

  async routeTo(serviceId: ServiceId, regionId: RegionId, signal?: AbortSignal): Promise<void> {
    await this.request('POST', serviceId, regionId, 'traffic/activate', signal);
  }

  async getReplicationLagMs(serviceId: ServiceId, regionId: RegionId, signal?: AbortSignal): Promise<number> {
    const body = await this.request('GET', serviceId, regionId, 'replication', signal);
    const parsed = ReplicationResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw this.invalidResponse('replication', serviceId, regionId);
    }
    return parsed.data.lagMs;
  }

  private async request(
    method: 'GET' | 'POST',
    serviceId: ServiceId,
    regionId: RegionId,
    action: string,
    signal?: AbortSignal
  ): Promise<unknown> {
    const base = this.urls.get(key(serviceId, regionId));
    if (!base) {
      throw new ControllerError(`No control URL for ${serviceId}/${regionId}`, ErrorCode.NOT_FOUND, {
        context: { serviceId, regionId }
      });
    }
    const url = `${base}/services/${encodeURIComponent(serviceId)}/${action}`;

    const response = await this.fetchImpl(url, {
      method,
      headers: { Accept: 'application/json', 'Content-Type': 'application/json' },
      body: method === 'POST' ? '{}' : undefined,
      signal
    });

    if (!response.ok) {
      this.logger.warn(`Control plane ${method} ${action} failed`, { serviceId, regionId, status: response.status });
      throw new ControllerError(`Control plane ${method} ${url} returned HTTP ${response.status}`, ErrorCode.UNKNOWN_ERROR, {
        context: { serviceId, regionId, status: response.status }
      });
    }

    const text = await response.text();
    if (text.length === 0) {
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      throw this.invalidResponse(action, serviceId, regionId);
    }
  }

  private invalidResponse(action: string, serviceId: ServiceId, regionId: RegionId): ControllerError {
    return new ControllerError(`Control plane ${action} for ${serviceId}/${regionId} returned an invalid body`, ErrorCode.UNKNOWN_ERROR, {
      context: { serviceId, regionId, action }
    });
  }
}

function key(serviceId: ServiceId, regionId: RegionId): string {
  return `${serviceId}/${regionId}`;
}
