/**
 * Capability interfaces to the systems a failover drives. The controller
 * knows nothing about their internals; adapters implement these.
 */

import type { RegionId, ServiceId } from '@regionguard/types';

export type PromotionOutcome = 'promoted' | 'already_primary';

export interface PromotionApi {
  /** Make the region's replica the writable primary. Idempotent. */
  promote(serviceId: ServiceId, regionId: RegionId, signal?: AbortSignal): Promise<PromotionOutcome>;
  /** Undo a promotion (compensation). */
  demote(serviceId: ServiceId, regionId: RegionId, signal?: AbortSignal): Promise<void>;
  quiesceWrites(serviceId: ServiceId, regionId: RegionId, signal?: AbortSignal): Promise<void>;
  resumeWrites(serviceId: ServiceId, regionId: RegionId, signal?: AbortSignal): Promise<void>;
}

export interface TrafficManagerApi {
  routeTo(serviceId: ServiceId, regionId: RegionId, signal?: AbortSignal): Promise<void>;
}

export interface ReplicationMonitor {
  getReplicationLagMs(serviceId: ServiceId, regionId: RegionId, signal?: AbortSignal): Promise<number>;
}

export interface FailoverCapabilities {
  promotion: PromotionApi;
  traffic: TrafficManagerApi;
  replication: ReplicationMonitor;
}
