/**
 * API Types
 *
 * The read and override surface the HTTP routes need from the controller.
 * Implemented by FailoverControllerService; tests supply their own.
 */

import type {
  CoordinatorState,
  ErrorBudget,
  FailoverEvent,
  OverrideResult,
  OverrideSignal,
  RegionId,
  RegionRecord,
  ServiceId
} from '@regionguard/types';

export interface ServiceStatus {
  serviceId: ServiceId;
  primary: RegionId;
  coordinator: CoordinatorState;
  regions: RegionRecord[];
  /** Error budget of the primary per SLO window */
  budgets: ErrorBudget[];
  liveFailover: FailoverEvent | null;
  droppedSamples: number;
}

export interface ControllerStateProvider {
  isRunning(): boolean;
  hasService(serviceId: ServiceId): boolean;
  listServices(): ServiceStatus[];
  getService(serviceId: ServiceId): ServiceStatus | undefined;
  listFailovers(serviceId: ServiceId, limit: number): Promise<FailoverEvent[]>;
  submitOverride(signal: OverrideSignal): Promise<OverrideResult>;
}

/**
 * Minimal logger interface for API middleware.
 */
export interface MinimalLogger {
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
}
