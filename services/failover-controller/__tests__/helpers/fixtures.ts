/**
 * Shared test fixtures: services, clock, event capture, fake capabilities.
 */

import { DEFAULT_THRESHOLDS } from '@regionguard/config';
import type {
  CandidateRegion,
  ControllerEvent,
  ControllerEventType,
  ControllerThresholds,
  ProbeOutcome,
  ProbeSample,
  RegionId,
  ServiceDefinition,
  ServiceId
} from '@regionguard/types';
import type { ControllerEventSink } from '../../src/alerts/notifier';
import type {
  FailoverCapabilities,
  PromotionApi,
  PromotionOutcome,
  ReplicationMonitor,
  TrafficManagerApi
} from '../../src/execution/capabilities';
import type { HealthCheckResult, HealthEndpoint } from '../../src/probe/health-endpoint';

export const TEST_API_KEY = 'test-key-1';

export interface TestServiceOptions {
  id?: ServiceId;
  regions?: RegionId[];
  target?: number;
  latencyCeilingMs?: number;
  rtoMs?: number;
  rpoMs?: number;
  thresholds?: Partial<ControllerThresholds>;
}

/**
 * `checkout` in us-east (primary), eu-west (standby), ap-south (cold) with
 * fast step retries so executor tests run in milliseconds.
 */
export function createTestService(options: TestServiceOptions = {}): ServiceDefinition {
  const regions = options.regions ?? ['us-east', 'eu-west', 'ap-south'];
  const roles: CandidateRegion['role'][] = ['primary', 'standby', 'cold'];
  const candidates: CandidateRegion[] = regions.map((regionId, index) => ({
    regionId,
    role: roles[Math.min(index, roles.length - 1)],
    healthEndpoint: `http://checkout.${regionId}.test/healthz`
  }));

  return {
    id: options.id ?? 'checkout',
    candidates,
    slo: options.latencyCeilingMs !== undefined
      ? { target: options.target ?? 0.999, latencyCeilingMs: options.latencyCeilingMs }
      : { target: options.target ?? 0.999 },
    rtoMs: options.rtoMs ?? 300_000,
    rpoMs: options.rpoMs ?? 60_000,
    thresholds: {
      ...DEFAULT_THRESHOLDS,
      stepTimeoutMs: 1_000,
      stepMaxAttempts: 3,
      stepInitialBackoffMs: 1,
      stepMaxBackoffMs: 5,
      verificationProbes: 3,
      ...options.thresholds
    }
  };
}

export class ManualClock {
  constructor(public current = 1_000_000) {}

  now = (): number => this.current;

  advance(ms: number): number {
    this.current += ms;
    return this.current;
  }
}

export function createSample(
  regionId: RegionId,
  timestamp: number,
  outcome: ProbeOutcome = 'success',
  latencyMs = 50,
  serviceId: ServiceId = 'checkout'
): ProbeSample {
  return outcome === 'success'
    ? { serviceId, regionId, timestamp, outcome, latencyMs }
    : { serviceId, regionId, timestamp, outcome, latencyMs, error: `probe ${outcome}` };
}

export class CapturingSink implements ControllerEventSink {
  readonly events: ControllerEvent[] = [];

  emit(event: ControllerEvent): void {
    this.events.push(event);
  }

  ofType<T extends ControllerEventType>(type: T): Array<Extract<ControllerEvent, { type: T }>> {
    return this.events.filter((event): event is Extract<ControllerEvent, { type: T }> => event.type === type);
  }

  clear(): void {
    this.events.length = 0;
  }
}

type ControlCall = `${'promote' | 'demote' | 'quiesceWrites' | 'resumeWrites' | 'routeTo'}:${RegionId}`;

/**
 * In-process stand-in for the promotion, traffic and replication APIs.
 * Records every call and fails a method a configured number of times.
 */
export class FakeControlPlane implements PromotionApi, TrafficManagerApi, ReplicationMonitor {
  readonly calls: ControlCall[] = [];
  readonly lagMs = new Map<RegionId, number>();
  lagUnavailable = new Set<RegionId>();
  /** Regions whose lag requests never settle unless aborted */
  readonly lagHangs = new Set<RegionId>();
  readonly lagSignals: Array<AbortSignal | undefined> = [];
  promoteOutcome: PromotionOutcome = 'promoted';

  private readonly failures = new Map<string, number>();
  private readonly hangs = new Set<string>();

  /** Fail the next `times` calls of a method (Infinity for always) */
  failNext(method: 'promote' | 'demote' | 'quiesceWrites' | 'resumeWrites' | 'routeTo', times = 1): void {
    this.failures.set(method, times);
  }

  /** Never settle calls of a method unless aborted */
  hang(method: 'promote' | 'demote' | 'quiesceWrites' | 'resumeWrites' | 'routeTo'): void {
    this.hangs.add(method);
  }

  capabilities(): FailoverCapabilities {
    return { promotion: this, traffic: this, replication: this };
  }

  async promote(_serviceId: ServiceId, regionId: RegionId, signal?: AbortSignal): Promise<PromotionOutcome> {
    await this.call('promote', regionId, signal);
    return this.promoteOutcome;
  }

  async demote(_serviceId: ServiceId, regionId: RegionId, signal?: AbortSignal): Promise<void> {
    await this.call('demote', regionId, signal);
  }

  async quiesceWrites(_serviceId: ServiceId, regionId: RegionId, signal?: AbortSignal): Promise<void> {
    await this.call('quiesceWrites', regionId, signal);
  }

  async resumeWrites(_serviceId: ServiceId, regionId: RegionId, signal?: AbortSignal): Promise<void> {
    await this.call('resumeWrites', regionId, signal);
  }

  async routeTo(_serviceId: ServiceId, regionId: RegionId, signal?: AbortSignal): Promise<void> {
    await this.call('routeTo', regionId, signal);
  }

  async getReplicationLagMs(_serviceId: ServiceId, regionId: RegionId, signal?: AbortSignal): Promise<number> {
    this.lagSignals.push(signal);
    if (this.lagHangs.has(regionId)) {
      await new Promise<void>((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(new Error(`lag request for ${regionId} aborted`)), { once: true });
      });
    }
    if (this.lagUnavailable.has(regionId)) {
      throw new Error(`replication monitor unavailable for ${regionId}`);
    }
    return this.lagMs.get(regionId) ?? 0;
  }

  private async call(
    method: 'promote' | 'demote' | 'quiesceWrites' | 'resumeWrites' | 'routeTo',
    regionId: RegionId,
    signal?: AbortSignal
  ): Promise<void> {
    this.calls.push(`${method}:${regionId}`);

    if (this.hangs.has(method)) {
      await new Promise<void>((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(new Error(`${method} aborted`)), { once: true });
      });
    }

    const remaining = this.failures.get(method) ?? 0;
    if (remaining > 0) {
      this.failures.set(method, remaining - 1);
      throw new Error(`${method} failed for ${regionId}`);
    }
  }
}

/**
 * Health endpoint returning scripted results, then a default.
 */
export class ScriptedEndpoint implements HealthEndpoint {
  calls = 0;
  private readonly script: HealthCheckResult[];

  constructor(script: HealthCheckResult[] = [], public fallback: HealthCheckResult = { healthy: true, latencyMs: 20 }) {
    this.script = [...script];
  }

  async check(): Promise<HealthCheckResult> {
    this.calls++;
    return this.script.shift() ?? this.fallback;
  }
}

/**
 * Yield to pending promise callbacks.
 */
export async function flushPromises(): Promise<void> {
  await new Promise<void>(resolve => setImmediate(resolve));
}

/**
 * Flush pending callbacks until the predicate holds (bounded).
 */
export async function waitFor(predicate: () => boolean): Promise<void> {
  for (let i = 0; i < 100 && !predicate(); i++) {
    await flushPromises();
  }
}
