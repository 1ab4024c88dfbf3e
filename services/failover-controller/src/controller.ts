/**
 * Failover Controller Service
 *
 * Wires probes, SLO tracker, region state store, failure detector and one
 * decision loop plus coordinator per service for a whole fleet.
 *
 * Shared across services: the probe scheduler, SLO tracker, state store,
 * detector, journal and notifier. Per service: executor, coordinator and
 * decision loop, so services fail over independently.
 */

import { ControllerError, ErrorCode, clearIntervalSafe, createLogger, gracefulShutdown } from '@regionguard/core';
import type { ServiceLogger } from '@regionguard/core';
import { systemClock } from '@regionguard/types';
import type {
  CandidateRegion,
  Clock,
  ErrorBudget,
  FailoverEvent,
  FleetDefinition,
  OverrideResult,
  OverrideSignal,
  ServiceDefinition,
  ServiceId
} from '@regionguard/types';
import { Notifier } from './alerts/notifier';
import type { ApiAppOptions, ControllerStateProvider, ServiceStatus } from './api';
import { ServiceDecisionLoop } from './coordination/decision-loop';
import { FailoverCoordinator } from './coordination/failover-coordinator';
import type { OverrideAuthorizer } from './coordination/override-authorizer';
import { FailureDetector } from './detection/failure-detector';
import type { FailoverCapabilities } from './execution/capabilities';
import { FailoverExecutor } from './execution/failover-executor';
import { createDefaultSteps } from './execution/failover-steps';
import type { FailoverStep } from './execution/failover-steps';
import { InMemoryFailoverJournal } from './journal/failover-journal';
import type { FailoverEventJournal } from './journal/failover-journal';
import { HttpHealthEndpoint } from './probe/health-endpoint';
import type { HealthEndpoint } from './probe/health-endpoint';
import { HealthProbe } from './probe/health-probe';
import { ProbeScheduler } from './probe/probe-scheduler';
import type { ProbeTarget } from './probe/probe-scheduler';
import { SloTracker } from './slo/slo-tracker';
import { RegionStateStore } from './state/region-state-store';

export interface FailoverControllerDeps {
  fleet: FleetDefinition;
  capabilities: FailoverCapabilities;
  authorizer: OverrideAuthorizer;
  journal?: FailoverEventJournal;
  notifier?: Notifier;
  /** Health endpoint per candidate; HTTP GET on healthEndpoint by default */
  endpointFor?: (service: ServiceDefinition, candidate: CandidateRegion) => HealthEndpoint;
  /** Failover steps per service; the default quiesce/promote/route/resume sequence otherwise */
  stepsFor?: (service: ServiceDefinition, capabilities: FailoverCapabilities) => FailoverStep[];
  decisionTickMs: number;
  decisionQueueCapacity: number;
  shutdownTimeoutMs: number;
  logger?: ServiceLogger;
  clock?: Clock;
  /** Backoff jitter between step attempts */
  jitter?: boolean;
}

interface ServiceRuntime {
  service: ServiceDefinition;
  coordinator: FailoverCoordinator;
  loop: ServiceDecisionLoop;
}

export class FailoverControllerService implements ControllerStateProvider {
  readonly notifier: Notifier;
  readonly store: RegionStateStore;
  readonly slo: SloTracker;
  readonly detector: FailureDetector;
  readonly journal: FailoverEventJournal;

  private readonly runtimes = new Map<ServiceId, ServiceRuntime>();
  private readonly scheduler: ProbeScheduler;
  private readonly logger: ServiceLogger;
  private readonly clock: Clock;
  private tickInterval: NodeJS.Timeout | null = null;
  private running = false;

  constructor(private readonly deps: FailoverControllerDeps) {
    this.logger = deps.logger ?? createLogger('failover-controller');
    this.clock = deps.clock ?? systemClock;
    this.notifier = deps.notifier ?? new Notifier({ logger: this.logger });
    this.journal = deps.journal ?? new InMemoryFailoverJournal();

    const { fleet } = deps;
    this.store = new RegionStateStore({ sink: this.notifier, clock: this.clock });
    this.slo = new SloTracker();
    this.detector = new FailureDetector({
      store: this.store,
      slo: this.slo,
      sink: this.notifier,
      logger: this.logger,
      clock: this.clock
    });

    const probe = new HealthProbe({ logger: this.logger, clock: this.clock });
    const endpointFor = deps.endpointFor ?? ((_service: ServiceDefinition, candidate: CandidateRegion) => new HttpHealthEndpoint(candidate.healthEndpoint));
    const targets: ProbeTarget[] = [];

    for (const service of fleet.services) {
      this.store.register(service);
      this.slo.register(service);
      this.detector.register(service);

      const endpoints = new Map<string, HealthEndpoint>();
      for (const candidate of service.candidates) {
        const endpoint = endpointFor(service, candidate);
        endpoints.set(candidate.regionId, endpoint);
        targets.push({
          serviceId: service.id,
          regionId: candidate.regionId,
          endpoint,
          intervalMs: service.thresholds.probeIntervalMs,
          timeoutMs: service.thresholds.probeTimeoutMs
        });
      }

      this.runtimes.set(service.id, this.buildRuntime(service, probe, endpoints));
    }

    this.scheduler = new ProbeScheduler(targets, {
      probe,
      logger: this.logger,
      onSample: sample => {
        this.runtimes.get(sample.serviceId)?.loop.submitSample(sample);
      }
    });
  }

  private buildRuntime(service: ServiceDefinition, probe: HealthProbe, endpoints: Map<string, HealthEndpoint>): ServiceRuntime {
    const { capabilities } = this.deps;
    const steps = this.deps.stepsFor?.(service, capabilities) ?? createDefaultSteps(capabilities);

    const executor = new FailoverExecutor({
      steps,
      journal: this.journal,
      policy: service.thresholds,
      regionState: regionId => this.store.get(service.id, regionId)?.state,
      sink: this.notifier,
      logger: this.logger,
      clock: this.clock,
      jitter: this.deps.jitter
    });

    const coordinator = new FailoverCoordinator({
      service,
      store: this.store,
      slo: this.slo,
      journal: this.journal,
      executor,
      replication: capabilities.replication,
      authorizer: this.deps.authorizer,
      verify: regionId => {
        const endpoint = endpoints.get(regionId);
        if (!endpoint) {
          return Promise.reject(new ControllerError(`No health endpoint for ${service.id}/${regionId}`, ErrorCode.NOT_FOUND));
        }
        return probe.probe(service.id, regionId, endpoint, service.thresholds.probeTimeoutMs);
      },
      sink: this.notifier,
      logger: this.logger,
      clock: this.clock
    });

    const loop = new ServiceDecisionLoop({
      serviceId: service.id,
      slo: this.slo,
      detector: this.detector,
      coordinator,
      capacity: this.deps.decisionQueueCapacity,
      logger: this.logger
    });

    return { service, coordinator, loop };
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  async start(): Promise<void> {
    if (this.running) {
      this.logger.warn('Failover controller already running');
      return;
    }

    for (const runtime of this.runtimes.values()) {
      const resumed = await runtime.coordinator.resume();
      if (resumed) {
        this.logger.info('Resumed live failover from journal', { serviceId: runtime.service.id });
      }
    }

    this.scheduler.start();
    this.tickInterval = setInterval(() => {
      for (const runtime of this.runtimes.values()) {
        runtime.loop.submitTick();
      }
    }, this.deps.decisionTickMs);

    this.running = true;
    this.logger.info('Failover controller started', {
      services: [...this.runtimes.keys()],
      decisionTickMs: this.deps.decisionTickMs
    });
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.tickInterval = clearIntervalSafe(this.tickInterval);

    const runtimes = [...this.runtimes.values()];
    await gracefulShutdown([
      { name: 'probe-scheduler', cleanup: () => this.scheduler.stop() },
      {
        name: 'decision-loops',
        cleanup: async () => {
          await Promise.all(runtimes.map(runtime => runtime.loop.stop()));
        }
      },
      {
        name: 'coordinators',
        cleanup: async () => {
          await Promise.all(runtimes.map(runtime => runtime.coordinator.settle()));
        }
      },
      { name: 'notifier', cleanup: () => this.notifier.flush() }
    ], this.deps.shutdownTimeoutMs, this.logger);

    this.logger.info('Failover controller stopped');
  }

  // ===========================================================================
  // ControllerStateProvider
  // ===========================================================================

  isRunning(): boolean {
    return this.running;
  }

  hasService(serviceId: ServiceId): boolean {
    return this.runtimes.has(serviceId);
  }

  listServices(): ServiceStatus[] {
    return [...this.runtimes.keys()].flatMap(serviceId => {
      const status = this.getService(serviceId);
      return status ? [status] : [];
    });
  }

  getService(serviceId: ServiceId): ServiceStatus | undefined {
    const runtime = this.runtimes.get(serviceId);
    if (!runtime) {
      return undefined;
    }
    const primary = this.store.getPrimary(serviceId);
    const now = this.clock.now();
    const budgets: ErrorBudget[] = this.slo
      .windowNames(serviceId)
      .map(window => this.slo.errorBudget(serviceId, window, primary, now));

    return {
      serviceId,
      primary,
      coordinator: runtime.coordinator.getState(),
      regions: this.store.list(serviceId).map(record => ({ ...record })),
      budgets,
      liveFailover: runtime.coordinator.getLiveEvent(),
      droppedSamples: runtime.loop.getDroppedSamples()
    };
  }

  listFailovers(serviceId: ServiceId, limit: number): Promise<FailoverEvent[]> {
    return this.journal.list(serviceId, limit);
  }

  submitOverride(signal: OverrideSignal): Promise<OverrideResult> {
    const runtime = this.runtimes.get(signal.serviceId);
    if (!runtime) {
      return Promise.reject(new ControllerError(`Unknown service ${signal.serviceId}`, ErrorCode.NOT_FOUND));
    }
    return runtime.loop.submitOverride(signal);
  }

  /**
   * Options for createApiApp serving this controller.
   */
  apiOptions(): ApiAppOptions {
    return { state: this, authorizer: this.deps.authorizer, logger: this.logger };
  }

  /**
   * Resolves once every decision loop has drained. Used by tests.
   */
  async whenIdle(): Promise<void> {
    await this.scheduler.whenIdle();
    await Promise.all([...this.runtimes.values()].map(runtime => runtime.loop.idle()));
  }

  getDecisionLoop(serviceId: ServiceId): ServiceDecisionLoop | undefined {
    return this.runtimes.get(serviceId)?.loop;
  }

  getCoordinator(serviceId: ServiceId): FailoverCoordinator | undefined {
    return this.runtimes.get(serviceId)?.coordinator;
  }
}
