/**
 * Failover Coordinator
 *
 * Per-service state machine deciding when and where to fail over:
 *
 *   stable → evaluating → failover_in_progress → verifying → stable(target)
 *                                 ↓                  ↓
 *                            rolling_back ──→ stable(original) | aborted
 *
 * Only the coordinator starts failovers and moves the primary role. At
 * most one failover event is live per service: a synchronous `starting`
 * flag covers the window before the event reaches the journal, and the
 * journal's live pointer covers everything after.
 *
 * Automatic failover only ever targets a healthy candidate whose
 * replication lag is within the service RPO. Operators can bypass that
 * gate with `force_failover`; the lag is then disclosed in the event and
 * in an escalation.
 */

import { randomUUID } from 'crypto';
import {
  ControllerError,
  ErrorCode,
  OperationCancelledError,
  OverrideRejectedError,
  createLogger,
  getErrorMessage,
  raceAbort,
  withTimeout
} from '@regionguard/core';
import type { ServiceLogger } from '@regionguard/core';
import { systemClock } from '@regionguard/types';
import type {
  Clock,
  CoordinatorState,
  CoordinatorStateKind,
  DetectorTransition,
  EpochMs,
  EscalationSeverity,
  FailoverEvent,
  FailoverPhase,
  FailoverTrigger,
  OverrideResult,
  OverrideSignal,
  ProbeSample,
  RegionId,
  RegionState,
  ServiceDefinition
} from '@regionguard/types';
import type { ControllerEventSink } from '../alerts/notifier';
import { SHORT_WINDOW } from '../detection/failure-detector';
import type { ReplicationMonitor } from '../execution/capabilities';
import type { FailoverExecutor } from '../execution/failover-executor';
import { cloneEvent } from '../journal/failover-journal';
import type { FailoverEventJournal } from '../journal/failover-journal';
import type { SloTracker } from '../slo/slo-tracker';
import { withConflictRetry } from '../state/region-state-store';
import type { RegionStateStore } from '../state/region-state-store';
import type { OverrideAuthorizer } from './override-authorizer';

/**
 * Direct health probe against a failover target, used for verification.
 */
export type TargetVerifier = (regionId: RegionId, signal: AbortSignal) => Promise<ProbeSample>;

export interface FailoverCoordinatorDeps {
  service: ServiceDefinition;
  store: RegionStateStore;
  slo: SloTracker;
  journal: FailoverEventJournal;
  executor: FailoverExecutor;
  replication: ReplicationMonitor;
  authorizer: OverrideAuthorizer;
  verify: TargetVerifier;
  sink?: ControllerEventSink;
  logger?: ServiceLogger;
  clock?: Clock;
  newEventId?: () => string;
}

interface TargetSelection {
  regionId: RegionId;
  lagMs: number;
}

type Verdict = { result: 'passed' } | { result: 'failed'; reason: string } | { result: 'cancelled' };

export class FailoverCoordinator {
  private state: CoordinatorState;
  private liveEvent: FailoverEvent | null = null;
  private running: Promise<void> | null = null;
  private abortController: AbortController | null = null;
  private starting = false;
  private primaryHardBurnSince: EpochMs | null = null;
  private lastNoTargetEscalationAt: EpochMs | null = null;

  private readonly service: ServiceDefinition;
  private readonly logger: ServiceLogger;
  private readonly clock: Clock;
  private readonly newEventId: () => string;

  constructor(private readonly deps: FailoverCoordinatorDeps) {
    this.service = deps.service;
    this.logger = deps.logger ?? createLogger('failover-coordinator');
    this.clock = deps.clock ?? systemClock;
    this.newEventId = deps.newEventId ?? randomUUID;
    this.state = { kind: 'stable', primary: deps.store.getPrimary(deps.service.id) };
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  getState(): CoordinatorState {
    return { ...this.state };
  }

  getLiveEvent(): FailoverEvent | null {
    return this.liveEvent ? cloneEvent(this.liveEvent) : null;
  }

  isBusy(): boolean {
    return this.starting || this.running !== null;
  }

  /**
   * Resolves once no failover is being driven.
   */
  async settle(): Promise<void> {
    while (this.running) {
      await this.running;
    }
  }

  // ===========================================================================
  // Decision inputs
  // ===========================================================================

  async onDetectorTransition(transition: DetectorTransition | null): Promise<void> {
    if (transition) {
      await this.tick();
    }
  }

  async tick(): Promise<void> {
    const now = this.clock.now();
    this.trackPrimaryBurn(now);

    const state = this.state;
    if (state.kind === 'stable') {
      const reason = this.entryReason(now);
      if (!reason) {
        return;
      }
      this.setState({ kind: 'evaluating', primary: state.primary, since: now, reason });
      await this.attemptAutomaticFailover(reason);
      return;
    }

    if (state.kind === 'evaluating') {
      if (this.isServing(state.primary)) {
        this.setState({ kind: 'stable', primary: state.primary });
        return;
      }
      await this.attemptAutomaticFailover(state.reason);
    }
  }

  /**
   * Adopt the primary committed by the newest completed failover, then
   * continue a failover left live in the journal by a previous run.
   * Returns true when a live one was found.
   */
  async resume(): Promise<boolean> {
    if (this.isBusy()) {
      return false;
    }
    await this.restorePrimary();

    const live = await this.deps.journal.getLive(this.service.id);
    if (!live) {
      return false;
    }

    this.markPromoting(live.toRegion);
    this.liveEvent = live;
    this.logger.warn(`Resuming failover ${live.id} in phase ${live.phase}`, {
      serviceId: this.service.id,
      eventId: live.id
    });

    const kind = live.phase === 'verifying' ? 'verifying' : live.phase === 'rolling_back' ? 'rolling_back' : 'failover_in_progress';
    this.setState({ kind, primary: live.fromRegion, target: live.toRegion, eventId: live.id });
    this.startDriving(live);
    return true;
  }

  private async restorePrimary(): Promise<void> {
    const { journal, store } = this.deps;
    const committed = (await journal.list(this.service.id)).find(event => event.phase === 'completed');
    const configured = store.getPrimary(this.service.id);
    if (!committed || committed.toRegion === configured) {
      return;
    }
    if (!store.get(this.service.id, committed.toRegion)) {
      this.logger.warn(`Journal primary ${committed.toRegion} is not a candidate; keeping ${configured}`, {
        serviceId: this.service.id,
        eventId: committed.id
      });
      return;
    }

    store.setPrimary(this.service.id, configured, committed.toRegion);
    this.setRegionState(committed.toRegion, 'promoted');
    this.logger.info(`Primary ${committed.toRegion} restored from failover ${committed.id}`, {
      serviceId: this.service.id,
      configured
    });
    this.setState({ kind: 'stable', primary: committed.toRegion });
  }

  // ===========================================================================
  // Manual overrides
  // ===========================================================================

  async applyOverride(signal: OverrideSignal): Promise<OverrideResult> {
    const operator = this.deps.authorizer.authorize(signal.credential);
    if (!operator) {
      this.logger.warn('Override with unknown credential rejected', { serviceId: this.service.id, kind: signal.kind });
      throw new OverrideRejectedError('Override credential rejected', ErrorCode.OVERRIDE_UNAUTHORIZED, {
        serviceId: this.service.id,
        kind: signal.kind
      });
    }

    let result: OverrideResult;
    switch (signal.kind) {
      case 'block':
        result = this.block(operator, signal.reason);
        break;
      case 'force_failover':
        result = await this.forceFailover(operator, signal.reason, signal.targetRegion);
        break;
      case 'abort':
        result = this.abort(operator, signal.reason);
        break;
      case 'clear_abort':
        result = this.clearAbort(operator);
        break;
    }

    this.logger.info(`Override ${signal.kind} by ${operator} ${result.accepted ? 'applied' : 'refused'}`, {
      serviceId: this.service.id,
      reason: signal.reason,
      message: result.message
    });
    this.deps.sink?.emit({
      type: 'override_applied',
      serviceId: this.service.id,
      kind: signal.kind,
      operator,
      accepted: result.accepted,
      message: result.message,
      timestamp: this.clock.now()
    });
    return result;
  }

  private block(operator: string, reason: string): OverrideResult {
    const state = this.state;
    if ((state.kind !== 'stable' && state.kind !== 'evaluating') || this.isBusy()) {
      return this.refuse(`Cannot block while ${state.kind}${this.isBusy() ? ' with a failover starting' : ''}`);
    }
    this.setState({ kind: 'aborted', primary: state.primary, reason: `blocked by ${operator}: ${reason}` });
    return this.accept('Automatic failover blocked');
  }

  private async forceFailover(operator: string, reason: string, requested?: RegionId): Promise<OverrideResult> {
    const state = this.state;
    if ((state.kind !== 'stable' && state.kind !== 'evaluating') || this.isBusy()) {
      return this.refuse(`Cannot force a failover while ${state.kind}${this.isBusy() ? ' with a failover live' : ''}`);
    }

    const primary = state.primary;
    let target: RegionId | undefined;
    if (requested !== undefined) {
      if (!this.deps.store.get(this.service.id, requested)) {
        return this.refuse(`Region ${requested} is not a candidate for ${this.service.id}`);
      }
      if (requested === primary) {
        return this.refuse(`Region ${requested} is already the primary`);
      }
      target = requested;
    } else {
      target = this.fallbackTarget(primary);
    }
    if (target === undefined) {
      return this.refuse(`No candidate region besides ${primary}`);
    }

    this.starting = true;
    let lagMs: number | null;
    let event: FailoverEvent;
    try {
      lagMs = await this.measureLag(target);
      event = await this.beginFailover(target, 'manual', `forced by ${operator}: ${reason}`, lagMs);
    } catch (error) {
      if (error instanceof ControllerError && error.code === ErrorCode.FAILOVER_ALREADY_LIVE) {
        return this.refuse(error.message);
      }
      throw error;
    } finally {
      this.starting = false;
    }

    const rpoMs = this.service.rpoMs;
    const withinRpo = lagMs !== null && lagMs <= rpoMs;
    this.escalate(
      withinRpo ? 'warning' : 'critical',
      `Forced failover of ${this.service.id} to ${target} by ${operator}; replication lag ${lagMs === null ? 'unknown' : `${lagMs}ms`}, RPO ${rpoMs}ms`,
      { eventId: event.id, targetRegion: target, replicationLagMs: lagMs, rpoMs }
    );
    return this.accept(`Failover ${event.id} to ${target} started`, event.id);
  }

  private abort(operator: string, reason: string): OverrideResult {
    const state = this.state;
    const live = this.liveEvent;
    const controller = this.abortController;
    if ((state.kind !== 'failover_in_progress' && state.kind !== 'verifying') || !live || !controller) {
      return this.refuse(`No failover to abort while ${state.kind}`);
    }

    live.cancelledBy = operator;
    controller.abort(new OperationCancelledError(`failover ${live.id}`, `aborted by ${operator}: ${reason}`));
    return this.accept(`Failover ${live.id} aborting`, live.id);
  }

  private clearAbort(operator: string): OverrideResult {
    const state = this.state;
    if (state.kind !== 'aborted') {
      return this.refuse(`Nothing to clear while ${state.kind}`);
    }

    // A rollback that could not finish leaves its target promoting
    for (const record of this.deps.store.list(this.service.id)) {
      if (record.state === 'promoting') {
        withConflictRetry(() => this.deps.store.transition(this.service.id, record.regionId, 'promoting', 'failed'));
      }
    }

    this.primaryHardBurnSince = null;
    this.setState({ kind: 'stable', primary: this.deps.store.getPrimary(this.service.id) });
    return this.accept(`Abort cleared by ${operator}`);
  }

  // ===========================================================================
  // Automatic failover
  // ===========================================================================

  private trackPrimaryBurn(now: EpochMs): void {
    const primary = this.deps.store.getPrimary(this.service.id);
    const burn = this.deps.slo.burnRate(this.service.id, SHORT_WINDOW, primary, now);
    if (burn > this.service.thresholds.hardBurnRateThreshold) {
      this.primaryHardBurnSince ??= now;
    } else {
      this.primaryHardBurnSince = null;
    }
  }

  private entryReason(now: EpochMs): string | null {
    const primary = this.deps.store.getPrimary(this.service.id);
    if (this.deps.store.require(this.service.id, primary).state === 'unreachable') {
      return `primary ${primary} unreachable`;
    }
    if (this.primaryHardBurnSince !== null && now - this.primaryHardBurnSince >= this.service.rtoMs) {
      return `primary ${primary} short-window burn rate above ${this.service.thresholds.hardBurnRateThreshold} for ${now - this.primaryHardBurnSince}ms`;
    }
    return null;
  }

  private async attemptAutomaticFailover(reason: string): Promise<void> {
    if (this.isBusy()) {
      return;
    }
    this.starting = true;
    try {
      const selection = await this.selectTarget();
      if (this.kind() !== 'evaluating') {
        return;
      }
      if (!selection.target) {
        this.escalateNoTarget(selection.rejected);
        return;
      }
      await this.beginFailover(selection.target.regionId, 'automatic', reason, selection.target.lagMs);
    } catch (error) {
      // Deferred to the next tick
      this.logger.error('Automatic failover could not start', {
        serviceId: this.service.id,
        error: getErrorMessage(error)
      });
    } finally {
      this.starting = false;
    }
  }

  /**
   * First candidate in priority order that is healthy and within RPO.
   */
  private async selectTarget(): Promise<{ target: TargetSelection | null; rejected: Record<RegionId, string> }> {
    const primary = this.deps.store.getPrimary(this.service.id);
    const rejected: Record<RegionId, string> = {};

    for (const candidate of this.service.candidates) {
      if (candidate.regionId === primary) {
        continue;
      }
      const state = this.deps.store.require(this.service.id, candidate.regionId).state;
      if (state !== 'healthy') {
        rejected[candidate.regionId] = `state ${state}`;
        continue;
      }
      const lagMs = await this.measureLag(candidate.regionId);
      if (lagMs === null) {
        rejected[candidate.regionId] = 'replication lag unknown';
        continue;
      }
      if (lagMs > this.service.rpoMs) {
        rejected[candidate.regionId] = `replication lag ${lagMs}ms exceeds RPO ${this.service.rpoMs}ms`;
        continue;
      }
      return { target: { regionId: candidate.regionId, lagMs }, rejected };
    }
    return { target: null, rejected };
  }

  private fallbackTarget(primary: RegionId): RegionId | undefined {
    const others = this.service.candidates.filter(candidate => candidate.regionId !== primary);
    const healthy = others.find(candidate => this.deps.store.get(this.service.id, candidate.regionId)?.state === 'healthy');
    return (healthy ?? others[0])?.regionId;
  }

  private async measureLag(regionId: RegionId): Promise<number | null> {
    const request = new AbortController();
    try {
      return await withTimeout(
        this.deps.replication.getReplicationLagMs(this.service.id, regionId, request.signal),
        this.service.thresholds.stepTimeoutMs,
        `replication lag ${this.service.id}/${regionId}`
      );
    } catch (error) {
      this.logger.warn(`Replication lag of ${regionId} unavailable`, {
        serviceId: this.service.id,
        error: getErrorMessage(error)
      });
      return null;
    } finally {
      // Stops a request still in flight after the timeout
      request.abort();
    }
  }

  private escalateNoTarget(rejected: Record<RegionId, string>): void {
    const now = this.clock.now();
    const interval = this.service.thresholds.escalationIntervalMs;
    if (this.lastNoTargetEscalationAt !== null && now - this.lastNoTargetEscalationAt < interval) {
      return;
    }
    this.lastNoTargetEscalationAt = now;
    this.escalate('critical', `No qualified failover target for ${this.service.id}; staying on ${this.deps.store.getPrimary(this.service.id)}`, {
      rejected
    });
  }

  // ===========================================================================
  // Failover lifecycle
  // ===========================================================================

  private async beginFailover(
    target: RegionId,
    trigger: FailoverTrigger,
    reason: string,
    lagMs: number | null
  ): Promise<FailoverEvent> {
    const { journal, store } = this.deps;
    const live = await journal.getLive(this.service.id);
    if (live) {
      throw new ControllerError(`Service ${this.service.id} already has live failover ${live.id}`, ErrorCode.FAILOVER_ALREADY_LIVE, {
        context: { serviceId: this.service.id, liveEventId: live.id }
      });
    }

    const primary = store.getPrimary(this.service.id);
    const event: FailoverEvent = {
      id: this.newEventId(),
      serviceId: this.service.id,
      fromRegion: primary,
      toRegion: target,
      trigger,
      reason,
      triggeredAt: this.clock.now(),
      phase: 'in_progress',
      steps: this.deps.executor.pendingSteps(),
      targetStateBefore: store.require(this.service.id, target).state
    };
    if (lagMs !== null) {
      event.replicationLagMs = lagMs;
    }

    await journal.save(event);
    this.markPromoting(target);
    this.liveEvent = event;

    this.logger.warn(`Failover ${event.id} started: ${primary} -> ${target}`, {
      serviceId: this.service.id,
      trigger,
      reason,
      replicationLagMs: lagMs
    });
    this.setState({ kind: 'failover_in_progress', primary, target, eventId: event.id });
    this.emitPhase(event);
    this.startDriving(event);
    return event;
  }

  private startDriving(event: FailoverEvent): void {
    this.running = this.drive(event).finally(() => {
      this.running = null;
      this.abortController = null;
      this.liveEvent = null;
    });
  }

  private async drive(event: FailoverEvent): Promise<void> {
    const abort = new AbortController();
    this.abortController = abort;

    try {
      if (event.phase === 'in_progress') {
        const result = await this.deps.executor.execute(event, abort.signal);
        if (result.status === 'failed') {
          await this.rollBack(event, result.error.message);
          return;
        }
        if (result.status === 'cancelled' || abort.signal.aborted) {
          await this.rollBack(event, `aborted by ${event.cancelledBy ?? 'operator'}`);
          return;
        }
        await this.enterPhase(event, 'verifying');
        this.setState({ kind: 'verifying', primary: event.fromRegion, target: event.toRegion, eventId: event.id });
      }

      if (event.phase === 'verifying') {
        const verdict = await this.verifyTarget(event, abort.signal);
        if (verdict.result === 'passed') {
          await this.commit(event);
        } else {
          await this.rollBack(event, verdict.result === 'failed' ? verdict.reason : `aborted by ${event.cancelledBy ?? 'operator'}`);
        }
        return;
      }

      if (event.phase === 'rolling_back') {
        await this.rollBack(event, 'resumed rollback');
      }
    } catch (error) {
      await this.failDrive(event, error);
    }
  }

  private async verifyTarget(event: FailoverEvent, signal: AbortSignal): Promise<Verdict> {
    const total = this.service.thresholds.verificationProbes;

    for (let probe = 1; probe <= total; probe++) {
      if (signal.aborted) {
        return { result: 'cancelled' };
      }
      let sample: ProbeSample;
      try {
        sample = await raceAbort(this.deps.verify(event.toRegion, signal), signal, 'verification probe');
      } catch (error) {
        if (error instanceof OperationCancelledError) {
          return { result: 'cancelled' };
        }
        return { result: 'failed', reason: `verification probe ${probe}/${total} failed: ${getErrorMessage(error)}` };
      }
      if (sample.outcome !== 'success') {
        return { result: 'failed', reason: `verification probe ${probe}/${total} ${sample.outcome}` };
      }
    }
    return signal.aborted ? { result: 'cancelled' } : { result: 'passed' };
  }

  private async commit(event: FailoverEvent): Promise<void> {
    const { store } = this.deps;
    store.setPrimary(this.service.id, event.fromRegion, event.toRegion);
    this.setRegionState(event.toRegion, 'promoted');

    event.completedAt = this.clock.now();
    await this.enterPhase(event, 'completed');

    this.primaryHardBurnSince = null;
    this.lastNoTargetEscalationAt = null;
    this.logger.info(`Failover ${event.id} completed: ${event.fromRegion} -> ${event.toRegion}`, {
      serviceId: this.service.id,
      durationMs: event.completedAt - event.triggeredAt
    });
    this.setState({ kind: 'stable', primary: event.toRegion });
  }

  private async rollBack(event: FailoverEvent, reason: string): Promise<void> {
    this.logger.warn(`Rolling back failover ${event.id}: ${reason}`, { serviceId: this.service.id });
    if (event.phase !== 'rolling_back') {
      await this.enterPhase(event, 'rolling_back');
    }
    this.setState({ kind: 'rolling_back', primary: event.fromRegion, target: event.toRegion, eventId: event.id });

    const result = await this.deps.executor.rollback(event);
    event.completedAt = this.clock.now();

    if (result.status === 'failed') {
      await this.enterPhase(event, 'aborted');
      this.setState({
        kind: 'aborted',
        primary: this.deps.store.getPrimary(this.service.id),
        reason: `rollback failed: ${result.error.message}`,
        eventId: event.id
      });
      this.escalate('critical', `Rollback of failover ${event.id} failed; manual intervention required`, {
        eventId: event.id,
        step: result.error.stepName,
        error: result.error.message
      });
      return;
    }

    if (event.cancelledBy !== undefined) {
      this.setRegionState(event.toRegion, event.targetStateBefore ?? 'failed');
      await this.enterPhase(event, 'aborted');
      this.setState({
        kind: 'aborted',
        primary: event.fromRegion,
        reason: `failover ${event.id} aborted by ${event.cancelledBy}`,
        eventId: event.id
      });
      return;
    }

    this.setRegionState(event.toRegion, 'failed');
    await this.enterPhase(event, 'rolled_back');
    this.setState({ kind: 'stable', primary: event.fromRegion });
  }

  /**
   * Journal or store failure while driving an event.
   */
  private async failDrive(event: FailoverEvent, error: unknown): Promise<void> {
    const message = getErrorMessage(error);
    this.logger.error(`Failover ${event.id} stopped unexpectedly`, { serviceId: this.service.id, error: message });
    this.setState({
      kind: 'aborted',
      primary: this.deps.store.getPrimary(this.service.id),
      reason: `failover ${event.id} stopped: ${message}`,
      eventId: event.id
    });
    this.escalate('critical', `Failover ${event.id} for ${this.service.id} stopped unexpectedly: ${message}`, {
      eventId: event.id,
      phase: event.phase
    });

    try {
      event.completedAt = this.clock.now();
      await this.enterPhase(event, 'aborted');
    } catch (saveError) {
      this.logger.error(`Failover ${event.id} could not be marked aborted`, {
        serviceId: this.service.id,
        error: getErrorMessage(saveError)
      });
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async enterPhase(event: FailoverEvent, phase: FailoverPhase): Promise<void> {
    event.phase = phase;
    await this.deps.journal.save(event);
    this.emitPhase(event);
  }

  private emitPhase(event: FailoverEvent): void {
    this.deps.sink?.emit({
      type: 'failover_phase_changed',
      serviceId: this.service.id,
      eventId: event.id,
      phase: event.phase,
      event: cloneEvent(event),
      timestamp: this.clock.now()
    });
  }

  private markPromoting(regionId: RegionId): void {
    this.setRegionState(regionId, 'promoting');
  }

  private setRegionState(regionId: RegionId, next: RegionState): void {
    const { store } = this.deps;
    withConflictRetry(() => {
      const current = store.require(this.service.id, regionId).state;
      return current === next ? store.require(this.service.id, regionId) : store.transition(this.service.id, regionId, current, next);
    });
  }

  /** A primary just promoted serves like a healthy one */
  private isServing(regionId: RegionId): boolean {
    const state = this.deps.store.require(this.service.id, regionId).state;
    return state === 'healthy' || state === 'promoted';
  }

  private kind(): CoordinatorStateKind {
    return this.state.kind;
  }

  private setState(next: CoordinatorState): void {
    const from = this.state;
    this.state = next;
    if (from.kind !== next.kind) {
      this.logger.info(`Coordinator ${this.service.id} ${from.kind} -> ${next.kind}`, { serviceId: this.service.id });
    }
    this.deps.sink?.emit({
      type: 'coordinator_state_changed',
      serviceId: this.service.id,
      from: { ...from },
      to: { ...next },
      timestamp: this.clock.now()
    });
  }

  private escalate(severity: EscalationSeverity, message: string, details?: Record<string, unknown>): void {
    this.deps.sink?.emit({
      type: 'escalation',
      serviceId: this.service.id,
      severity,
      message,
      details,
      timestamp: this.clock.now()
    });
  }

  private accept(message: string, eventId?: string): OverrideResult {
    return { accepted: true, state: this.getState(), eventId, message };
  }

  private refuse(message: string): OverrideResult {
    return { accepted: false, state: this.getState(), message };
  }
}
