/**
 * Failover Executor
 *
 * Runs the ordered failover steps for one event and, on request, their
 * compensations in reverse. Every step outcome is written to the journal
 * before the next step starts, so a restarted controller resumes from
 * the first step that has not succeeded or been skipped.
 *
 * Each attempt is bounded by the step timeout and races the abort signal;
 * retries use bounded exponential backoff with jitter.
 */

import {
  ExecutorStepFailure,
  OperationCancelledError,
  RetryMechanism,
  RollbackFailure,
  createLogger,
  raceAbort,
  withTimeout
} from '@regionguard/core';
import type { RetryResult, ServiceLogger } from '@regionguard/core';
import { systemClock } from '@regionguard/types';
import type {
  Clock,
  ControllerThresholds,
  FailoverEvent,
  RegionId,
  RegionState,
  StepRecord,
  StepStatus
} from '@regionguard/types';
import type { ControllerEventSink } from '../alerts/notifier';
import type { FailoverEventJournal } from '../journal/failover-journal';
import type { FailoverStep, StepContext } from './failover-steps';

export type ExecutionResult =
  | { status: 'succeeded' }
  | { status: 'failed'; error: ExecutorStepFailure }
  | { status: 'cancelled'; step?: string };

export type RollbackResult =
  | { status: 'compensated'; compensated: string[] }
  | { status: 'failed'; error: RollbackFailure; compensated: string[] };

export type StepPolicy = Pick<
  ControllerThresholds,
  'stepTimeoutMs' | 'stepMaxAttempts' | 'stepInitialBackoffMs' | 'stepMaxBackoffMs'
>;

export interface FailoverExecutorDeps {
  steps: readonly FailoverStep[];
  journal: FailoverEventJournal;
  policy: StepPolicy;
  /** Current believed state of a region, consulted by shouldRun */
  regionState: (regionId: RegionId) => RegionState | undefined;
  sink?: ControllerEventSink;
  logger?: ServiceLogger;
  clock?: Clock;
  /** Backoff jitter; disabled in tests for exact timing */
  jitter?: boolean;
}

const MAY_HAVE_TAKEN_EFFECT: ReadonlySet<StepStatus> = new Set<StepStatus>(['succeeded', 'failed', 'cancelled', 'running']);

/**
 * Pending step records for a new event.
 */
export function initialSteps(steps: readonly FailoverStep[]): StepRecord[] {
  return steps.map(step => ({ name: step.name, status: 'pending', attempts: 0 }));
}

export class FailoverExecutor {
  private readonly logger: ServiceLogger;
  private readonly clock: Clock;

  constructor(private readonly deps: FailoverExecutorDeps) {
    this.logger = deps.logger ?? createLogger('failover-executor');
    this.clock = deps.clock ?? systemClock;
  }

  pendingSteps(): StepRecord[] {
    return initialSteps(this.deps.steps);
  }

  /**
   * Run every step not yet succeeded or skipped. Mutates and saves `event`.
   */
  async execute(event: FailoverEvent, signal?: AbortSignal): Promise<ExecutionResult> {
    const context = this.context(event);

    for (const step of this.deps.steps) {
      const record = this.record(event, step.name);
      if (record.status === 'succeeded' || record.status === 'skipped') {
        continue;
      }

      if (signal?.aborted) {
        this.logger.info(`Failover ${event.id} cancelled before ${step.name}`, { eventId: event.id });
        return { status: 'cancelled' };
      }

      if (step.shouldRun && !step.shouldRun(context)) {
        record.status = 'skipped';
        record.finishedAt = this.clock.now();
        record.detail = 'step does not apply';
        await this.persist(event, record);
        continue;
      }

      record.status = 'running';
      record.startedAt = this.clock.now();
      delete record.error;
      await this.persist(event, record);

      const outcome = await this.attempt(
        step.name,
        step.timeoutMs ?? this.deps.policy.stepTimeoutMs,
        attemptSignal => step.run(context, attemptSignal),
        signal,
        () => {
          record.attempts++;
        }
      );
      record.finishedAt = this.clock.now();

      if (outcome.success) {
        record.status = 'succeeded';
        if (typeof outcome.result === 'string') {
          record.detail = outcome.result;
        }
        await this.persist(event, record);
        continue;
      }

      if (outcome.cancelled) {
        record.status = 'cancelled';
        record.error = outcome.error.message;
        await this.persist(event, record);
        this.logger.warn(`Failover ${event.id} cancelled during ${step.name}`, { eventId: event.id });
        return { status: 'cancelled', step: step.name };
      }

      record.status = 'failed';
      record.error = outcome.error.message;
      await this.persist(event, record);

      const error = new ExecutorStepFailure(event.id, step.name, record.attempts, outcome.error);
      this.logger.error(error.message, { eventId: event.id, serviceId: event.serviceId });
      return { status: 'failed', error };
    }

    return { status: 'succeeded' };
  }

  /**
   * Compensate, in reverse order, every step that may have taken effect:
   * succeeded ones and those that failed, were cancelled or were left
   * running. Compensations must be idempotent. Stops at the first
   * compensation that cannot be completed.
   */
  async rollback(event: FailoverEvent, signal?: AbortSignal): Promise<RollbackResult> {
    const context = this.context(event);
    const compensated: string[] = [];

    for (const step of [...this.deps.steps].reverse()) {
      const record = this.record(event, step.name);
      if (!MAY_HAVE_TAKEN_EFFECT.has(record.status)) {
        continue;
      }

      const outcome = await this.attempt(
        `compensate ${step.name}`,
        step.timeoutMs ?? this.deps.policy.stepTimeoutMs,
        attemptSignal => step.compensate(context, attemptSignal),
        signal
      );
      record.finishedAt = this.clock.now();

      if (!outcome.success) {
        record.status = 'compensation_failed';
        record.error = outcome.error.message;
        await this.persist(event, record);

        const error = new RollbackFailure(event.id, step.name, outcome.error);
        this.logger.error(error.message, { eventId: event.id, serviceId: event.serviceId });
        return { status: 'failed', error, compensated };
      }

      record.status = 'compensated';
      await this.persist(event, record);
      compensated.push(step.name);
    }

    return { status: 'compensated', compensated };
  }

  private async attempt<T>(
    operation: string,
    timeoutMs: number,
    fn: (signal: AbortSignal) => Promise<T>,
    signal: AbortSignal | undefined,
    onAttempt?: () => void
  ): Promise<RetryResult<T>> {
    const { policy } = this.deps;
    const retry = new RetryMechanism({
      maxAttempts: policy.stepMaxAttempts,
      initialDelayMs: policy.stepInitialBackoffMs,
      maxDelayMs: policy.stepMaxBackoffMs,
      jitter: this.deps.jitter ?? true,
      onRetry: (attempt, error, delayMs) => {
        this.logger.warn(`${operation} attempt ${attempt} failed, retrying in ${delayMs}ms`, { error: error.message });
      }
    });

    return retry.execute(async () => {
      onAttempt?.();
      const controller = new AbortController();
      const forward = (): void => controller.abort(signal?.reason);
      signal?.addEventListener('abort', forward, { once: true });

      try {
        return await raceAbort(withTimeout(fn(controller.signal), timeoutMs, operation), signal, operation);
      } catch (error) {
        if (!(error instanceof OperationCancelledError)) {
          // Stop the abandoned attempt before the next one starts
          controller.abort(error);
        }
        throw error;
      } finally {
        signal?.removeEventListener('abort', forward);
      }
    }, signal);
  }

  private context(event: FailoverEvent): StepContext {
    return {
      eventId: event.id,
      serviceId: event.serviceId,
      fromRegion: event.fromRegion,
      toRegion: event.toRegion,
      regionState: this.deps.regionState
    };
  }

  private record(event: FailoverEvent, name: string): StepRecord {
    let record = event.steps.find(step => step.name === name);
    if (!record) {
      record = { name, status: 'pending', attempts: 0 };
      event.steps.push(record);
    }
    return record;
  }

  private async persist(event: FailoverEvent, record: StepRecord): Promise<void> {
    await this.deps.journal.save(event);
    this.deps.sink?.emit({
      type: 'failover_step',
      serviceId: event.serviceId,
      eventId: event.id,
      step: { ...record },
      timestamp: this.clock.now()
    });
  }
}
