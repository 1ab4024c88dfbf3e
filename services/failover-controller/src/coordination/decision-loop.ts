/**
 * Service Decision Loop
 *
 * One per service. Probe samples, ticks and overrides are queued and
 * handled strictly one at a time: SLO tracker, then failure detector,
 * then coordinator. A message is finished only when any failover it
 * started has settled, so the detector and coordinator never interleave.
 *
 * The queue is bounded. When full, the oldest queued sample is dropped
 * and counted; ticks and overrides are never dropped. An `abort`
 * override skips the queue so it can reach a running executor.
 */

import { ControllerError, ErrorCode, createDeferred, createLogger, getErrorMessage } from '@regionguard/core';
import type { Deferred, ServiceLogger } from '@regionguard/core';
import type { OverrideResult, OverrideSignal, ProbeSample, ServiceId } from '@regionguard/types';
import type { FailureDetector } from '../detection/failure-detector';
import type { SloTracker } from '../slo/slo-tracker';
import type { FailoverCoordinator } from './failover-coordinator';

export type DecisionMessage =
  | { type: 'sample'; sample: ProbeSample }
  | { type: 'tick' }
  | { type: 'override'; signal: OverrideSignal; reply: Deferred<OverrideResult> };

export interface ServiceDecisionLoopDeps {
  serviceId: ServiceId;
  slo: SloTracker;
  detector: FailureDetector;
  coordinator: FailoverCoordinator;
  capacity: number;
  logger?: ServiceLogger;
}

export class ServiceDecisionLoop {
  private readonly queue: DecisionMessage[] = [];
  private readonly logger: ServiceLogger;
  private processing: Promise<void> | null = null;
  private droppedSamples = 0;
  private stopped = false;

  constructor(private readonly deps: ServiceDecisionLoopDeps) {
    this.logger = deps.logger ?? createLogger('decision-loop');
  }

  get serviceId(): ServiceId {
    return this.deps.serviceId;
  }

  submitSample(sample: ProbeSample): void {
    if (this.stopped) {
      return;
    }
    if (this.queue.length >= this.deps.capacity) {
      const oldest = this.queue.findIndex(message => message.type === 'sample');
      if (oldest === -1) {
        // Nothing older to make room with
        this.countDrop();
        return;
      }
      this.queue.splice(oldest, 1);
      this.countDrop();
    }
    this.enqueue({ type: 'sample', sample });
  }

  submitTick(): void {
    if (this.stopped) {
      return;
    }
    // One pending tick re-evaluates everything a later one would
    if (this.queue.some(message => message.type === 'tick')) {
      return;
    }
    this.enqueue({ type: 'tick' });
  }

  submitOverride(signal: OverrideSignal): Promise<OverrideResult> {
    if (this.stopped) {
      return Promise.reject(new ControllerError(`Decision loop for ${this.deps.serviceId} is stopped`, ErrorCode.INVALID_STATE));
    }
    if (signal.kind === 'abort') {
      return this.deps.coordinator.applyOverride(signal);
    }
    const reply = createDeferred<OverrideResult>();
    this.enqueue({ type: 'override', signal, reply });
    return reply.promise;
  }

  getDroppedSamples(): number {
    return this.droppedSamples;
  }

  getQueueDepth(): number {
    return this.queue.length;
  }

  /**
   * Resolves once the queue is empty and nothing is being handled.
   */
  async idle(): Promise<void> {
    while (this.processing) {
      await this.processing;
    }
  }

  /**
   * Refuse new messages and finish the queued ones.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    await this.idle();
  }

  private enqueue(message: DecisionMessage): void {
    this.queue.push(message);
    this.pump();
  }

  private pump(): void {
    if (this.processing || this.queue.length === 0) {
      return;
    }
    this.processing = this.drain().finally(() => {
      this.processing = null;
      // Messages queued after the last shift but before this callback
      this.pump();
    });
  }

  private async drain(): Promise<void> {
    let message = this.queue.shift();
    while (message) {
      await this.handle(message);
      message = this.queue.shift();
    }
  }

  private async handle(message: DecisionMessage): Promise<void> {
    const { slo, detector, coordinator } = this.deps;

    try {
      switch (message.type) {
        case 'sample': {
          slo.record(message.sample);
          const transition = detector.evaluate(message.sample);
          await coordinator.onDetectorTransition(transition);
          break;
        }
        case 'tick':
          await coordinator.tick();
          break;
        case 'override':
          try {
            message.reply.resolve(await coordinator.applyOverride(message.signal));
          } catch (error) {
            message.reply.reject(error);
          }
          break;
      }
      await coordinator.settle();
    } catch (error) {
      this.logger.error(`Decision loop for ${this.deps.serviceId} failed to handle ${message.type}`, {
        serviceId: this.deps.serviceId,
        error: getErrorMessage(error)
      });
    }
  }

  private countDrop(): void {
    this.droppedSamples++;
    this.logger.warn('Decision queue full, oldest sample dropped', {
      serviceId: this.deps.serviceId,
      dropped: this.droppedSamples
    });
  }
}
