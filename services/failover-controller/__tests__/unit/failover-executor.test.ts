/**
 * Failover Executor Unit Tests
 *
 * Covers step ordering, skip rules, retries, resume from the journal,
 * cancellation and reverse-order compensation.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { ExecutorStepFailure, RollbackFailure } from '@regionguard/core';
import type { FailoverEvent, RegionId, RegionState, StepRecord } from '@regionguard/types';
import { FailoverExecutor } from '../../src/execution/failover-executor';
import type { StepPolicy } from '../../src/execution/failover-executor';
import { createDefaultSteps } from '../../src/execution/failover-steps';
import type { FailoverStep } from '../../src/execution/failover-steps';
import { InMemoryFailoverJournal } from '../../src/journal/failover-journal';
import { CapturingSink, FakeControlPlane, ManualClock, waitFor } from '../helpers/fixtures';

const POLICY: StepPolicy = {
  stepTimeoutMs: 1_000,
  stepMaxAttempts: 3,
  stepInitialBackoffMs: 1,
  stepMaxBackoffMs: 5
};

function createEvent(steps: StepRecord[]): FailoverEvent {
  return {
    id: 'evt-1',
    serviceId: 'checkout',
    fromRegion: 'us-east',
    toRegion: 'eu-west',
    trigger: 'automatic',
    reason: 'primary unreachable',
    triggeredAt: 1_000_000,
    phase: 'in_progress',
    steps
  };
}

function statuses(event: FailoverEvent): string[] {
  return event.steps.map(step => `${step.name}:${step.status}`);
}

describe('FailoverExecutor', () => {
  let plane: FakeControlPlane;
  let journal: InMemoryFailoverJournal;
  let sink: CapturingSink;
  let regionStates: Map<RegionId, RegionState>;

  const createExecutor = (steps: FailoverStep[] = createDefaultSteps(plane.capabilities())): FailoverExecutor =>
    new FailoverExecutor({
      steps,
      journal,
      policy: POLICY,
      regionState: regionId => regionStates.get(regionId),
      sink,
      clock: new ManualClock(),
      jitter: false
    });

  beforeEach(() => {
    plane = new FakeControlPlane();
    journal = new InMemoryFailoverJournal();
    sink = new CapturingSink();
    regionStates = new Map<RegionId, RegionState>([
      ['us-east', 'degraded'],
      ['eu-west', 'promoting']
    ]);
  });

  describe('execute', () => {
    it('runs the default steps in order', async () => {
      const executor = createExecutor();
      const event = createEvent(executor.pendingSteps());

      const result = await executor.execute(event);

      expect(result).toEqual({ status: 'succeeded' });
      expect(plane.calls).toEqual(['quiesceWrites:us-east', 'promote:eu-west', 'routeTo:eu-west', 'resumeWrites:eu-west']);
      expect(statuses(event)).toEqual([
        'quiesce_writes:succeeded',
        'promote_database:succeeded',
        'update_routing:succeeded',
        'resume_writes:succeeded'
      ]);
      expect(event.steps[1].detail).toBe('promoted');
    });

    it('persists every step transition before moving on', async () => {
      const executor = createExecutor();
      const event = createEvent(executor.pendingSteps());

      await executor.execute(event);

      expect(sink.ofType('failover_step').map(e => `${e.step.name}:${e.step.status}`)).toEqual([
        'quiesce_writes:running',
        'quiesce_writes:succeeded',
        'promote_database:running',
        'promote_database:succeeded',
        'update_routing:running',
        'update_routing:succeeded',
        'resume_writes:running',
        'resume_writes:succeeded'
      ]);
      const stored = await journal.get('evt-1');
      expect(stored ? statuses(stored) : []).toEqual(statuses(event));
    });

    it('skips quiescing an unreachable primary', async () => {
      regionStates.set('us-east', 'unreachable');
      const executor = createExecutor();
      const event = createEvent(executor.pendingSteps());

      await executor.execute(event);

      expect(event.steps[0]).toMatchObject({ status: 'skipped', detail: 'step does not apply', attempts: 0 });
      expect(plane.calls[0]).toBe('promote:eu-west');
    });

    it('records an already-primary target as the promotion detail', async () => {
      plane.promoteOutcome = 'already_primary';
      const executor = createExecutor();
      const event = createEvent(executor.pendingSteps());

      await executor.execute(event);

      expect(event.steps[1].detail).toBe('already_primary');
    });

    it('retries a failing step with backoff', async () => {
      plane.failNext('promote', 2);
      const executor = createExecutor();
      const event = createEvent(executor.pendingSteps());

      const result = await executor.execute(event);

      expect(result.status).toBe('succeeded');
      expect(event.steps[1]).toMatchObject({ status: 'succeeded', attempts: 3 });
      expect(plane.calls.filter(call => call === 'promote:eu-west')).toHaveLength(3);
    });

    it('fails a step after its attempts run out', async () => {
      plane.failNext('routeTo', Infinity);
      const executor = createExecutor();
      const event = createEvent(executor.pendingSteps());

      const result = await executor.execute(event);

      expect(result.status).toBe('failed');
      if (result.status !== 'failed') return;
      expect(result.error).toBeInstanceOf(ExecutorStepFailure);
      expect(result.error.message).toBe('Step update_routing of failover evt-1 failed after 3 attempt(s): routeTo failed for eu-west');
      expect(statuses(event)).toEqual([
        'quiesce_writes:succeeded',
        'promote_database:succeeded',
        'update_routing:failed',
        'resume_writes:pending'
      ]);
      expect(event.steps[2].error).toBe('routeTo failed for eu-west');
    });

    it('resumes from the first step that has not succeeded', async () => {
      const executor = createExecutor();
      const event = createEvent([
        { name: 'quiesce_writes', status: 'succeeded', attempts: 1 },
        { name: 'promote_database', status: 'succeeded', attempts: 1, detail: 'promoted' },
        { name: 'update_routing', status: 'running', attempts: 1 },
        { name: 'resume_writes', status: 'pending', attempts: 0 }
      ]);

      const result = await executor.execute(event);

      expect(result.status).toBe('succeeded');
      expect(plane.calls).toEqual(['routeTo:eu-west', 'resumeWrites:eu-west']);
      expect(event.steps[2].attempts).toBe(2);
    });

    it('does not re-run skipped steps on resume', async () => {
      const executor = createExecutor();
      const event = createEvent([
        { name: 'quiesce_writes', status: 'skipped', attempts: 0 },
        { name: 'promote_database', status: 'pending', attempts: 0 },
        { name: 'update_routing', status: 'pending', attempts: 0 },
        { name: 'resume_writes', status: 'pending', attempts: 0 }
      ]);

      await executor.execute(event);

      expect(plane.calls).toEqual(['promote:eu-west', 'routeTo:eu-west', 'resumeWrites:eu-west']);
    });

    it('returns cancelled without running anything when already aborted', async () => {
      const executor = createExecutor();
      const event = createEvent(executor.pendingSteps());
      const controller = new AbortController();
      controller.abort();

      const result = await executor.execute(event, controller.signal);

      expect(result).toEqual({ status: 'cancelled' });
      expect(plane.calls).toEqual([]);
    });

    it('stops at a step in flight when aborted', async () => {
      plane.hang('promote');
      const executor = createExecutor();
      const event = createEvent(executor.pendingSteps());
      const controller = new AbortController();

      const running = executor.execute(event, controller.signal);
      await waitFor(() => plane.calls.includes('promote:eu-west'));
      controller.abort();
      const result = await running;

      expect(result).toEqual({ status: 'cancelled', step: 'promote_database' });
      expect(event.steps[1].status).toBe('cancelled');
      expect(plane.calls).toEqual(['quiesceWrites:us-east', 'promote:eu-west']);
    });

    it('bounds each attempt by the step timeout and aborts the abandoned attempt', async () => {
      let abandoned = 0;
      const slowStep: FailoverStep = {
        name: 'warm_cache',
        timeoutMs: 10,
        run: (_context, signal) => new Promise<void>((_resolve, reject) => {
          signal.addEventListener('abort', () => {
            abandoned++;
            reject(new Error('warm_cache aborted'));
          }, { once: true });
        }),
        compensate: async () => undefined
      };
      const executor = createExecutor([slowStep]);
      const event = createEvent(executor.pendingSteps());

      const result = await executor.execute(event);

      expect(result.status).toBe('failed');
      expect(event.steps[0]).toMatchObject({
        status: 'failed',
        attempts: 3,
        error: 'Timeout: warm_cache exceeded 10ms'
      });
      expect(abandoned).toBe(3);
    });
  });

  describe('rollback', () => {
    it('compensates succeeded and failed steps in reverse order', async () => {
      plane.failNext('routeTo', 3);
      const executor = createExecutor();
      const event = createEvent(executor.pendingSteps());
      await executor.execute(event);
      plane.calls.length = 0;

      const result = await executor.rollback(event);

      expect(result).toEqual({ status: 'compensated', compensated: ['update_routing', 'promote_database', 'quiesce_writes'] });
      expect(plane.calls).toEqual(['routeTo:us-east', 'demote:eu-west', 'resumeWrites:us-east']);
      expect(statuses(event)).toEqual([
        'quiesce_writes:compensated',
        'promote_database:compensated',
        'update_routing:compensated',
        'resume_writes:pending'
      ]);
      expect(event.steps[2].error).toBe('routeTo failed for eu-west');
    });

    it('undoes a step that took effect before it threw', async () => {
      const effects: string[] = [];
      const steps: FailoverStep[] = [
        {
          name: 'quiesce_writes',
          run: async () => {
            effects.push('quiesce old');
          },
          compensate: async () => {
            effects.push('resume old');
          }
        },
        {
          name: 'promote_database',
          run: async () => {
            effects.push('promote new');
            throw new Error('socket hang up');
          },
          compensate: async () => {
            effects.push('demote new');
          }
        },
        {
          name: 'update_routing',
          run: async () => {
            effects.push('route new');
          },
          compensate: async () => {
            effects.push('route old');
          }
        }
      ];
      const executor = createExecutor(steps);
      const event = createEvent(executor.pendingSteps());

      expect((await executor.execute(event)).status).toBe('failed');
      effects.length = 0;
      const result = await executor.rollback(event);

      expect(result).toEqual({ status: 'compensated', compensated: ['promote_database', 'quiesce_writes'] });
      expect(effects).toEqual(['demote new', 'resume old']);
    });

    it('compensates a step cancelled in flight', async () => {
      plane.hang('promote');
      const executor = createExecutor();
      const event = createEvent(executor.pendingSteps());
      const controller = new AbortController();

      const running = executor.execute(event, controller.signal);
      await waitFor(() => plane.calls.includes('promote:eu-west'));
      controller.abort();
      await running;
      plane.calls.length = 0;

      const result = await executor.rollback(event);

      expect(result).toEqual({ status: 'compensated', compensated: ['promote_database', 'quiesce_writes'] });
      expect(plane.calls).toEqual(['demote:eu-west', 'resumeWrites:us-east']);
    });

    it('compensates a step left running by a previous run', async () => {
      const executor = createExecutor();
      const event = createEvent([
        { name: 'quiesce_writes', status: 'succeeded', attempts: 1 },
        { name: 'promote_database', status: 'running', attempts: 1 },
        { name: 'update_routing', status: 'pending', attempts: 0 },
        { name: 'resume_writes', status: 'pending', attempts: 0 }
      ]);

      const result = await executor.rollback(event);

      expect(result.compensated).toEqual(['promote_database', 'quiesce_writes']);
      expect(plane.calls).toEqual(['demote:eu-west', 'resumeWrites:us-east']);
    });

    it('stops at the first compensation that cannot complete', async () => {
      const executor = createExecutor();
      const event = createEvent(executor.pendingSteps());
      await executor.execute(event);
      plane.calls.length = 0;
      plane.failNext('demote', Infinity);

      const result = await executor.rollback(event);

      expect(result.status).toBe('failed');
      if (result.status !== 'failed') return;
      expect(result.error).toBeInstanceOf(RollbackFailure);
      expect(result.error.message).toBe('Compensation of promote_database for failover evt-1 failed: demote failed for eu-west');
      expect(result.compensated).toEqual(['resume_writes', 'update_routing']);
      expect(plane.calls).toEqual(['quiesceWrites:eu-west', 'routeTo:us-east', 'demote:eu-west', 'demote:eu-west', 'demote:eu-west']);
      expect(statuses(event)).toEqual([
        'quiesce_writes:succeeded',
        'promote_database:compensation_failed',
        'update_routing:compensated',
        'resume_writes:compensated'
      ]);
    });

    it('has nothing to compensate before any step succeeded', async () => {
      const executor = createExecutor();
      const event = createEvent(executor.pendingSteps());

      expect(await executor.rollback(event)).toEqual({ status: 'compensated', compensated: [] });
      expect(plane.calls).toEqual([]);
    });
  });
});
