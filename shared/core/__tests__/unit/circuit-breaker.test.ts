/**
 * Circuit Breaker State Machine Unit Test
 *
 * CLOSED → (failures >= threshold within window) → OPEN
 * OPEN → (recovery timeout expires) → HALF_OPEN
 * HALF_OPEN → (successThreshold successes) → CLOSED
 * HALF_OPEN → (failure) → OPEN
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  CircuitBreaker,
  CircuitBreakerError,
  CircuitState,
  NullLogger,
  RecordingLogger
} from '@regionguard/core';
import type { CircuitBreakerConfig } from '@regionguard/core';

const TEST_CONFIG: CircuitBreakerConfig = {
  name: 'webhook',
  failureThreshold: 3,
  recoveryTimeout: 100,
  monitoringPeriod: 1000,
  successThreshold: 2
};

function failingOperation(message = 'Operation failed'): () => Promise<never> {
  return async () => {
    throw new Error(message);
  };
}

function succeedingOperation<T>(result: T): () => Promise<T> {
  return async () => result;
}

describe('CircuitBreaker', () => {
  let now: number;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    now = 10_000;
    breaker = new CircuitBreaker(TEST_CONFIG, { logger: new NullLogger(), clock: { now: () => now } });
  });

  async function failTimes(count: number): Promise<void> {
    for (let i = 0; i < count; i++) {
      await expect(breaker.execute(failingOperation())).rejects.toThrow('Operation failed');
    }
  }

  it('starts CLOSED and passes results through', async () => {
    await expect(breaker.execute(succeedingOperation('ok'))).resolves.toBe('ok');
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('opens after failureThreshold failures in the window', async () => {
    await failTimes(3);

    expect(breaker.getState()).toBe(CircuitState.OPEN);
    await expect(breaker.execute(succeedingOperation('x'))).rejects.toBeInstanceOf(CircuitBreakerError);
  });

  it('forgets failures that fall outside the monitoring window', async () => {
    await failTimes(2);
    now += 1500;
    await failTimes(1);

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    expect(breaker.getStats().windowFailures).toBe(1);
  });

  it('moves to HALF_OPEN after recoveryTimeout and closes after enough successes', async () => {
    await failTimes(3);
    now += 100;

    await expect(breaker.execute(succeedingOperation(1))).resolves.toBe(1);
    expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);

    await expect(breaker.execute(succeedingOperation(2))).resolves.toBe(2);
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    expect(breaker.getStats().windowFailures).toBe(0);
  });

  it('re-opens on a failure while HALF_OPEN', async () => {
    await failTimes(3);
    now += 100;

    await failTimes(1);

    expect(breaker.getState()).toBe(CircuitState.OPEN);
    now += 50;
    await expect(breaker.execute(succeedingOperation(1))).rejects.toBeInstanceOf(CircuitBreakerError);
  });

  it('tracks totals', async () => {
    await breaker.execute(succeedingOperation(1));
    await failTimes(1);

    expect(breaker.getStats()).toEqual({
      state: CircuitState.CLOSED,
      windowFailures: 1,
      halfOpenSuccesses: 0,
      totalRequests: 2,
      totalFailures: 1,
      totalSuccesses: 1,
      lastFailureTime: 10_000
    });
  });

  it('logs a warning when it opens', async () => {
    const logger = new RecordingLogger();
    const logged = new CircuitBreaker(TEST_CONFIG, { logger, clock: { now: () => now } });

    for (let i = 0; i < 3; i++) {
      await expect(logged.execute(failingOperation())).rejects.toThrow();
    }

    expect(logger.hasLogMatching('warn', 'Circuit breaker webhook opened')).toBe(true);
  });

  it('reset() closes the circuit', async () => {
    await failTimes(3);
    breaker.reset();

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    await expect(breaker.execute(succeedingOperation('back'))).resolves.toBe('back');
  });
});
