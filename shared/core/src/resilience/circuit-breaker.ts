// Circuit Breaker for outbound calls that must never stall the controller
// (notification webhooks). Failures are counted inside a monitoring window;
// the breaker opens at the threshold and probes again after recoveryTimeout.

import type { Clock } from '@regionguard/types';
import { systemClock } from '@regionguard/types';
import { createLogger } from '../logging';
import type { ServiceLogger } from '../logging';

export interface CircuitBreakerDeps {
  logger?: ServiceLogger;
  clock?: Clock;
}

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN'
}

export interface CircuitBreakerConfig {
  name: string;                  // Identifier for logging
  failureThreshold: number;      // Failures within monitoringPeriod before opening
  recoveryTimeout: number;       // ms in OPEN before a HALF_OPEN trial
  monitoringPeriod: number;      // Window for failure counting
  successThreshold: number;      // Successes in HALF_OPEN needed to close
}

export interface CircuitBreakerStats {
  state: CircuitState;
  windowFailures: number;
  halfOpenSuccesses: number;
  totalRequests: number;
  totalFailures: number;
  totalSuccesses: number;
  lastFailureTime: number;
}

export class CircuitBreakerError extends Error {
  constructor(
    message: string,
    public readonly circuitName: string,
    public readonly state: CircuitState
  ) {
    super(message);
    this.name = 'CircuitBreakerError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureTimes: number[] = [];
  private halfOpenSuccesses = 0;
  private halfOpenInFlight = false;
  private nextAttemptTime = 0;
  private lastFailureTime = 0;
  private totalRequests = 0;
  private totalFailures = 0;
  private totalSuccesses = 0;

  private readonly logger: ServiceLogger;
  private readonly clock: Clock;

  constructor(private readonly config: CircuitBreakerConfig, deps: CircuitBreakerDeps = {}) {
    this.logger = deps.logger ?? createLogger('circuit-breaker');
    this.clock = deps.clock ?? systemClock;
  }

  async execute<T>(operation: () => Promise<T>): Promise<T> {
    this.totalRequests++;
    const now = this.clock.now();

    if (this.state === CircuitState.OPEN) {
      if (now < this.nextAttemptTime) {
        throw new CircuitBreakerError(
          `Circuit breaker is OPEN for ${this.config.name}`,
          this.config.name,
          this.state
        );
      }
      this.transitionTo(CircuitState.HALF_OPEN);
    }

    // One trial call at a time while HALF_OPEN
    if (this.state === CircuitState.HALF_OPEN) {
      if (this.halfOpenInFlight) {
        throw new CircuitBreakerError(
          `Circuit breaker ${this.config.name} is HALF_OPEN with a trial in flight`,
          this.config.name,
          this.state
        );
      }
      this.halfOpenInFlight = true;
    }

    try {
      const result = await operation();
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    } finally {
      this.halfOpenInFlight = false;
    }
  }

  private onSuccess(): void {
    this.totalSuccesses++;

    if (this.state === CircuitState.HALF_OPEN) {
      this.halfOpenSuccesses++;
      if (this.halfOpenSuccesses >= this.config.successThreshold) {
        this.failureTimes = [];
        this.transitionTo(CircuitState.CLOSED);
      }
    }
  }

  private onFailure(): void {
    const now = this.clock.now();
    this.totalFailures++;
    this.lastFailureTime = now;

    if (this.state === CircuitState.HALF_OPEN) {
      this.open(now);
      return;
    }

    this.failureTimes.push(now);
    const windowStart = now - this.config.monitoringPeriod;
    this.failureTimes = this.failureTimes.filter(time => time >= windowStart);

    if (this.failureTimes.length >= this.config.failureThreshold) {
      this.open(now);
    }
  }

  private open(now: number): void {
    this.nextAttemptTime = now + this.config.recoveryTimeout;
    this.transitionTo(CircuitState.OPEN);
  }

  private transitionTo(next: CircuitState): void {
    const previous = this.state;
    this.state = next;
    this.halfOpenSuccesses = 0;
    const meta = { circuit: this.config.name, from: previous, to: next, windowFailures: this.failureTimes.length };
    if (next === CircuitState.OPEN) {
      this.logger.warn(`Circuit breaker ${this.config.name} opened`, meta);
    } else {
      this.logger.info(`Circuit breaker ${this.config.name} ${next}`, meta);
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): CircuitBreakerStats {
    return {
      state: this.state,
      windowFailures: this.failureTimes.length,
      halfOpenSuccesses: this.halfOpenSuccesses,
      totalRequests: this.totalRequests,
      totalFailures: this.totalFailures,
      totalSuccesses: this.totalSuccesses,
      lastFailureTime: this.lastFailureTime
    };
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureTimes = [];
    this.halfOpenSuccesses = 0;
    this.nextAttemptTime = 0;
  }
}
