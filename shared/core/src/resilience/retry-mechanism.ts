// Bounded exponential backoff with jitter.
// Every attempt and every sleep observes the caller's abort signal.

import { isRetryableError, OperationCancelledError, toError } from '../error-handling';
import { sleep } from '../async/async-utils';

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;      // Delay before the second attempt
  maxDelayMs: number;          // Cap on any single delay
  backoffMultiplier: number;
  jitter: boolean;             // Add up to 25% random jitter
  retryCondition: (error: Error) => boolean;
  onRetry: (attempt: number, error: Error, delayMs: number) => void;
}

interface RetryAccounting {
  attempts: number;
  totalDelayMs: number;
}

export type RetryResult<T> =
  | (RetryAccounting & { success: true; result: T })
  | (RetryAccounting & { success: false; error: Error; cancelled: boolean });

export class RetryMechanism {
  private readonly config: RetryConfig;

  constructor(config: Partial<RetryConfig> = {}) {
    // ?? so that an explicit 0 is kept
    this.config = {
      maxAttempts: config.maxAttempts ?? 3,
      initialDelayMs: config.initialDelayMs ?? 1000,
      maxDelayMs: config.maxDelayMs ?? 30000,
      backoffMultiplier: config.backoffMultiplier ?? 2,
      jitter: config.jitter !== false,
      retryCondition: config.retryCondition ?? isRetryableError,
      onRetry: config.onRetry ?? (() => undefined)
    };

    if (!Number.isInteger(this.config.maxAttempts) || this.config.maxAttempts < 1) {
      throw new TypeError(`RetryMechanism: maxAttempts must be an integer >= 1, got ${this.config.maxAttempts}`);
    }
  }

  /**
   * Run fn until it succeeds, the error is not retryable, attempts run out,
   * or the signal aborts. Never throws.
   */
  async execute<T>(fn: (attempt: number) => Promise<T>, signal?: AbortSignal): Promise<RetryResult<T>> {
    let lastError: Error = new Error('retry: no attempt made');
    let totalDelayMs = 0;
    let attempt = 0;

    while (attempt < this.config.maxAttempts) {
      attempt++;
      if (signal?.aborted) {
        return { success: false, error: new OperationCancelledError('retry'), attempts: attempt - 1, totalDelayMs, cancelled: true };
      }

      try {
        const result = await fn(attempt);
        return { success: true, result, attempts: attempt, totalDelayMs };
      } catch (error) {
        lastError = toError(error);

        if (lastError instanceof OperationCancelledError) {
          return { success: false, error: lastError, attempts: attempt, totalDelayMs, cancelled: true };
        }
        if (attempt >= this.config.maxAttempts || !this.config.retryCondition(lastError)) {
          break;
        }

        const delay = this.calculateDelay(attempt);
        this.config.onRetry(attempt, lastError, delay);

        try {
          await sleep(delay, signal);
        } catch (sleepError) {
          return { success: false, error: toError(sleepError), attempts: attempt, totalDelayMs, cancelled: true };
        }
        totalDelayMs += delay;
      }
    }

    return { success: false, error: lastError, attempts: attempt, totalDelayMs, cancelled: false };
  }

  calculateDelay(attempt: number): number {
    // delay = initialDelay * multiplier^(attempt - 1), capped
    let delay = this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    delay = Math.min(delay, this.config.maxDelayMs);

    if (this.config.jitter) {
      delay += delay * 0.25 * Math.random();
    }

    return Math.floor(delay);
  }
}
