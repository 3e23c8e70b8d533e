/**
 * Retry Policy
 *
 * Bounded exponential backoff around a request. Applied uniformly by the
 * client to every chain service call:
 *
 *   wait(attempt) = min(maxWait, max(minWait, minWait * multiplier^(attempt - 1)))
 *
 * With the defaults (10 attempts, x1.5, 1s..10s) the waits are
 * 1s, 1.5s, 2.25s, 3.375s, ... capped at 10s.
 */

import type { Logger } from 'pino';
import { ConfigurationError, describeError, isRetryableError } from './errors.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface RetryPolicyOptions {
  /** Attempts including the first one (default: 10) */
  maxAttempts?: number;
  /** Backoff growth factor (default: 1.5) */
  multiplier?: number;
  /** Floor of every wait (default: 1000) */
  minWaitMs?: number;
  /** Ceiling of every wait (default: 10000) */
  maxWaitMs?: number;
  /** Decides whether a failure is worth another attempt (default: isRetryableError) */
  isRetryable?: (error: unknown) => boolean;
  /** Called before each backoff sleep */
  onRetry?: (event: RetryEvent) => void;
  /** Backoff sleep; replaceable for tests */
  sleep?: (ms: number) => Promise<void>;
}

export interface RetryEvent {
  operation: string;
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface BackoffSchedule {
  multiplier: number;
  minWaitMs: number;
  maxWaitMs: number;
}

export const DEFAULT_RETRY_OPTIONS = {
  maxAttempts: 10,
  multiplier: 1.5,
  minWaitMs: 1_000,
  maxWaitMs: 10_000,
} as const;

// --------------------------------------------------------------------------
// Backoff
// --------------------------------------------------------------------------

export function computeBackoffMs(attempt: number, schedule: BackoffSchedule): number {
  const exponential = schedule.minWaitMs * Math.pow(schedule.multiplier, attempt - 1);
  return Math.min(schedule.maxWaitMs, Math.max(schedule.minWaitMs, exponential));
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// --------------------------------------------------------------------------
// RetryPolicy
// --------------------------------------------------------------------------

export class RetryPolicy {
  private readonly log: Logger;
  private readonly maxAttempts: number;
  private readonly schedule: BackoffSchedule;
  private readonly isRetryable: (error: unknown) => boolean;
  private readonly onRetry?: (event: RetryEvent) => void;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(logger: Logger, options: RetryPolicyOptions = {}) {
    this.log = logger.child({ component: 'RetryPolicy' });
    this.maxAttempts = options.maxAttempts ?? DEFAULT_RETRY_OPTIONS.maxAttempts;
    this.schedule = {
      multiplier: options.multiplier ?? DEFAULT_RETRY_OPTIONS.multiplier,
      minWaitMs: options.minWaitMs ?? DEFAULT_RETRY_OPTIONS.minWaitMs,
      maxWaitMs: options.maxWaitMs ?? DEFAULT_RETRY_OPTIONS.maxWaitMs,
    };
    this.isRetryable = options.isRetryable ?? isRetryableError;
    this.onRetry = options.onRetry;
    this.sleep = options.sleep ?? defaultSleep;

    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new ConfigurationError('Retry maxAttempts must be a positive integer', {
        maxAttempts: this.maxAttempts,
      });
    }
    if (this.schedule.minWaitMs < 0 || this.schedule.maxWaitMs < this.schedule.minWaitMs) {
      throw new ConfigurationError('Retry waits must satisfy 0 <= minWaitMs <= maxWaitMs', {
        ...this.schedule,
      });
    }
  }

  getMaxAttempts(): number {
    return this.maxAttempts;
  }

  backoffFor(attempt: number): number {
    return computeBackoffMs(attempt, this.schedule);
  }

  /**
   * Run `fn` until it succeeds, fails with a non-retryable error, or runs out
   * of attempts. The last error is rethrown unchanged.
   */
  async execute<T>(operation: string, fn: (attempt: number) => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn(attempt);
      } catch (error) {
        if (!this.isRetryable(error)) {
          this.log.error(
            { operation, attempt, error: describeError(error) },
            'Chain service request failed with a non-retryable error'
          );
          throw error;
        }

        if (attempt >= this.maxAttempts) {
          this.log.error(
            { operation, attempts: attempt, error: describeError(error) },
            'Chain service request failed, retries exhausted'
          );
          throw error;
        }

        const delayMs = this.backoffFor(attempt);
        this.log.warn(
          { operation, attempt, maxAttempts: this.maxAttempts, delayMs, error: describeError(error) },
          'Chain service request failed, retrying'
        );
        this.onRetry?.({ operation, attempt, delayMs, error });
        await this.sleep(delayMs);
      }
    }
  }
}
