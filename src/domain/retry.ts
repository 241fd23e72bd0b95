/**
 * Bounded retry with linear backoff
 *
 * delay(attempt) = attempt × delayMs, so with 3 attempts and a 2s unit the
 * waits are 2s then 4s. Only errors the predicate accepts are retried; the
 * geocoder client marks throttling and 5xx/network failures as retryable.
 */

import { logger } from './logger.js';
import { systemClock, type Clock } from './rate-limiter.js';
import { GeocoderError } from './error-handler.js';

export interface RetryConfig {
  maxAttempts: number;
  delayMs: number;
  /** Decide whether a failure is worth another attempt */
  isRetryable?: (error: Error) => boolean;
}

export interface RetryAttempt {
  attemptNumber: number;
  delayMs: number;
  error: Error;
  retryable: boolean;
}

/**
 * Thrown after the last attempt, or at the first non-retryable failure
 */
export class RetryExhaustedError extends Error {
  readonly attempts: readonly RetryAttempt[];
  readonly lastError: Error;

  constructor(attempts: readonly RetryAttempt[], lastError: Error) {
    super(`Retry exhausted after ${attempts.length} attempts: ${lastError.message}`);
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export function isRetryableGeocoderError(error: Error): boolean {
  return error instanceof GeocoderError && error.retryable;
}

export class RetryExecutor {
  private readonly config: Required<RetryConfig>;
  private readonly clock: Clock;

  constructor(config: RetryConfig, clock: Clock = systemClock) {
    if (config.maxAttempts < 1) {
      throw new Error(`maxAttempts must be at least 1, got ${config.maxAttempts}`);
    }
    this.config = {
      isRetryable: isRetryableGeocoderError,
      ...config,
    };
    this.clock = clock;
  }

  /**
   * Execute `fn`, retrying retryable failures
   *
   * @param label - Identifies the operation in warning logs (usually the element id)
   */
  async execute<T>(fn: () => Promise<T>, label = 'operation'): Promise<T> {
    const attempts: RetryAttempt[] = [];

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      try {
        return await fn();
      } catch (error) {
        const lastError = error instanceof Error ? error : new Error(String(error));
        const retryable = this.config.isRetryable(lastError);
        const delayMs = this.delayFor(attempt);

        attempts.push({ attemptNumber: attempt, delayMs, error: lastError, retryable });

        if (!retryable || attempt === this.config.maxAttempts) {
          throw new RetryExhaustedError(attempts, lastError);
        }

        logger.warn('Retrying after failure', {
          label,
          attempt,
          maxAttempts: this.config.maxAttempts,
          delayMs,
          error: lastError.message,
        });
        await this.clock.sleep(delayMs);
      }
    }

    // Unreachable: the loop returns or throws on its last iteration
    throw new Error(`Retry loop for ${label} ended without a result`);
  }

  delayFor(attempt: number): number {
    return attempt * this.config.delayMs;
  }
}
