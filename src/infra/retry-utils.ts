/**
 * Retry helpers with exponential backoff, shared by oracle calls and the
 * loading-screen poll.
 */

import { ILogger } from './logger.js';
import { IClock, SystemClock } from './clock.js';

export interface BackoffPolicy {
  initialDelay: number;
  maxDelay: number;
  /** Adds up to 20% random spread on top of the computed delay. */
  jitter?: boolean;
}

export interface RetryOptions extends Partial<BackoffPolicy> {
  maxRetries: number;
}

export class RetryableError extends Error {
  constructor(message: string, public originalError?: Error) {
    super(message);
    this.name = 'RetryableError';
  }
}

export class FatalError extends Error {
  constructor(message: string, public originalError?: Error) {
    super(message);
    this.name = 'FatalError';
  }
}

const TRANSIENT_ERROR_PATTERNS = [
  /timeout/i,
  /timed out/i,
  /network/i,
  /connection/i,
  /ECONNREFUSED/i,
  /ECONNRESET/i,
  /ETIMEDOUT/i,
  /rate.?limit/i,
  /too many requests/i,
  /overloaded/i,
  /\b50[234]\b/,
  /\b429\b/,
];

export function isTransientError(error: Error): boolean {
  if (error instanceof RetryableError) {
    return true;
  }
  if (error instanceof FatalError) {
    return false;
  }
  return TRANSIENT_ERROR_PATTERNS.some((pattern) => pattern.test(error.message));
}

/**
 * Sorts a vendor SDK error by its HTTP status: 408, 409, 429 and 5xx are
 * worth another attempt, any other 4xx is final. Errors without a status
 * are returned as they are and left to message matching.
 */
export function classifyHttpError(error: Error, status: number | undefined): Error {
  if (status === undefined) {
    return error;
  }
  if (status === 408 || status === 409 || status === 429 || status >= 500) {
    return new RetryableError(error.message, error);
  }
  if (status >= 400) {
    return new FatalError(error.message, error);
  }
  return error;
}

/**
 * Exponential delay before retry number `attempt` (0-based), capped at
 * `maxDelay`.
 */
export function computeBackoffDelay(attempt: number, policy: BackoffPolicy): number {
  let delay = policy.initialDelay * Math.pow(2, attempt);

  if (policy.jitter) {
    delay += delay * 0.2 * Math.random();
  }

  return Math.min(delay, policy.maxDelay);
}

export class RetryStrategy {
  constructor(
    private logger?: ILogger,
    private clock: IClock = new SystemClock()
  ) {}

  async execute<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
    const policy: BackoffPolicy = {
      initialDelay: options.initialDelay ?? 1000,
      maxDelay: options.maxDelay ?? 30000,
      jitter: options.jitter ?? true,
    };

    for (let attempt = 0; ; attempt++) {
      try {
        return await operation();
      } catch (caught) {
        const error = caught instanceof Error ? caught : new Error(String(caught));
        const retryable = isTransientError(error);

        if (!retryable || attempt >= options.maxRetries) {
          this.logger?.warn('Operation failed', {
            attempts: attempt + 1,
            maxRetries: options.maxRetries,
            error: error.message,
            retryable,
          });
          throw error;
        }

        const delay = computeBackoffDelay(attempt, policy);
        this.logger?.warn(`Retry attempt ${attempt + 1}/${options.maxRetries}`, {
          error: error.message,
          nextRetryIn: delay,
        });
        await this.clock.sleep(delay);
      }
    }
  }
}
