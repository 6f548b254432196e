/**
 * Retry Policy
 *
 * One reusable retry loop with exponential backoff, applied at the boundary to
 * external collaborators (oracle, embeddings, vector index).
 */

import { ErrorHandler } from './handler';

/**
 * Retry configuration
 */
export interface RetryPolicyOptions {
  maxAttempts: number;
  initialDelayMs: number;
  backoffMultiplier: number;
  maxDelayMs?: number;
  isRetryable?: (error: Error) => boolean;
  /** Called before each wait; receives the attempt that just failed (1-based) */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  /** Injectable for tests */
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_OPTIONS: RetryPolicyOptions = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Exponential-backoff retry policy
 */
export class RetryPolicy {
  private readonly options: RetryPolicyOptions;

  constructor(options: Partial<RetryPolicyOptions> = {}) {
    this.options = { ...DEFAULT_RETRY_OPTIONS, ...options };
    if (this.options.maxAttempts < 1) {
      throw new RangeError('maxAttempts must be at least 1');
    }
  }

  get maxAttempts(): number {
    return this.options.maxAttempts;
  }

  /**
   * Delay before the retry that follows the given failed attempt (1-based)
   */
  delayFor(attempt: number): number {
    const delay = this.options.initialDelayMs * Math.pow(this.options.backoffMultiplier, attempt - 1);
    return this.options.maxDelayMs !== undefined ? Math.min(delay, this.options.maxDelayMs) : delay;
  }

  /**
   * Run the operation, retrying retryable failures. The operation receives the
   * 1-based attempt number so callers can tighten the request on retries.
   */
  async execute<T>(operation: (attempt: number) => Promise<T>): Promise<T> {
    const isRetryable = this.options.isRetryable ?? ErrorHandler.isRetryable;
    const sleep = this.options.sleep ?? defaultSleep;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        const lastError = ErrorHandler.toError(error);

        if (attempt >= this.options.maxAttempts || !isRetryable(lastError)) {
          throw lastError;
        }

        const delay = this.delayFor(attempt);
        this.options.onRetry?.(lastError, attempt, delay);
        await sleep(delay);
      }
    }
  }

  /**
   * Copy of this policy with some options replaced
   */
  with(overrides: Partial<RetryPolicyOptions>): RetryPolicy {
    return new RetryPolicy({ ...this.options, ...overrides });
  }
}
