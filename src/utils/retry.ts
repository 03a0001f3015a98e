/**
 * Exponential backoff with jitter for calls to external services
 */

import { logger } from './logger';
import { errorMessage } from './validation';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitterMs: number;
  retryableErrors: string[];
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitterMs: 500,
  retryableErrors: [
    'fetch failed',
    'timeout',
    'rate limit',
    'too many requests',
    'resource exhausted',
    '429',
    '500',
    '502',
    '503',
    '504',
    'ECONNRESET',
    'ETIMEDOUT',
  ],
};

function isRetryableError(error: unknown, retryableErrors: string[]): boolean {
  const message = errorMessage(error).toLowerCase();
  return retryableErrors.some(retryable => message.includes(retryable.toLowerCase()));
}

export function calculateDelay(attempt: number, options: RetryOptions): number {
  const exponentialDelay = options.baseDelayMs * Math.pow(options.backoffMultiplier, attempt - 1);
  const jitter = Math.random() * options.jitterMs;
  return Math.min(exponentialDelay + jitter, options.maxDelayMs);
}

/**
 * Retry an async operation with exponential backoff. Errors whose message
 * matches none of `retryableErrors` are rethrown at once.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  operationName: string,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await operation();
      if (attempt > 1) {
        logger.info({ operationName, attempt }, 'Operation succeeded after retry');
      }
      return result;
    } catch (error) {
      if (!isRetryableError(error, opts.retryableErrors)) {
        logger.error({ operationName, attempt, error: errorMessage(error) }, 'Operation failed with non-retryable error');
        throw error;
      }

      if (attempt >= opts.maxAttempts) {
        logger.error({ operationName, attempts: attempt, error: errorMessage(error) }, 'Operation failed after all attempts');
        throw error;
      }

      const delayMs = calculateDelay(attempt, opts);
      logger.warn({
        operationName,
        attempt,
        maxAttempts: opts.maxAttempts,
        error: errorMessage(error),
        delayMs,
      }, 'Operation failed, retrying');

      await new Promise(resolve => setTimeout(resolve, delayMs));
    }
  }
}
