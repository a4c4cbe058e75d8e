/**
 * Generic retry policy with exponential backoff for blocking external calls
 */

import { errorMessage } from './errors.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  backoffMultiplier: number;
  isRetryable: (error: unknown) => boolean;
}

export type Sleep = (ms: number) => Promise<void>;

/**
 * Helper function to introduce a delay.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class RetryExhaustedError extends Error {
  constructor(readonly attempts: number, readonly lastError: unknown) {
    super(`Failed after ${attempts} attempts: ${errorMessage(lastError)}`, { cause: lastError });
    this.name = 'RetryExhaustedError';
  }
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.baseDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1);
}

/**
 * Run `operation` until it succeeds, a non-retryable error is thrown (rethrown
 * as-is), or `maxAttempts` is reached (RetryExhaustedError).
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  wait: Sleep = sleep
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!policy.isRetryable(error)) {
        throw error;
      }
      lastError = error;

      if (attempt < policy.maxAttempts) {
        const delay = backoffDelay(policy, attempt);
        console.warn(
          `  ⏸️ Attempt ${attempt}/${policy.maxAttempts} failed (${errorMessage(error)}). Retrying in ${delay}ms...`
        );
        await wait(delay);
      }
    }
  }

  throw new RetryExhaustedError(policy.maxAttempts, lastError);
}
