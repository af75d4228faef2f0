/**
 * Bounded fixed-delay retry
 *
 * Used by the price-source client. The chain-state path does not retry.
 */

import type { ServiceLogger } from '../../logging/index.js';

export interface RetryPolicy {
  /** Total attempts, including the first */
  maxAttempts: number;
  /** Delay between attempts */
  delayMs: number;
}

export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run `operation` until it resolves or `maxAttempts` attempts have failed.
 * The last error is rethrown.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  logger: ServiceLogger,
  sleepFn: SleepFn = sleep
): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;

      if (attempt >= maxAttempts) {
        break;
      }

      logger.warn(
        {
          attempt,
          maxAttempts,
          delayMs: policy.delayMs,
          error: error instanceof Error ? error.message : String(error),
        },
        'Attempt failed, retrying'
      );
      await sleepFn(policy.delayMs);
    }
  }

  throw lastError;
}
