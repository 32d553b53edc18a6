import { setTimeout as sleep } from 'timers/promises';
import { logger as getLogger } from '../../shared/logger.js';
import { ProvisionerTransientError } from './errors.js';
import type { RetryConfig } from '../../shared/interfaces.js';

const logger = getLogger();

export type RetryPolicy = RetryConfig;

/**
 * Delay before the given retry (1-based), doubling from the base delay
 */
export function backoffDelay(policy: RetryPolicy, retry: number): number {
  return Math.min(policy.baseDelayMs * 2 ** (retry - 1), policy.maxDelayMs);
}

export function isTransient(err: unknown): boolean {
  return err instanceof ProvisionerTransientError;
}

/**
 * Run an operation, retrying transient provisioner failures with exponential
 * backoff. Anything else is rethrown on the first occurrence.
 */
export async function withRetry<T>(
  label: string,
  policy: RetryPolicy,
  operation: () => Promise<T>,
  shouldRetry: (err: unknown) => boolean = isTransient,
): Promise<T> {
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation();
    } catch (err) {
      if (attempt >= policy.attempts || !shouldRetry(err)) {
        throw err;
      }
      const delay = backoffDelay(policy, attempt);
      logger.warn(`${label} failed, retrying`, {
        attempt,
        maxAttempts: policy.attempts,
        delayMs: delay,
        err: err instanceof Error ? err.message : String(err),
      });
      // eslint-disable-next-line no-await-in-loop
      await sleep(delay);
    }
  }
}
