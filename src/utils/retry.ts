/**
 * Exponential backoff retry for page fetches
 */

import type { RetryConfig } from '../types/index.js';
import { logger } from './logger.js';

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  factor: 2,
};

export interface RetryOptions extends Partial<RetryConfig> {
  /** Return false to fail immediately instead of retrying */
  retryIf?: (error: Error) => boolean;
  /** Tag carried on every log line, e.g. the URL being fetched */
  label?: string;
}

/**
 * Wait before the attempt following `attempt` (1-based), capped at maxDelayMs
 */
export function backoffDelay(attempt: number, policy: RetryConfig = DEFAULT_RETRY_CONFIG): number {
  return Math.min(policy.initialDelayMs * policy.factor ** (attempt - 1), policy.maxDelayMs);
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retryIf, label, ...overrides } = options;
  const policy: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...overrides };

  if (policy.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be at least 1, got ${policy.maxAttempts}`);
  }

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (caught) {
      const error = toError(caught);

      if (retryIf && !retryIf(error)) {
        logger.debug({ label, error: error.message, attempt }, 'Error is not retryable');
        throw error;
      }
      if (attempt >= policy.maxAttempts) {
        logger.error({ label, error, attempt, maxAttempts: policy.maxAttempts }, 'All retry attempts exhausted');
        throw error;
      }

      const nextDelayMs = backoffDelay(attempt, policy);
      logger.warn(
        { label, error: error.message, attempt, maxAttempts: policy.maxAttempts, nextDelayMs },
        'Attempt failed, backing off'
      );
      await sleep(nextDelayMs);
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
