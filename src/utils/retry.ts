/**
 * Exponential backoff retry utility
 *
 * The wait before retry n (0-indexed) is initialDelayMs * factor^n, capped at maxDelayMs.
 * With the defaults that is 1s, 2s, 4s... and no jitter.
 */

import type { RetryConfig } from '../types/index.js';
import { logger } from './logger.js';

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  factor: 2,
};

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: Partial<RetryConfig> = {},
  label = 'operation'
): Promise<T> {
  const { maxAttempts, initialDelayMs, maxDelayMs, factor } = {
    ...DEFAULT_RETRY_CONFIG,
    ...config,
  };

  let lastError: Error | undefined;
  let delay = initialDelayMs;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === maxAttempts - 1) {
        logger.error({ err: lastError, label, attempts: maxAttempts }, 'All retry attempts exhausted');
        throw lastError;
      }

      logger.warn(
        { error: lastError.message, label, attempt: attempt + 1, maxAttempts, nextDelayMs: delay },
        'Retry attempt failed, waiting before next attempt'
      );

      await sleep(delay);
      delay = Math.min(delay * factor, maxDelayMs);
    }
  }

  throw lastError ?? new Error(`${label}: no attempts made (maxAttempts=${maxAttempts})`);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export { sleep };
