/**
 * Retry utility with exponential backoff for whole authentication attempts.
 *
 * The OAuth2 core never retries by itself; callers at the edge (the mail
 * authenticator) wrap `authenticate()` with this.
 */

import { isRetryable } from './errors.js';
import { sleep } from './time.js';

export interface RetryOptions {
  retries?: number;
  baseDelay?: number;
  onRetry?: (error: unknown, attempt: number) => void;
  /** Override the retry classification */
  shouldRetry?: (error: unknown) => boolean;
  /** Injected for tests */
  delay?: (ms: number) => Promise<void>;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const {
    retries = 3,
    baseDelay = 1000,
    onRetry,
    shouldRetry = isRetryable,
    delay = sleep,
  } = opts;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (attempt >= retries || !shouldRetry(error)) {
        throw error;
      }
      onRetry?.(error, attempt + 1);
      await delay(baseDelay * Math.pow(2, attempt));
    }
  }
}
