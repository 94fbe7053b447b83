/**
 * Retry helpers
 * Fixed-delay retry loop used by every external call site
 */

import { isRetryableError } from "./errors.js";
import { logger, type LogContext } from "./logger.js";

export interface RetryOptions {
  /** Total attempts including the first; Infinity retries until success */
  maxAttempts: number;

  /** Fixed wait between attempts */
  delayMs: number;

  /** Label used in log lines */
  label: string;

  /** Extra context attached to every retry log line */
  context?: LogContext;

  /** Decide whether an error is worth another attempt */
  shouldRetry?: (error: unknown) => boolean;
}

/**
 * Sleep for a given duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn` until it succeeds, the error is not retryable, or attempts run out.
 * The last error is rethrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryableError;

  if (!(options.maxAttempts >= 1)) {
    throw new RangeError(`maxAttempts must be at least 1, got ${options.maxAttempts}`);
  }

  let attempt = 0;
  for (;;) {
    attempt++;
    try {
      return await fn(attempt);
    } catch (error) {
      if (!shouldRetry(error) || attempt >= options.maxAttempts) {
        throw error;
      }

      logger.warn(`${options.label} failed, retrying in ${options.delayMs}ms`, {
        ...options.context,
        attempt,
        error: error instanceof Error ? error.message : String(error),
      });
      await sleep(options.delayMs);
    }
  }
}
