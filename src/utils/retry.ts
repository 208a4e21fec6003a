/**
 * Retry with exponential backoff for transient storage failures.
 * Only TransientStorageError is retried; everything else goes straight back to the caller.
 */

import type { RetryConfig } from "@/types";
import { isRetryable, toLedgerError } from "./errors";

export const DEFAULT_RETRY_OPTIONS: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 25,
  maxDelayMs: 1000,
  jitter: true,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function calculateDelay(attempt: number, options: RetryConfig): number {
  const exponential = options.baseDelayMs * 2 ** attempt;
  const clamped = Math.min(exponential, options.maxDelayMs);

  if (options.jitter) {
    // +/- 20%
    const spread = clamped * 0.2;
    return Math.max(0, clamped + (Math.random() - 0.5) * 2 * spread);
  }

  return clamped;
}

/**
 * Run `operation`, retrying transient failures.
 * The final error is normalised through toLedgerError so callers always see the ledger taxonomy.
 */
export async function withRetry<T>(
  operation: () => T | Promise<T>,
  label: string,
  options: RetryConfig = DEFAULT_RETRY_OPTIONS,
): Promise<T> {
  let attempt = 0;

  for (;;) {
    try {
      return await operation();
    } catch (error) {
      if (!isRetryable(error) || attempt >= options.maxRetries) {
        throw toLedgerError(error);
      }

      const delay = calculateDelay(attempt, options);
      console.warn(
        `[dupe-ledger] ${label} failed with a transient error, retrying in ${Math.round(delay)}ms (attempt ${attempt + 1}/${options.maxRetries})`,
      );
      attempt++;
      await sleep(delay);
    }
  }
}
