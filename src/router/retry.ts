import { toAgentError } from "../protocol/errors";
import { sleep } from "../utils/abort";

export interface RetryPolicy {
  /** Total attempts, the first one included. */
  attempts: number;
  baseDelayMs: number;
}

export const DEFAULT_RETRY: RetryPolicy = { attempts: 3, baseDelayMs: 250 };

const BACKOFF_FACTOR = 2;

/**
 * Run `operation` until it succeeds or fails with a non-retryable error.
 * Delays grow by a factor of two from `baseDelayMs`; an abort during the
 * delay ends the loop with the abort reason.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  signal: AbortSignal,
  label: string
): Promise<T> {
  const attempts = Math.max(1, policy.attempts);
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const failure = toAgentError(error);
      if (!failure.retryable || attempt >= attempts || signal.aborted) {
        throw failure;
      }
      const delayMs = policy.baseDelayMs * BACKOFF_FACTOR ** (attempt - 1);
      console.warn(`[Router] ${label} failed (${failure.message}), retrying in ${delayMs}ms (${attempt}/${attempts})`);
      await sleep(delayMs, signal);
    }
  }
}
