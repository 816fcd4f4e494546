/**
 * @fileoverview Retry policy for Gmail API calls.
 *
 * Pure decision function, independent of the HTTP transport: given the
 * status of a failed attempt and how many attempts have been made, decide
 * whether to try again and how long to wait first.
 */

export interface RetryPolicy {
  /** Total attempts including the first one. */
  maxAttempts: number;
  /** Delay before the second attempt; doubles for each attempt after. */
  baseDelayMs: number;
}

export interface RetryDecision {
  retry: boolean;
  delayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
};

/**
 * Check if a status is transient (429 or 5xx).
 */
export function isRetryableStatus(status: number | undefined): boolean {
  if (status === undefined) return false;
  return status === 429 || (status >= 500 && status < 600);
}

/**
 * Decide whether a failed attempt should be retried.
 *
 * @param status HTTP status of the failed attempt (undefined for transport errors)
 * @param attempt 1-based number of the attempt that just failed
 */
export function decideRetry(
  status: number | undefined,
  attempt: number,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): RetryDecision {
  if (!isRetryableStatus(status) || attempt >= policy.maxAttempts) {
    return { retry: false, delayMs: 0 };
  }
  return {
    retry: true,
    delayMs: policy.baseDelayMs * 2 ** (attempt - 1),
  };
}
