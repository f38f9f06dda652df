/**
 * Retry Backoff Policy
 *
 * Exponential backoff used by the download dispatcher between attempts of
 * a job that failed with a transient error.
 */

/**
 * Options for retry behavior
 */
export interface RetryPolicy {
  /**
   * Maximum number of total attempts (not retries).
   *
   * - maxAttempts: 1 = no retries (just the initial attempt)
   * - maxAttempts: 3 = 1 initial attempt + up to 2 retries
   */
  maxAttempts: number;

  /**
   * Delay before the first retry in milliseconds.
   */
  initialDelayMs: number;

  /**
   * Caps the exponential backoff.
   */
  maxDelayMs: number;

  /**
   * delay = min(initialDelayMs * backoffMultiplier^(retry - 1), maxDelayMs)
   * Must be greater than 1 so consecutive delays strictly increase.
   */
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

/**
 * Delay before retry number `retry` (1 for the first retry).
 *
 * @example
 * ```typescript
 * backoffDelay(1, DEFAULT_RETRY_POLICY); // 1000
 * backoffDelay(2, DEFAULT_RETRY_POLICY); // 2000
 * backoffDelay(3, DEFAULT_RETRY_POLICY); // 4000
 * ```
 */
export function backoffDelay(retry: number, policy: RetryPolicy = DEFAULT_RETRY_POLICY): number {
  const exponent = Math.max(0, retry - 1);
  return Math.min(policy.initialDelayMs * Math.pow(policy.backoffMultiplier, exponent), policy.maxDelayMs);
}

/**
 * Whether another attempt is allowed after `attempts` have been made
 */
export function canRetry(attempts: number, policy: RetryPolicy = DEFAULT_RETRY_POLICY): boolean {
  return attempts < policy.maxAttempts;
}
