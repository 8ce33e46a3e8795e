/**
 * Exponential backoff utilities for retry logic.
 */

export interface BackoffConfig {
  /** Delay before the first retry (ms) */
  baseDelayMs: number;
  /** Maximum delay between retries before jitter (ms) */
  maxDelayMs: number;
  /** Multiplier for exponential growth, must be > 1 */
  backoffMultiplier: number;
  /** Jitter fraction (0-1): up to this share of the delay is added at random */
  jitterFraction: number;
}

/**
 * Delay before jitter for a given retry.
 *
 * @param retryIndex - 0 for the delay after the first failed attempt
 */
export const calculateBaseDelayMs = (retryIndex: number, config: BackoffConfig): number => {
  const { baseDelayMs, maxDelayMs, backoffMultiplier } = config;
  return Math.min(baseDelayMs * backoffMultiplier ** retryIndex, maxDelayMs);
};

/**
 * Calculates backoff delay for a given retry.
 *
 * @param retryIndex - The retry number (0-indexed, so the first retry is 0)
 * @param random - Source of uniform values in [0, 1)
 * @returns Delay in milliseconds (with jitter applied)
 *
 * @example
 * ```typescript
 * const config = { baseDelayMs: 100, maxDelayMs: 1000, backoffMultiplier: 2, jitterFraction: 0 };
 * calculateBackoffMs(0, config); // 100
 * calculateBackoffMs(1, config); // 200
 * calculateBackoffMs(4, config); // 1000 (capped)
 * ```
 */
export const calculateBackoffMs = (
  retryIndex: number,
  config: BackoffConfig,
  random: () => number = Math.random,
): number => {
  const cappedDelayMs = calculateBaseDelayMs(retryIndex, config);

  // Jitter is uniform in [0, jitterFraction * delay]
  const jitter = cappedDelayMs * config.jitterFraction * random();

  return Math.floor(cappedDelayMs + jitter);
};

/**
 * Parses Retry-After header value.
 *
 * @param value - Header value (seconds as string, or HTTP date)
 * @returns Delay in milliseconds, or null if parsing fails
 *
 * @example
 * ```typescript
 * parseRetryAfterMs("30"); // 30000
 * parseRetryAfterMs("Wed, 21 Oct 2025 07:28:00 GMT"); // time until that date
 * ```
 */
export const parseRetryAfterMs = (value: string | null | undefined): number | null => {
  if (!value) {
    return null;
  }

  // Only accept if the entire string is a valid non-negative integer
  if (/^\d+$/.test(value)) {
    const seconds = Number.parseInt(value, 10);
    return seconds * 1000;
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    const delayMs = date - Date.now();
    return delayMs > 0 ? delayMs : 0;
  }

  return null;
};
