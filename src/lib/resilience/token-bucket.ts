/**
 * Token bucket rate limiter implementation.
 */

export interface TokenBucketConfig {
  /** Maximum bucket capacity (tokens) */
  maxTokens: number;
  /** Tokens added per second */
  refillRatePerSecond: number;
  /** Starting tokens (default: maxTokens) */
  initialTokens?: number;
}

export type AcquireResult = { admitted: true } | { admitted: false; waitTimeMs: number };

export interface TokenBucket {
  /** Refills, then consumes one token if available; otherwise reports the wait */
  tryAcquire: () => AcquireResult;
  /** Returns the number of available tokens without consuming any */
  getAvailableTokens: () => number;
  /** Resets the bucket to full capacity */
  reset: () => void;
}

interface TokenBucketState {
  tokens: number;
  lastRefillTimestamp: number;
}

/**
 * Creates a token bucket.
 *
 * Token bucket algorithm:
 * - Bucket holds up to `maxTokens` tokens
 * - One token is consumed per admitted call
 * - Tokens refill at `refillRatePerSecond` rate
 * - If less than one token is available, the call must wait or be rejected
 *
 * @example
 * ```typescript
 * const bucket = createTokenBucket({ maxTokens: 10, refillRatePerSecond: 10 });
 *
 * const result = bucket.tryAcquire();
 * if (!result.admitted) {
 *   await sleep(result.waitTimeMs);
 * }
 * ```
 */
export const createTokenBucket = (
  config: TokenBucketConfig,
  now: () => number = () => Date.now(),
): TokenBucket => {
  const { maxTokens, refillRatePerSecond, initialTokens = maxTokens } = config;

  let state: TokenBucketState = {
    tokens: Math.min(initialTokens, maxTokens),
    lastRefillTimestamp: now(),
  };

  const projectTokens = (at: number): number => {
    const elapsedSeconds = Math.max(0, at - state.lastRefillTimestamp) / 1000;
    return Math.min(maxTokens, state.tokens + elapsedSeconds * refillRatePerSecond);
  };

  const refill = (): void => {
    const at = now();
    state = { tokens: projectTokens(at), lastRefillTimestamp: at };
  };

  const waitFor = (tokens: number): number => {
    if (tokens >= 1) {
      return 0;
    }
    return Math.ceil(((1 - tokens) / refillRatePerSecond) * 1000);
  };

  const tryAcquire = (): AcquireResult => {
    refill();

    if (state.tokens >= 1) {
      state = { ...state, tokens: state.tokens - 1 };
      return { admitted: true };
    }

    return { admitted: false, waitTimeMs: waitFor(state.tokens) };
  };

  const reset = (): void => {
    state = {
      tokens: maxTokens,
      lastRefillTimestamp: now(),
    };
  };

  return {
    tryAcquire,
    getAvailableTokens: () => projectTokens(now()),
    reset,
  };
};
