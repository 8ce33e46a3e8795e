/**
 * Rate limiter front end over the token bucket and sliding window strategies.
 *
 * The strategy's refill/prune, check and consume happen in one synchronous
 * `tryAcquire` call, so a burst of concurrent callers can never be admitted
 * beyond the configured rate. Waiting callers re-enter `tryAcquire` after
 * their wait and may lose the freed capacity to another caller; admission is
 * not FIFO.
 */

import type { Logger } from "@/lib/logger";

import { type AdmissionPolicy, type RateLimiterConfig, parseRateLimiterConfig } from "./config";
import { RateLimitExceededError } from "./errors";
import { createSlidingWindow } from "./sliding-window";
import { cancellationError, sleep } from "./sleep";
import { type AcquireResult, createTokenBucket } from "./token-bucket";

export type RateLimiterSnapshot =
  | { strategy: "token_bucket"; currentTokens: number; maxTokens: number }
  | { strategy: "sliding_window"; windowOccupancy: number; maxRequests: number };

export interface RateLimiterMetrics {
  /** Calls admitted */
  admitted: number;
  /** Calls refused by the reject policy or `maxWaitMs` */
  rejected: number;
  /** Admissions that had to wait at least once */
  waited: number;
  /** Total time spent waiting for capacity (ms) */
  totalWaitMs: number;
}

export interface RateLimiter {
  /** Admits the caller, waiting or throwing `RateLimitExceededError` per policy */
  acquire: (signal?: AbortSignal) => Promise<void>;
  /** Admits the caller only if capacity is available now */
  tryAcquire: () => boolean;
  getSnapshot: () => RateLimiterSnapshot;
  getMetrics: () => RateLimiterMetrics;
  /** Restores full capacity; metrics are kept */
  reset: () => void;
  readonly admissionPolicy: AdmissionPolicy;
}

export interface RateLimiterDeps {
  logger?: Logger;
  now?: () => number;
}

interface Strategy {
  tryAcquire: () => AcquireResult;
  snapshot: () => RateLimiterSnapshot;
  reset: () => void;
}

const createStrategy = (config: RateLimiterConfig, now: () => number): Strategy => {
  switch (config.strategy) {
    case "token_bucket": {
      const bucket = createTokenBucket(config, now);
      return {
        tryAcquire: bucket.tryAcquire,
        snapshot: () => ({
          strategy: "token_bucket",
          currentTokens: bucket.getAvailableTokens(),
          maxTokens: config.maxTokens,
        }),
        reset: bucket.reset,
      };
    }
    case "sliding_window": {
      const slidingWindow = createSlidingWindow(config, now);
      return {
        tryAcquire: slidingWindow.tryAcquire,
        snapshot: () => ({
          strategy: "sliding_window",
          windowOccupancy: slidingWindow.getOccupancy(),
          maxRequests: config.maxRequests,
        }),
        reset: slidingWindow.reset,
      };
    }
  }
};

/**
 * Creates a rate limiter shared by every caller admitted through it.
 *
 * @example
 * ```typescript
 * const limiter = createRateLimiter({
 *   strategy: "token_bucket",
 *   maxTokens: 10,
 *   refillRatePerSecond: 5,
 *   admissionPolicy: "wait",
 * });
 *
 * await limiter.acquire();
 * ```
 */
export const createRateLimiter = (
  config: RateLimiterConfig,
  deps: RateLimiterDeps = {},
): RateLimiter => {
  const validated = parseRateLimiterConfig(config);
  const { admissionPolicy, maxWaitMs } = validated;
  const { logger, now = () => Date.now() } = deps;
  const strategy = createStrategy(validated, now);

  const metrics: RateLimiterMetrics = {
    admitted: 0,
    rejected: 0,
    waited: 0,
    totalWaitMs: 0,
  };

  const rejection = (waitTimeMs: number): RateLimitExceededError => {
    metrics.rejected++;
    logger?.warn("Rate limit exceeded", {
      strategy: validated.strategy,
      admissionPolicy,
      waitTimeMs,
    });
    return new RateLimitExceededError(
      `Rate limit exceeded, capacity available in ${waitTimeMs}ms`,
      waitTimeMs,
    );
  };

  const acquire = async (signal?: AbortSignal): Promise<void> => {
    let waitedMs = 0;

    for (;;) {
      if (signal?.aborted) {
        throw cancellationError(signal);
      }

      const result = strategy.tryAcquire();
      if (result.admitted) {
        metrics.admitted++;
        if (waitedMs > 0) {
          metrics.waited++;
        }
        return;
      }

      const { waitTimeMs } = result;
      if (admissionPolicy === "reject") {
        throw rejection(waitTimeMs);
      }
      if (maxWaitMs !== undefined && waitedMs + waitTimeMs > maxWaitMs) {
        throw rejection(waitTimeMs);
      }

      logger?.debug("Rate limit wait", { strategy: validated.strategy, waitTimeMs });
      metrics.totalWaitMs += waitTimeMs;
      waitedMs += waitTimeMs;
      await sleep(waitTimeMs, signal);
    }
  };

  const tryAcquire = (): boolean => {
    const result = strategy.tryAcquire();
    if (result.admitted) {
      metrics.admitted++;
      return true;
    }
    metrics.rejected++;
    return false;
  };

  return {
    acquire,
    tryAcquire,
    getSnapshot: strategy.snapshot,
    getMetrics: () => ({ ...metrics }),
    reset: strategy.reset,
    admissionPolicy,
  };
};
