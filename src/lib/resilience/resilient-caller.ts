/**
 * Resilient caller combining rate limiting, circuit breaking and retries.
 *
 * Order of operations per call:
 * 1. Acquire admission from the shared rate limiter (wait or reject per policy)
 * 2. Ask the shared circuit breaker for admission; refuse fast when open
 * 3. Run the operation inside the retry executor, optionally under a
 *    per-attempt timeout
 * 4. Report every attempt's outcome to the breaker and the metrics sink
 *
 * Later attempts of the same call go through the breaker's admission check
 * again, so a circuit that opens mid-call stops the retries.
 */

import { TaskCancelledError, TimeoutStrategy, timeout } from "cockatiel";

import type { Logger } from "@/lib/logger";

import {
  type CircuitBreaker,
  type CircuitBreakerMetrics,
  type CircuitState,
  createCircuitBreaker,
} from "./circuit-breaker";
import type { ErrorClassifier } from "./classifier";
import { type ResilienceConfig, parseResilienceConfig } from "./config";
import {
  AttemptTimeoutError,
  CallCancelledError,
  CircuitOpenError,
  type FailureKind,
  RateLimitExceededError,
  errorMessage,
  getErrorKind,
} from "./errors";
import type { ResilienceMetricsSink } from "./metrics";
import {
  type RateLimiter,
  type RateLimiterMetrics,
  type RateLimiterSnapshot,
  createRateLimiter,
} from "./rate-limiter";
import {
  type AttemptContext,
  type Operation,
  type RetryExecutor,
  createRetryExecutor,
} from "./retry";
import { cancellationError } from "./sleep";

export interface CallOptions {
  signal?: AbortSignal;
  /** Per-attempt timeout override (ms) */
  attemptTimeoutMs?: number;
  /** Name of the call in log entries */
  label?: string;
}

export interface CallMetrics {
  started: number;
  succeeded: number;
  failed: number;
  circuitRejected: number;
  rateLimited: number;
  cancelled: number;
  exhausted: number;
  attempts: number;
  retries: number;
  /** Total backoff delay scheduled between attempts (ms) */
  totalBackoffMs: number;
}

export interface ResilienceMetrics {
  state: CircuitState;
  totalRequests: number;
  totalFailures: number;
  tripCount: number;
  successRate: number;
  breaker: CircuitBreakerMetrics;
  limiter: RateLimiterSnapshot & RateLimiterMetrics;
  calls: CallMetrics;
}

export interface ResilientCaller {
  /** Runs `operation` behind the rate limiter, the circuit breaker and retries */
  execute: <T>(operation: Operation<T>, options?: CallOptions) => Promise<T>;
  getMetrics: () => ResilienceMetrics;
  resetMetrics: () => void;
  /** Stops forwarding breaker transitions to the metrics sink */
  dispose: () => void;
}

export interface ResilientCallerDeps {
  rateLimiter: RateLimiter;
  circuitBreaker: CircuitBreaker;
  retryExecutor: RetryExecutor;
  /** Default per-attempt timeout (absent: attempts are not timed out) */
  attemptTimeoutMs?: number;
  metricsSink?: ResilienceMetricsSink;
  logger?: Logger;
  now?: () => number;
}

const emptyCallMetrics = (): CallMetrics => ({
  started: 0,
  succeeded: 0,
  failed: 0,
  circuitRejected: 0,
  rateLimited: 0,
  cancelled: 0,
  exhausted: 0,
  attempts: 0,
  retries: 0,
  totalBackoffMs: 0,
});

/**
 * Settles with `promise`, or rejects with `CallCancelledError` once `signal`
 * aborts. A late settlement of `promise` is ignored.
 */
const raceAbort = <T>(promise: Promise<T>, signal: AbortSignal): Promise<T> => {
  let onAbort: (() => void) | undefined;

  const aborted = new Promise<never>((_, reject) => {
    const handler = (): void => reject(cancellationError(signal));
    onAbort = handler;
    if (signal.aborted) {
      handler();
    } else {
      signal.addEventListener("abort", handler, { once: true });
    }
  });

  return Promise.race([promise, aborted]).finally(() => {
    if (onAbort) {
      signal.removeEventListener("abort", onAbort);
    }
  });
};

/**
 * Creates a resilient caller around shared limiter and breaker instances.
 *
 * @example
 * ```typescript
 * const classifier = createHttpErrorClassifier();
 * const caller = createResilientCaller({
 *   rateLimiter: createRateLimiter(limiterConfig),
 *   circuitBreaker: createCircuitBreaker(breakerConfig, { classifier }),
 *   retryExecutor: createRetryExecutor(retryConfig, { classifier }),
 * });
 *
 * const reply = await caller.execute(({ signal }) => provider.chat(request, { signal }));
 * ```
 */
export const createResilientCaller = (deps: ResilientCallerDeps): ResilientCaller => {
  const {
    rateLimiter,
    circuitBreaker,
    retryExecutor,
    attemptTimeoutMs: defaultAttemptTimeoutMs,
    metricsSink,
    logger,
    now = () => Date.now(),
  } = deps;

  let calls = emptyCallMetrics();

  const unsubscribe = metricsSink?.recordStateChange
    ? circuitBreaker.onStateChange(metricsSink.recordStateChange)
    : undefined;

  const circuitOpenError = (label: string, cause?: unknown): CircuitOpenError =>
    new CircuitOpenError(
      `Circuit breaker is open, call "${label}" refused`,
      circuitBreaker.getState(),
      circuitBreaker.getRemainingOpenMs(),
      cause === undefined ? undefined : { cause },
    );

  /**
   * Runs one attempt, under a timeout when one is configured.
   */
  const invokeAttempt = <T>(
    operation: Operation<T>,
    context: AttemptContext,
    attemptTimeoutMs: number | undefined,
  ): Promise<T> => {
    const { signal } = context;

    if (attemptTimeoutMs === undefined) {
      return signal ? raceAbort(operation(context), signal) : operation(context);
    }

    const policy = timeout(attemptTimeoutMs, TimeoutStrategy.Aggressive);
    return policy
      .execute(
        ({ signal: attemptSignal }) => operation({ attempt: context.attempt, signal: attemptSignal }),
        signal,
      )
      .catch((error: unknown) => {
        if (signal?.aborted) {
          throw cancellationError(signal);
        }
        if (error instanceof TaskCancelledError) {
          throw new AttemptTimeoutError(
            `Attempt ${context.attempt} timed out after ${attemptTimeoutMs}ms`,
            attemptTimeoutMs,
          );
        }
        throw error;
      });
  };

  const execute = async <T>(operation: Operation<T>, options: CallOptions = {}): Promise<T> => {
    const { signal, attemptTimeoutMs = defaultAttemptTimeoutMs, label = "call" } = options;
    const startedAt = now();
    let attempts = 0;
    let lastAttemptError: unknown;

    calls.started++;

    const fail = (error: unknown): unknown => {
      const failureKind: FailureKind = getErrorKind(error) ?? "terminal";
      calls.failed++;
      if (failureKind === "cancelled") {
        calls.cancelled++;
      } else if (failureKind === "retry_exhausted") {
        calls.exhausted++;
      }
      metricsSink?.recordCall?.({
        outcome: "failure",
        attempts,
        durationMs: now() - startedAt,
        failureKind,
      });
      return error;
    };

    // Step 1: rate limiter admission
    try {
      await rateLimiter.acquire(signal);
    } catch (error) {
      if (error instanceof RateLimitExceededError) {
        calls.rateLimited++;
        metricsSink?.recordRejection?.({ reason: "rate_limited" });
      }
      throw fail(error);
    }

    // Step 2: circuit breaker admission, held until the first attempt starts
    let admission = circuitBreaker.acquirePermit();
    if (admission === null) {
      calls.circuitRejected++;
      metricsSink?.recordRejection?.({ reason: "circuit_open" });
      logger?.warn("Call refused: circuit open", { label });
      throw fail(circuitOpenError(label));
    }

    // Steps 3-4: retried attempts, each reported to the breaker exactly once
    const runAttempt = async (context: AttemptContext): Promise<T> => {
      const permit = admission ?? circuitBreaker.acquirePermit();
      admission = null;
      if (permit === null) {
        calls.circuitRejected++;
        metricsSink?.recordRejection?.({ reason: "circuit_open" });
        logger?.warn("Retry refused: circuit open", { label, attempt: context.attempt });
        throw circuitOpenError(label, lastAttemptError);
      }

      attempts++;
      calls.attempts++;
      const attemptStartedAt = now();

      try {
        const result = await invokeAttempt(operation, context, attemptTimeoutMs);
        circuitBreaker.recordSuccess(permit);
        metricsSink?.recordAttempt?.({
          attempt: context.attempt,
          outcome: "success",
          durationMs: now() - attemptStartedAt,
        });
        return result;
      } catch (error) {
        lastAttemptError = error;
        circuitBreaker.recordFailure(error, permit);
        metricsSink?.recordAttempt?.({
          attempt: context.attempt,
          outcome: "failure",
          durationMs: now() - attemptStartedAt,
          error,
        });
        throw error;
      }
    };

    try {
      const result = await retryExecutor.execute(runAttempt, {
        signal,
        onRetry: (event) => {
          calls.retries++;
          calls.totalBackoffMs += event.delayMs;
        },
      });
      calls.succeeded++;
      metricsSink?.recordCall?.({
        outcome: "success",
        attempts,
        durationMs: now() - startedAt,
      });
      return result;
    } catch (error) {
      // Cancelled before the first attempt ran
      if (admission !== null) {
        circuitBreaker.releasePermit(admission);
        admission = null;
      }
      if (error instanceof CallCancelledError) {
        logger?.info("Call cancelled", { label, attempts });
      } else {
        logger?.warn("Call failed", { label, attempts, error: errorMessage(error) });
      }
      throw fail(error);
    }
  };

  const getMetrics = (): ResilienceMetrics => {
    const breaker = circuitBreaker.getMetrics();
    return {
      state: breaker.state,
      totalRequests: breaker.totalRequests,
      totalFailures: breaker.totalFailures,
      tripCount: breaker.tripCount,
      successRate: breaker.successRate,
      breaker,
      limiter: { ...rateLimiter.getSnapshot(), ...rateLimiter.getMetrics() },
      calls: { ...calls },
    };
  };

  return {
    execute,
    getMetrics,
    resetMetrics: () => {
      calls = emptyCallMetrics();
    },
    dispose: () => {
      unsubscribe?.();
    },
  };
};

export interface ResilientCallerFromConfigDeps {
  classifier: ErrorClassifier;
  metricsSink?: ResilienceMetricsSink;
  logger?: Logger;
  /** Name used in breaker log entries */
  name?: string;
  now?: () => number;
  random?: () => number;
}

/**
 * Builds a breaker, a retry executor, a rate limiter and the caller over them
 * from one validated configuration.
 */
export const createResilientCallerFromConfig = (
  config: ResilienceConfig,
  deps: ResilientCallerFromConfigDeps,
): ResilientCaller => {
  const validated = parseResilienceConfig(config);
  const { classifier, metricsSink, logger, name, now, random } = deps;

  return createResilientCaller({
    rateLimiter: createRateLimiter(validated.rateLimiter, { logger, now }),
    circuitBreaker: createCircuitBreaker(validated.circuitBreaker, {
      classifier,
      logger,
      name,
      now,
    }),
    retryExecutor: createRetryExecutor(validated.retry, { classifier, logger, now, random }),
    attemptTimeoutMs: validated.attemptTimeoutMs,
    metricsSink,
    logger,
    now,
  });
};
