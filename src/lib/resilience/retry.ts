/**
 * Retry executor with exponential backoff and jitter.
 *
 * Each `execute` call owns a fresh `RetryState`; nothing is shared between
 * calls. Failures synthesized by the middleware (circuit refusals,
 * cancellation) pass through untouched; every other failure is classified
 * once per attempt.
 */

import type { Logger } from "@/lib/logger";

import { calculateBackoffMs } from "./backoff";
import { type ErrorClassifier, classifyError, getRetryAfterMs } from "./classifier";
import { type RetryConfig, parseRetryConfig } from "./config";
import {
  type AttemptErrorKind,
  AttemptTimeoutError,
  NonRetryableError,
  RetryBudgetExhaustedError,
  type RetryExhaustionReason,
  errorMessage,
  isResilienceError,
} from "./errors";
import { cancellationError, sleep } from "./sleep";

export interface RetryState {
  /** 1-based index of the current attempt */
  attempt: number;
  /** Invocations made so far */
  totalAttempts: number;
  lastError: unknown;
  lastErrorKind: AttemptErrorKind | null;
  startedAt: number;
  elapsedMs: number;
}

export interface AttemptContext {
  /** 1-based attempt number */
  attempt: number;
  /** Aborted when the call is cancelled or the attempt times out */
  signal?: AbortSignal;
}

export type Operation<T> = (context: AttemptContext) => Promise<T>;

export interface RetryEvent {
  /** The attempt that just failed */
  attempt: number;
  error: unknown;
  errorKind: AttemptErrorKind;
  /** Delay before the next attempt (ms) */
  delayMs: number;
  elapsedMs: number;
}

export interface RetryExecuteOptions {
  signal?: AbortSignal;
  /** Called before each backoff delay */
  onRetry?: (event: RetryEvent) => void;
}

export interface RetryExecutor {
  execute: <T>(operation: Operation<T>, options?: RetryExecuteOptions) => Promise<T>;
  readonly config: RetryConfig;
}

export interface RetryExecutorDeps {
  classifier: ErrorClassifier;
  logger?: Logger;
  now?: () => number;
  /** Source of jitter, uniform in [0, 1) */
  random?: () => number;
}

/**
 * Creates a retry executor.
 *
 * The operation may run up to `maxAttempts` times; callers must only pass
 * operations that are safe to repeat.
 *
 * @example
 * ```typescript
 * const retry = createRetryExecutor(
 *   {
 *     maxAttempts: 3,
 *     baseDelayMs: 100,
 *     maxDelayMs: 2000,
 *     backoffMultiplier: 2,
 *     jitterFraction: 0.1,
 *     maxElapsedMs: 10_000,
 *     respectRetryAfter: true,
 *   },
 *   { classifier: createHttpErrorClassifier() },
 * );
 *
 * const completion = await retry.execute(({ signal }) => client.complete(request, { signal }));
 * ```
 */
export const createRetryExecutor = (
  config: RetryConfig,
  deps: RetryExecutorDeps,
): RetryExecutor => {
  const validated = parseRetryConfig(config);
  const { maxAttempts, maxElapsedMs, respectRetryAfter } = validated;
  const { classifier, logger, now = () => Date.now(), random = () => Math.random() } = deps;

  const exhausted = (
    state: RetryState,
    reason: RetryExhaustionReason,
    lastErrorKind: AttemptErrorKind,
  ): RetryBudgetExhaustedError => {
    const limit =
      reason === "max_attempts" ? `${maxAttempts} attempts` : `${maxElapsedMs}ms elapsed`;
    logger?.warn("Retry budget exhausted", {
      reason,
      attempts: state.totalAttempts,
      elapsedMs: state.elapsedMs,
      error: errorMessage(state.lastError),
    });
    return new RetryBudgetExhaustedError(
      `Retry budget exhausted (${limit}) after ${state.totalAttempts} attempts in ${state.elapsedMs}ms: ${errorMessage(state.lastError)}`,
      state.totalAttempts,
      state.elapsedMs,
      reason,
      state.lastError,
      lastErrorKind,
    );
  };

  const nextDelayMs = (state: RetryState, error: unknown): number => {
    const delayMs = calculateBackoffMs(state.attempt - 1, validated, random);
    if (!respectRetryAfter) {
      return delayMs;
    }
    const hintMs = getRetryAfterMs(error);
    return hintMs === null ? delayMs : Math.max(delayMs, hintMs);
  };

  const execute = async <T>(
    operation: Operation<T>,
    options: RetryExecuteOptions = {},
  ): Promise<T> => {
    const { signal, onRetry } = options;
    const startedAt = now();
    const state: RetryState = {
      attempt: 0,
      totalAttempts: 0,
      lastError: undefined,
      lastErrorKind: null,
      startedAt,
      elapsedMs: 0,
    };

    for (;;) {
      if (signal?.aborted) {
        throw cancellationError(signal);
      }

      state.attempt++;
      state.totalAttempts++;

      try {
        const result = await operation({ attempt: state.attempt, signal });
        if (state.attempt > 1) {
          logger?.info("Call succeeded after retry", { attempt: state.attempt });
        }
        return result;
      } catch (error) {
        if (isResilienceError(error) && !(error instanceof AttemptTimeoutError)) {
          throw error;
        }
        if (signal?.aborted) {
          throw cancellationError(signal);
        }

        const errorKind = classifyError(classifier, error);
        state.lastError = error;
        state.lastErrorKind = errorKind;
        state.elapsedMs = now() - startedAt;

        if (errorKind === "terminal") {
          logger?.warn("Call failed: non-retryable error", {
            attempt: state.attempt,
            error: errorMessage(error),
          });
          throw new NonRetryableError(
            `Non-retryable failure on attempt ${state.attempt}: ${errorMessage(error)}`,
            state.totalAttempts,
            error,
          );
        }

        if (state.attempt >= maxAttempts) {
          throw exhausted(state, "max_attempts", errorKind);
        }
        if (state.elapsedMs >= maxElapsedMs) {
          throw exhausted(state, "max_elapsed_time", errorKind);
        }

        const delayMs = nextDelayMs(state, error);
        logger?.debug("Retrying call", {
          attempt: state.attempt,
          errorKind,
          delayMs,
          error: errorMessage(error),
        });
        onRetry?.({
          attempt: state.attempt,
          error,
          errorKind,
          delayMs,
          elapsedMs: state.elapsedMs,
        });

        await sleep(delayMs, signal);
      }
    }
  };

  return {
    execute,
    config: validated,
  };
};
