/**
 * Error taxonomy for the resilience layer.
 *
 * Failures synthesized by the middleware extend `ResilienceError` and carry a
 * `kind` so callers can tell a refused call from a failed remote operation.
 * `ProviderError` is the reference shape for failures thrown by operations.
 */

import type { CircuitState } from "./circuit-breaker";

export type ResilienceErrorKind =
  | "circuit_open"
  | "retry_exhausted"
  | "terminal"
  | "rate_limited"
  | "cancelled"
  | "attempt_timeout";

/**
 * Category assigned to a failed attempt by an error classifier.
 */
export type AttemptErrorKind = "transient" | "overload" | "terminal";

/**
 * Every kind an error surfaced by the resilient caller can belong to.
 */
export type FailureKind = AttemptErrorKind | ResilienceErrorKind;

export abstract class ResilienceError extends Error {
  public abstract readonly kind: ResilienceErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Thrown when the circuit breaker refuses admission. The operation never ran.
 */
export class CircuitOpenError extends ResilienceError {
  public override readonly name = "CircuitOpenError";
  public readonly kind = "circuit_open";

  constructor(
    message = "Circuit breaker is open",
    public readonly state: CircuitState = "OPEN",
    public readonly retryAfterMs: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type RetryExhaustionReason = "max_attempts" | "max_elapsed_time";

/**
 * Thrown when a retryable failure persists past `maxAttempts` or `maxElapsedMs`.
 */
export class RetryBudgetExhaustedError extends ResilienceError {
  public override readonly name = "RetryBudgetExhaustedError";
  public readonly kind = "retry_exhausted";

  constructor(
    message: string,
    public readonly attempts: number,
    public readonly elapsedMs: number,
    public readonly reason: RetryExhaustionReason,
    public readonly lastError: unknown,
    public readonly lastErrorKind: AttemptErrorKind,
  ) {
    super(message, { cause: lastError });
  }
}

/**
 * Wraps a failure the classifier marked as not retryable.
 */
export class NonRetryableError extends ResilienceError {
  public override readonly name = "NonRetryableError";
  public readonly kind = "terminal";

  constructor(
    message: string,
    public readonly attempts: number,
    public override readonly cause: unknown,
  ) {
    super(message, { cause });
  }
}

/**
 * Thrown when the rate limiter has no capacity and the policy (or `maxWaitMs`)
 * does not allow waiting for it.
 */
export class RateLimitExceededError extends ResilienceError {
  public override readonly name = "RateLimitExceededError";
  public readonly kind = "rate_limited";

  constructor(
    message: string,
    public readonly waitTimeMs: number,
  ) {
    super(message);
  }
}

/**
 * Thrown when the caller aborts a call, either while waiting or mid-attempt.
 */
export class CallCancelledError extends ResilienceError {
  public override readonly name = "CallCancelledError";
  public readonly kind = "cancelled";

  constructor(message = "Call was cancelled", options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Thrown when a single attempt runs longer than `attemptTimeoutMs`.
 */
export class AttemptTimeoutError extends ResilienceError {
  public override readonly name = "AttemptTimeoutError";
  public readonly kind = "attempt_timeout";

  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message);
  }
}

/**
 * Thrown by factories and config loaders when a configuration fails validation.
 */
export class ConfigValidationError extends Error {
  public override readonly name = "ConfigValidationError";

  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message);
  }
}

export type ProviderErrorCode =
  | "NETWORK_ERROR"
  | "TIMEOUT"
  | "SERVER_ERROR"
  | "OVERLOADED"
  | "RATE_LIMITED"
  | "INVALID_REQUEST"
  | "AUTHENTICATION_FAILED"
  | "NOT_FOUND"
  | "UNKNOWN";

export interface ProviderErrorOptions {
  status?: number;
  retryAfterMs?: number;
  cause?: unknown;
}

/**
 * Failure reported by a remote provider call.
 */
export class ProviderError extends Error {
  public override readonly name = "ProviderError";
  public readonly status: number | undefined;
  public readonly retryAfterMs: number | undefined;

  constructor(
    message: string,
    public readonly code: ProviderErrorCode,
    options: ProviderErrorOptions = {},
  ) {
    super(message, { cause: options.cause });
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
  }
}

export const isResilienceError = (error: unknown): error is ResilienceError =>
  error instanceof ResilienceError;

/**
 * Returns the kind of a synthesized failure, or null for anything else.
 */
export const getErrorKind = (error: unknown): ResilienceErrorKind | null =>
  isResilienceError(error) ? error.kind : null;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
