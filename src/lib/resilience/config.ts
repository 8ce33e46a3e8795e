/**
 * Configuration schemas for the resilience components.
 *
 * Every factory validates its configuration through these schemas. Presets are
 * exported for callers to pass deliberately; factories never fall back to them.
 */

import * as v from "valibot";

import type { Env } from "@/lib/env";

import { ConfigValidationError } from "./errors";

const positiveInteger = v.pipe(v.number(), v.integer(), v.minValue(1));
const nonNegativeMs = v.pipe(v.number(), v.minValue(0));
const positiveMs = v.pipe(v.number(), v.gtValue(0));
const admissionPolicySchema = v.picklist(["wait", "reject"]);

export const circuitBreakerConfigSchema = v.object({
  /** Consecutive counted failures in CLOSED before opening */
  failureThreshold: positiveInteger,
  /** Consecutive successes in HALF_OPEN before closing */
  successThreshold: positiveInteger,
  /** Time OPEN must last before a probe is admitted */
  openTimeoutMs: nonNegativeMs,
  /** Concurrent probes admitted while HALF_OPEN */
  halfOpenMaxRequests: positiveInteger,
  /** Maximum time in HALF_OPEN before reopening (absent: unbounded) */
  halfOpenTimeoutMs: v.optional(positiveMs),
});

export type CircuitBreakerConfig = v.InferOutput<typeof circuitBreakerConfigSchema>;

export const retryConfigSchema = v.pipe(
  v.object({
    /** Hard cap on invocations per logical call */
    maxAttempts: positiveInteger,
    baseDelayMs: nonNegativeMs,
    maxDelayMs: nonNegativeMs,
    backoffMultiplier: v.pipe(v.number(), v.gtValue(1)),
    jitterFraction: v.pipe(v.number(), v.minValue(0), v.maxValue(1)),
    /** Hard cap on wall-clock time per logical call */
    maxElapsedMs: positiveMs,
    /** Wait at least as long as a server-provided Retry-After hint */
    respectRetryAfter: v.boolean(),
  }),
  v.check(
    (input) => input.baseDelayMs <= input.maxDelayMs,
    "baseDelayMs must not exceed maxDelayMs",
  ),
);

export type RetryConfig = v.InferOutput<typeof retryConfigSchema>;

export type AdmissionPolicy = v.InferOutput<typeof admissionPolicySchema>;

export const tokenBucketLimiterConfigSchema = v.object({
  strategy: v.literal("token_bucket"),
  /** Bucket capacity */
  maxTokens: v.pipe(v.number(), v.minValue(1)),
  /** Tokens added per second */
  refillRatePerSecond: positiveMs,
  /** Starting tokens (absent: maxTokens) */
  initialTokens: v.optional(v.pipe(v.number(), v.minValue(0))),
  admissionPolicy: admissionPolicySchema,
  /** Longest wait accepted under the wait policy (absent: unbounded) */
  maxWaitMs: v.optional(nonNegativeMs),
});

export const slidingWindowLimiterConfigSchema = v.object({
  strategy: v.literal("sliding_window"),
  windowMs: positiveMs,
  maxRequests: positiveInteger,
  admissionPolicy: admissionPolicySchema,
  maxWaitMs: v.optional(nonNegativeMs),
});

export const rateLimiterConfigSchema = v.pipe(
  v.variant("strategy", [tokenBucketLimiterConfigSchema, slidingWindowLimiterConfigSchema]),
  v.check(
    (input) =>
      input.strategy !== "token_bucket" ||
      input.initialTokens === undefined ||
      input.initialTokens <= input.maxTokens,
    "initialTokens must not exceed maxTokens",
  ),
);

export type TokenBucketLimiterConfig = v.InferOutput<typeof tokenBucketLimiterConfigSchema>;
export type SlidingWindowLimiterConfig = v.InferOutput<typeof slidingWindowLimiterConfigSchema>;
export type RateLimiterConfig = v.InferOutput<typeof rateLimiterConfigSchema>;

export const resilienceConfigSchema = v.object({
  circuitBreaker: circuitBreakerConfigSchema,
  retry: retryConfigSchema,
  rateLimiter: rateLimiterConfigSchema,
  /** Per-attempt timeout (absent: attempts are not timed out) */
  attemptTimeoutMs: v.optional(positiveMs),
});

export type ResilienceConfig = v.InferOutput<typeof resilienceConfigSchema>;

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  successThreshold: 3,
  openTimeoutMs: 30_000,
  halfOpenMaxRequests: 1,
};

/**
 * Opens faster and probes more cautiously, for calls whose failures are costly.
 */
export const CRITICAL_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 3,
  successThreshold: 2,
  openTimeoutMs: 60_000,
  halfOpenMaxRequests: 1,
  halfOpenTimeoutMs: 30_000,
};

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
  backoffMultiplier: 2,
  jitterFraction: 0.1,
  maxElapsedMs: 120_000,
  respectRetryAfter: true,
};

export const DEFAULT_TOKEN_BUCKET_LIMITER_CONFIG: TokenBucketLimiterConfig = {
  strategy: "token_bucket",
  maxTokens: 10,
  refillRatePerSecond: 10,
  admissionPolicy: "wait",
};

export const DEFAULT_RESILIENCE_CONFIG: ResilienceConfig = {
  circuitBreaker: DEFAULT_CIRCUIT_BREAKER_CONFIG,
  retry: DEFAULT_RETRY_CONFIG,
  rateLimiter: DEFAULT_TOKEN_BUCKET_LIMITER_CONFIG,
};

/**
 * Validates `input` against `schema`, throwing `ConfigValidationError` with one
 * line per issue.
 */
export const parseConfig = <TSchema extends v.GenericSchema>(
  schema: TSchema,
  input: unknown,
  label: string,
): v.InferOutput<TSchema> => {
  const result = v.safeParse(schema, input);
  if (result.success) {
    return result.output;
  }

  const issues = result.issues.map(
    (issue) => `${v.getDotPath(issue) ?? "(root)"}: ${issue.message}`,
  );
  throw new ConfigValidationError(`Invalid ${label} configuration: ${issues.join("; ")}`, issues);
};

export const parseCircuitBreakerConfig = (input: unknown): CircuitBreakerConfig =>
  parseConfig(circuitBreakerConfigSchema, input, "circuit breaker");

export const parseRetryConfig = (input: unknown): RetryConfig =>
  parseConfig(retryConfigSchema, input, "retry");

export const parseRateLimiterConfig = (input: unknown): RateLimiterConfig =>
  parseConfig(rateLimiterConfigSchema, input, "rate limiter");

export const parseResilienceConfig = (input: unknown): ResilienceConfig =>
  parseConfig(resilienceConfigSchema, input, "resilience");

/**
 * Overlays `RESILIENCE_*` environment overrides onto `base` and validates the
 * result.
 */
export const loadResilienceConfig = (base: ResilienceConfig, env: Env): ResilienceConfig => {
  const rateLimiter: RateLimiterConfig = {
    ...base.rateLimiter,
    admissionPolicy: env.RESILIENCE_ADMISSION_POLICY ?? base.rateLimiter.admissionPolicy,
  };

  return parseResilienceConfig({
    ...base,
    circuitBreaker: {
      ...base.circuitBreaker,
      failureThreshold: env.RESILIENCE_FAILURE_THRESHOLD ?? base.circuitBreaker.failureThreshold,
      successThreshold: env.RESILIENCE_SUCCESS_THRESHOLD ?? base.circuitBreaker.successThreshold,
      openTimeoutMs: env.RESILIENCE_OPEN_TIMEOUT_MS ?? base.circuitBreaker.openTimeoutMs,
      halfOpenMaxRequests:
        env.RESILIENCE_HALF_OPEN_MAX_REQUESTS ?? base.circuitBreaker.halfOpenMaxRequests,
    },
    retry: {
      ...base.retry,
      maxAttempts: env.RESILIENCE_MAX_ATTEMPTS ?? base.retry.maxAttempts,
      baseDelayMs: env.RESILIENCE_BASE_DELAY_MS ?? base.retry.baseDelayMs,
      maxDelayMs: env.RESILIENCE_MAX_DELAY_MS ?? base.retry.maxDelayMs,
      maxElapsedMs: env.RESILIENCE_MAX_ELAPSED_MS ?? base.retry.maxElapsedMs,
      jitterFraction: env.RESILIENCE_JITTER_FRACTION ?? base.retry.jitterFraction,
    },
    rateLimiter,
  });
};
