/**
 * Resilience module exports.
 */

// Errors
export {
  AttemptTimeoutError,
  CallCancelledError,
  CircuitOpenError,
  ConfigValidationError,
  getErrorKind,
  isResilienceError,
  NonRetryableError,
  ProviderError,
  RateLimitExceededError,
  ResilienceError,
  RetryBudgetExhaustedError,
  type AttemptErrorKind,
  type FailureKind,
  type ProviderErrorCode,
  type ProviderErrorOptions,
  type ResilienceErrorKind,
  type RetryExhaustionReason,
} from "./errors";

// Error classification
export {
  classifyError,
  CLIENT_ERROR_STATUS_CODES,
  createHttpErrorClassifier,
  getRetryAfterMs,
  OVERLOAD_STATUS_CODES,
  TRANSIENT_STATUS_CODES,
  type ErrorClassifier,
  type HttpErrorClassifierOptions,
} from "./classifier";

// Configuration
export {
  circuitBreakerConfigSchema,
  CRITICAL_CIRCUIT_BREAKER_CONFIG,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  DEFAULT_RESILIENCE_CONFIG,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_TOKEN_BUCKET_LIMITER_CONFIG,
  loadResilienceConfig,
  parseCircuitBreakerConfig,
  parseRateLimiterConfig,
  parseResilienceConfig,
  parseRetryConfig,
  rateLimiterConfigSchema,
  resilienceConfigSchema,
  retryConfigSchema,
  type AdmissionPolicy,
  type CircuitBreakerConfig,
  type RateLimiterConfig,
  type ResilienceConfig,
  type RetryConfig,
  type SlidingWindowLimiterConfig,
  type TokenBucketLimiterConfig,
} from "./config";

// Backoff utilities
export {
  calculateBackoffMs,
  calculateBaseDelayMs,
  parseRetryAfterMs,
  type BackoffConfig,
} from "./backoff";

// Circuit breaker
export {
  createCircuitBreaker,
  type CircuitBreaker,
  type CircuitBreakerDeps,
  type CircuitBreakerMetrics,
  type CircuitPermit,
  type CircuitState,
  type CircuitStateChange,
  type CircuitTransitionReason,
} from "./circuit-breaker";

// Retry executor
export {
  createRetryExecutor,
  type AttemptContext,
  type Operation,
  type RetryEvent,
  type RetryExecuteOptions,
  type RetryExecutor,
  type RetryExecutorDeps,
  type RetryState,
} from "./retry";

// Rate limiting
export {
  createTokenBucket,
  type AcquireResult,
  type TokenBucket,
  type TokenBucketConfig,
} from "./token-bucket";
export {
  createSlidingWindow,
  type SlidingWindow,
  type SlidingWindowConfig,
} from "./sliding-window";
export {
  createRateLimiter,
  type RateLimiter,
  type RateLimiterDeps,
  type RateLimiterMetrics,
  type RateLimiterSnapshot,
} from "./rate-limiter";

// Metrics
export {
  createMetricsRecorder,
  type AttemptRecord,
  type CallRecord,
  type MetricsRecorder,
  type RecordedMetrics,
  type RejectionRecord,
  type ResilienceMetricsSink,
} from "./metrics";

// Resilient caller (main entry point)
export {
  createResilientCaller,
  createResilientCallerFromConfig,
  type CallMetrics,
  type CallOptions,
  type ResilienceMetrics,
  type ResilientCaller,
  type ResilientCallerDeps,
  type ResilientCallerFromConfigDeps,
} from "./resilient-caller";
