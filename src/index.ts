/**
 * Resilience middleware for outbound LLM provider calls.
 *
 * Shared circuit breaker, retry executor and rate limiter, composed by the
 * resilient caller and parameterized by an injected error classifier.
 */

export * from "./lib/resilience";

export { getEnv, parseEnv, resetEnvCache, type Env } from "./lib/env";
export { createLogger, logger, type LogLevel, type Logger, type LoggerConfig } from "./lib/logger";
