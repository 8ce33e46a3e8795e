import * as v from "valibot";

import { logLevelSchema } from "../logger/schema";

const numericString = v.pipe(v.string(), v.transform(Number), v.number());

export const envSchema = v.object({
  // Runtime
  // Hosts set their own values; only "development" and "production" change defaults
  NODE_ENV: v.optional(v.string(), "development"),

  // Logging
  LOG_LEVEL: v.optional(v.pipe(v.string(), logLevelSchema)),

  // Circuit breaker overrides
  RESILIENCE_FAILURE_THRESHOLD: v.optional(numericString),
  RESILIENCE_SUCCESS_THRESHOLD: v.optional(numericString),
  RESILIENCE_OPEN_TIMEOUT_MS: v.optional(numericString),
  RESILIENCE_HALF_OPEN_MAX_REQUESTS: v.optional(numericString),

  // Retry overrides
  RESILIENCE_MAX_ATTEMPTS: v.optional(numericString),
  RESILIENCE_BASE_DELAY_MS: v.optional(numericString),
  RESILIENCE_MAX_DELAY_MS: v.optional(numericString),
  RESILIENCE_MAX_ELAPSED_MS: v.optional(numericString),
  RESILIENCE_JITTER_FRACTION: v.optional(numericString),

  // Rate limiter overrides
  RESILIENCE_ADMISSION_POLICY: v.optional(v.picklist(["wait", "reject"])),
});

export type Env = v.InferOutput<typeof envSchema>;
