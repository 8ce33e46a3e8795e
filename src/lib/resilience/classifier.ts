/**
 * Error classification shared by the circuit breaker and the retry executor.
 *
 * The middleware never inspects provider errors itself; it asks an injected
 * `ErrorClassifier` two questions per failed attempt. The HTTP classifier below
 * is the provider-agnostic default.
 */

import { parseRetryAfterMs } from "./backoff";
import {
  type AttemptErrorKind,
  AttemptTimeoutError,
  ProviderError,
  type ProviderErrorCode,
  isResilienceError,
} from "./errors";

export interface ErrorClassifier {
  /** Whether the failure says something about the dependency's health */
  isCircuitFailure: (error: unknown) => boolean;
  /** Whether another attempt could succeed */
  isRetryable: (error: unknown) => boolean;
}

/**
 * Derives the single category of a failed attempt from the two predicates.
 */
export const classifyError = (classifier: ErrorClassifier, error: unknown): AttemptErrorKind => {
  if (!classifier.isRetryable(error)) {
    return "terminal";
  }
  return classifier.isCircuitFailure(error) ? "transient" : "overload";
};

/**
 * HTTP status codes that indicate a transient server-side failure.
 */
export const TRANSIENT_STATUS_CODES = new Set([
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
]);

/**
 * HTTP status codes with which the remote asks the client to slow down.
 */
export const OVERLOAD_STATUS_CODES = new Set([
  429, // Too Many Requests
  529, // Overloaded
]);

/**
 * HTTP status codes that indicate client errors.
 */
export const CLIENT_ERROR_STATUS_CODES = new Set([
  400, // Bad Request
  401, // Unauthorized
  403, // Forbidden
  404, // Not Found
  413, // Payload Too Large
  422, // Unprocessable Entity
]);

/**
 * Network error codes that indicate transient failures.
 */
const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "ERR_SOCKET_TIMEOUT",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

const PROVIDER_CODE_KINDS: Record<ProviderErrorCode, AttemptErrorKind> = {
  NETWORK_ERROR: "transient",
  TIMEOUT: "transient",
  SERVER_ERROR: "transient",
  OVERLOADED: "overload",
  RATE_LIMITED: "overload",
  INVALID_REQUEST: "terminal",
  AUTHENTICATION_FAILED: "terminal",
  NOT_FOUND: "terminal",
  UNKNOWN: "transient",
};

/**
 * Extracts HTTP status code from an error object without type casts.
 */
const getStatusCode = (err: object): number | undefined => {
  if ("status" in err && typeof err.status === "number") {
    return err.status;
  }
  if ("statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  return undefined;
};

const isHeadersRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === "object" && !Array.isArray(value);

/**
 * Extracts a server pacing hint from an error, in milliseconds.
 *
 * Looks at a numeric `retryAfterMs` first, then at a `Retry-After` header.
 */
export const getRetryAfterMs = (error: unknown): number | null => {
  if (error === null || typeof error !== "object") {
    return null;
  }

  if ("retryAfterMs" in error && typeof error.retryAfterMs === "number") {
    return error.retryAfterMs >= 0 ? error.retryAfterMs : null;
  }

  if ("headers" in error && isHeadersRecord(error.headers)) {
    const headers = error.headers;
    const value = headers["retry-after"] ?? headers["Retry-After"];
    return typeof value === "string" ? parseRetryAfterMs(value) : null;
  }

  return null;
};

export interface HttpErrorClassifierOptions {
  /** Extra status codes treated as transient */
  transientStatusCodes?: number[];
  /** Extra status codes treated as overload signals */
  overloadStatusCodes?: number[];
}

/**
 * Creates the default classifier.
 *
 * Transient (retry, count toward the circuit):
 * - 500/502/503/504
 * - Network errors (ECONNRESET, ETIMEDOUT, etc.)
 * - Attempt timeouts
 * - Unknown errors
 *
 * Overload (retry, never count toward the circuit):
 * - 429/529, RATE_LIMITED, OVERLOADED
 *
 * Terminal (never retry, never count):
 * - 400/401/403/404/413/422 and the matching provider codes
 * - Failures synthesized by the middleware itself
 */
export const createHttpErrorClassifier = (
  options: HttpErrorClassifierOptions = {},
): ErrorClassifier => {
  const transientStatusCodes = new Set([
    ...TRANSIENT_STATUS_CODES,
    ...(options.transientStatusCodes ?? []),
  ]);
  const overloadStatusCodes = new Set([
    ...OVERLOAD_STATUS_CODES,
    ...(options.overloadStatusCodes ?? []),
  ]);

  const kindOf = (error: unknown): AttemptErrorKind => {
    if (error instanceof AttemptTimeoutError) {
      return "transient";
    }
    if (isResilienceError(error)) {
      return "terminal";
    }

    if (error instanceof ProviderError) {
      return PROVIDER_CODE_KINDS[error.code];
    }

    if (error !== null && typeof error === "object") {
      const statusCode = getStatusCode(error);

      if (statusCode !== undefined) {
        if (overloadStatusCodes.has(statusCode)) {
          return "overload";
        }
        if (transientStatusCodes.has(statusCode)) {
          return "transient";
        }
        if (CLIENT_ERROR_STATUS_CODES.has(statusCode)) {
          return "terminal";
        }
        if (statusCode >= 400 && statusCode < 500) {
          return "terminal";
        }
      }

      if ("code" in error && typeof error.code === "string") {
        if (NETWORK_ERROR_CODES.has(error.code)) {
          return "transient";
        }
      }
    }

    // Unknown failures are treated as transient
    return "transient";
  };

  return {
    isCircuitFailure: (error) => kindOf(error) === "transient",
    isRetryable: (error) => kindOf(error) !== "terminal",
  };
};
