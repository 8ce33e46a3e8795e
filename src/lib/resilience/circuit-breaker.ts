/**
 * Circuit breaker state machine.
 *
 * - CLOSED: Normal operation, requests pass through
 * - OPEN: After `failureThreshold` counted failures, all requests fail fast
 * - HALF_OPEN: After `openTimeoutMs`, up to `halfOpenMaxRequests` probes pass
 *
 * Every method runs to completion without awaiting, so an admission check and
 * an outcome record can never interleave: two failures reaching the threshold
 * together open the circuit once.
 *
 * Admissions taken with `acquirePermit` are stamped with the transition count
 * they were issued under. An outcome recorded against a permit from an earlier
 * state is ignored, so an attempt started while CLOSED never counts towards HALF_OPEN.
 */

import type { Logger } from "@/lib/logger";

import type { ErrorClassifier } from "./classifier";
import { type CircuitBreakerConfig, parseCircuitBreakerConfig } from "./config";
import { CallCancelledError, CircuitOpenError } from "./errors";

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

export type CircuitTransitionReason =
  | "failure_threshold"
  | "open_timeout_elapsed"
  | "probe_failed"
  | "success_threshold"
  | "half_open_timeout"
  | "reset";

export interface CircuitStateChange {
  from: CircuitState;
  to: CircuitState;
  reason: CircuitTransitionReason;
  /** Timestamp of the transition (ms since epoch) */
  at: number;
}

export interface CircuitPermit {
  /** Number of transitions made before the permit was issued */
  readonly generation: number;
  /** Whether the permit holds one of the half-open slots */
  readonly halfOpenSlot: boolean;
}

export interface CircuitBreakerMetrics {
  state: CircuitState;
  failureCount: number;
  successCount: number;
  halfOpenInFlight: number;
  openedAt: number | null;
  halfOpenAt: number | null;
  totalRequests: number;
  totalFailures: number;
  tripCount: number;
  /** Share of recorded outcomes that succeeded (1 when nothing was recorded) */
  successRate: number;
}

export interface CircuitBreaker {
  /** Admission check; may move OPEN to HALF_OPEN or HALF_OPEN back to OPEN */
  canExecute: () => boolean;
  /** Admission check returning the permit to record the outcome against, or null */
  acquirePermit: () => CircuitPermit | null;
  /** Gives back a permit whose attempt never started */
  releasePermit: (permit: CircuitPermit) => void;
  /** Records a successful attempt */
  recordSuccess: (permit?: CircuitPermit) => void;
  /** Records a failed attempt; ignored unless the classifier counts it */
  recordFailure: (error: unknown, permit?: CircuitPermit) => void;
  /** Runs `fn` behind an admission check and records its outcome */
  execute: <T>(fn: () => Promise<T>) => Promise<T>;
  getState: () => CircuitState;
  getMetrics: () => CircuitBreakerMetrics;
  /** Time left before an OPEN circuit admits a probe, null unless OPEN */
  getRemainingOpenMs: () => number | null;
  /** Returns to CLOSED; lifetime counters are kept */
  reset: () => void;
  /** Subscribe to state change events */
  onStateChange: (listener: (change: CircuitStateChange) => void) => () => void;
}

export interface CircuitBreakerDeps {
  classifier: ErrorClassifier;
  logger?: Logger;
  /** Name used in log entries */
  name?: string;
  now?: () => number;
}

interface BreakerState {
  state: CircuitState;
  failureCount: number;
  successCount: number;
  halfOpenInFlight: number;
  openedAt: number | null;
  halfOpenAt: number | null;
  totalRequests: number;
  totalFailures: number;
  tripCount: number;
  generation: number;
}

/**
 * Creates a circuit breaker.
 *
 * @example
 * ```typescript
 * const breaker = createCircuitBreaker(
 *   { failureThreshold: 5, successThreshold: 2, openTimeoutMs: 30_000, halfOpenMaxRequests: 1 },
 *   { classifier: createHttpErrorClassifier() },
 * );
 *
 * if (breaker.canExecute()) {
 *   try {
 *     await callProvider();
 *     breaker.recordSuccess();
 *   } catch (error) {
 *     breaker.recordFailure(error);
 *   }
 * }
 * ```
 */
export const createCircuitBreaker = (
  config: CircuitBreakerConfig,
  deps: CircuitBreakerDeps,
): CircuitBreaker => {
  const { failureThreshold, successThreshold, openTimeoutMs, halfOpenMaxRequests, halfOpenTimeoutMs } =
    parseCircuitBreakerConfig(config);
  const { classifier, logger, name = "default", now = () => Date.now() } = deps;

  const s: BreakerState = {
    state: "CLOSED",
    failureCount: 0,
    successCount: 0,
    halfOpenInFlight: 0,
    openedAt: null,
    halfOpenAt: null,
    totalRequests: 0,
    totalFailures: 0,
    tripCount: 0,
    generation: 0,
  };

  const listeners = new Set<(change: CircuitStateChange) => void>();

  const transitionTo = (to: CircuitState, reason: CircuitTransitionReason): void => {
    const from = s.state;
    const at = now();

    s.state = to;
    s.generation++;
    s.failureCount = 0;
    s.successCount = 0;
    s.halfOpenInFlight = 0;

    switch (to) {
      case "OPEN":
        s.openedAt = at;
        s.halfOpenAt = null;
        s.tripCount++;
        break;
      case "HALF_OPEN":
        s.openedAt = null;
        s.halfOpenAt = at;
        break;
      case "CLOSED":
        s.openedAt = null;
        s.halfOpenAt = null;
        break;
    }

    if (to === "OPEN") {
      logger?.warn("Circuit breaker opened", { breaker: name, from, reason, trips: s.tripCount });
    } else {
      logger?.info(`Circuit breaker ${to === "CLOSED" ? "closed" : "half-open"}`, {
        breaker: name,
        from,
        reason,
      });
    }

    const change: CircuitStateChange = { from, to, reason, at };
    for (const listener of listeners) {
      listener(change);
    }
  };

  const releaseSlot = (permit: CircuitPermit | undefined): void => {
    if (permit && !permit.halfOpenSlot) {
      return;
    }
    if (s.state === "HALF_OPEN" && s.halfOpenInFlight > 0) {
      s.halfOpenInFlight--;
    }
  };

  // Outcomes of attempts admitted before the last transition
  const isStale = (permit: CircuitPermit | undefined): boolean =>
    permit !== undefined && permit.generation !== s.generation;

  const issue = (): CircuitPermit => ({
    generation: s.generation,
    halfOpenSlot: s.state === "HALF_OPEN",
  });

  const acquirePermit = (): CircuitPermit | null => {
    switch (s.state) {
      case "CLOSED":
        return issue();

      case "OPEN": {
        const openedAt = s.openedAt ?? now();
        if (now() - openedAt < openTimeoutMs) {
          return null;
        }
        transitionTo("HALF_OPEN", "open_timeout_elapsed");
        s.halfOpenInFlight = 1;
        return issue();
      }

      case "HALF_OPEN": {
        const halfOpenAt = s.halfOpenAt ?? now();
        if (halfOpenTimeoutMs !== undefined && now() - halfOpenAt >= halfOpenTimeoutMs) {
          transitionTo("OPEN", "half_open_timeout");
          return null;
        }
        if (s.halfOpenInFlight >= halfOpenMaxRequests) {
          return null;
        }
        s.halfOpenInFlight++;
        return issue();
      }
    }
  };

  const releasePermit = (permit: CircuitPermit): void => {
    if (!isStale(permit)) {
      releaseSlot(permit);
    }
  };

  const recordSuccess = (permit?: CircuitPermit): void => {
    if (isStale(permit)) {
      return;
    }

    switch (s.state) {
      case "CLOSED":
        s.totalRequests++;
        s.failureCount = 0;
        return;

      case "HALF_OPEN":
        s.totalRequests++;
        releaseSlot(permit);
        s.successCount++;
        if (s.successCount >= successThreshold) {
          transitionTo("CLOSED", "success_threshold");
        }
        return;

      case "OPEN":
        return;
    }
  };

  const recordFailure = (error: unknown, permit?: CircuitPermit): void => {
    if (isStale(permit)) {
      return;
    }
    releaseSlot(permit);

    // A cancelled in-flight attempt still reports exactly one failed outcome
    const counted = error instanceof CallCancelledError || classifier.isCircuitFailure(error);
    if (!counted || s.state === "OPEN") {
      return;
    }

    s.totalRequests++;
    s.totalFailures++;

    if (s.state === "HALF_OPEN") {
      transitionTo("OPEN", "probe_failed");
      return;
    }

    s.failureCount++;
    if (s.failureCount >= failureThreshold) {
      transitionTo("OPEN", "failure_threshold");
    }
  };

  const getRemainingOpenMs = (): number | null => {
    if (s.state !== "OPEN" || s.openedAt === null) {
      return null;
    }
    return Math.max(0, s.openedAt + openTimeoutMs - now());
  };

  const execute = async <T>(fn: () => Promise<T>): Promise<T> => {
    const permit = acquirePermit();
    if (permit === null) {
      throw new CircuitOpenError(
        `Circuit breaker "${name}" is open`,
        s.state,
        getRemainingOpenMs(),
      );
    }

    try {
      const result = await fn();
      recordSuccess(permit);
      return result;
    } catch (error) {
      recordFailure(error, permit);
      throw error;
    }
  };

  const getMetrics = (): CircuitBreakerMetrics => ({
    state: s.state,
    failureCount: s.failureCount,
    successCount: s.successCount,
    halfOpenInFlight: s.halfOpenInFlight,
    openedAt: s.openedAt,
    halfOpenAt: s.halfOpenAt,
    totalRequests: s.totalRequests,
    totalFailures: s.totalFailures,
    tripCount: s.tripCount,
    successRate:
      s.totalRequests === 0 ? 1 : (s.totalRequests - s.totalFailures) / s.totalRequests,
  });

  const reset = (): void => {
    if (s.state === "CLOSED") {
      s.failureCount = 0;
      s.successCount = 0;
      return;
    }
    transitionTo("CLOSED", "reset");
  };

  const onStateChange = (listener: (change: CircuitStateChange) => void): (() => void) => {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  };

  return {
    canExecute: () => acquirePermit() !== null,
    acquirePermit,
    releasePermit,
    recordSuccess,
    recordFailure,
    execute,
    getState: () => s.state,
    getMetrics,
    getRemainingOpenMs,
    reset,
    onStateChange,
  };
};
