import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createLogger } from "@/lib/logger";

import { createHttpErrorClassifier } from "./classifier";
import {
  type CircuitPermit,
  type CircuitStateChange,
  createCircuitBreaker,
} from "./circuit-breaker";
import type { CircuitBreakerConfig } from "./config";
import {
  CallCancelledError,
  CircuitOpenError,
  ConfigValidationError,
  ProviderError,
} from "./errors";

const classifier = createHttpErrorClassifier();

const serverError = (): ProviderError =>
  new ProviderError("upstream unavailable", "SERVER_ERROR", { status: 503 });
const throttled = (): ProviderError =>
  new ProviderError("slow down", "RATE_LIMITED", { status: 429 });
const badRequest = (): ProviderError =>
  new ProviderError("invalid model", "INVALID_REQUEST", { status: 400 });

const SCENARIO_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 3,
  successThreshold: 2,
  openTimeoutMs: 5000,
  halfOpenMaxRequests: 1,
};

describe("createCircuitBreaker", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(1_000_000);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const createBreaker = (overrides: Partial<CircuitBreakerConfig> = {}) =>
    createCircuitBreaker({ ...SCENARIO_CONFIG, ...overrides }, { classifier });

  const trip = (breaker: ReturnType<typeof createBreaker>, failures = 3): void => {
    for (let i = 0; i < failures; i++) {
      breaker.recordFailure(serverError());
    }
  };

  describe("initial state", () => {
    it("should start in CLOSED state with empty counters", () => {
      const breaker = createBreaker();

      expect(breaker.getState()).toBe("CLOSED");
      expect(breaker.canExecute()).toBe(true);
      expect(breaker.getMetrics()).toEqual({
        state: "CLOSED",
        failureCount: 0,
        successCount: 0,
        halfOpenInFlight: 0,
        openedAt: null,
        halfOpenAt: null,
        totalRequests: 0,
        totalFailures: 0,
        tripCount: 0,
        successRate: 1,
      });
    });
  });

  describe("circuit opening", () => {
    it("should open after consecutive counted failures", () => {
      const breaker = createBreaker();

      trip(breaker);

      const metrics = breaker.getMetrics();
      expect(metrics.state).toBe("OPEN");
      expect(metrics.openedAt).toBe(1_000_000);
      expect(metrics.tripCount).toBe(1);
      expect(metrics.totalFailures).toBe(3);
      expect(breaker.canExecute()).toBe(false);
    });

    it("should trip exactly once when failures keep arriving", () => {
      const breaker = createBreaker();

      trip(breaker, 7);

      const metrics = breaker.getMetrics();
      expect(metrics.state).toBe("OPEN");
      expect(metrics.tripCount).toBe(1);
      // Outcomes reported while OPEN are ignored
      expect(metrics.totalFailures).toBe(3);
    });

    it("should not open before threshold", () => {
      const breaker = createBreaker();

      trip(breaker, 2);

      expect(breaker.getState()).toBe("CLOSED");
      expect(breaker.getMetrics().failureCount).toBe(2);
    });

    it("should reset failure count on success", () => {
      const breaker = createBreaker();

      trip(breaker, 2);
      breaker.recordSuccess();
      trip(breaker, 2);

      expect(breaker.getState()).toBe("CLOSED");
      expect(breaker.getMetrics().failureCount).toBe(2);
    });

    it("should ignore overload signals entirely", () => {
      const breaker = createBreaker();

      for (let i = 0; i < 10; i++) {
        breaker.recordFailure(throttled());
      }

      const metrics = breaker.getMetrics();
      expect(metrics.state).toBe("CLOSED");
      expect(metrics.failureCount).toBe(0);
      expect(metrics.tripCount).toBe(0);
      expect(metrics.totalRequests).toBe(0);
    });

    it("should ignore client errors", () => {
      const breaker = createBreaker();

      for (let i = 0; i < 5; i++) {
        breaker.recordFailure(badRequest());
      }

      expect(breaker.getMetrics().failureCount).toBe(0);
      expect(breaker.getState()).toBe("CLOSED");
    });

    it("should count cancelled attempts as failures", () => {
      const breaker = createBreaker();

      trip(breaker, 2);
      breaker.recordFailure(new CallCancelledError());

      expect(breaker.getState()).toBe("OPEN");
    });
  });

  describe("circuit recovery", () => {
    it("should follow CLOSED -> OPEN -> HALF_OPEN -> CLOSED", () => {
      const breaker = createBreaker();

      trip(breaker);
      expect(breaker.getState()).toBe("OPEN");

      vi.advanceTimersByTime(4999);
      expect(breaker.canExecute()).toBe(false);

      vi.advanceTimersByTime(101);
      expect(breaker.canExecute()).toBe(true);
      expect(breaker.getState()).toBe("HALF_OPEN");
      expect(breaker.getMetrics().openedAt).toBeNull();
      expect(breaker.getMetrics().halfOpenAt).toBe(1_005_100);

      breaker.recordSuccess();
      expect(breaker.getState()).toBe("HALF_OPEN");

      expect(breaker.canExecute()).toBe(true);
      breaker.recordSuccess();
      expect(breaker.getState()).toBe("CLOSED");

      const metrics = breaker.getMetrics();
      expect(metrics.halfOpenAt).toBeNull();
      expect(metrics.successCount).toBe(0);
      expect(metrics.totalRequests).toBe(5);
      expect(metrics.successRate).toBe(0.4);
      expect(metrics.tripCount).toBe(1);
    });

    it("should not transition when only reading state", () => {
      const breaker = createBreaker();

      trip(breaker);
      vi.advanceTimersByTime(6000);

      expect(breaker.getState()).toBe("OPEN");
      expect(breaker.getMetrics().state).toBe("OPEN");
    });

    it("should return to OPEN on a counted failure in HALF_OPEN", () => {
      const breaker = createBreaker();

      trip(breaker);
      vi.advanceTimersByTime(5000);
      expect(breaker.canExecute()).toBe(true);

      breaker.recordSuccess();
      expect(breaker.canExecute()).toBe(true);
      breaker.recordFailure(serverError());

      const metrics = breaker.getMetrics();
      expect(metrics.state).toBe("OPEN");
      expect(metrics.successCount).toBe(0);
      expect(metrics.tripCount).toBe(2);
      expect(metrics.openedAt).toBe(1_005_000);
      expect(breaker.canExecute()).toBe(false);
    });

    it("should stay HALF_OPEN on an overload signal", () => {
      const breaker = createBreaker();

      trip(breaker);
      vi.advanceTimersByTime(5000);
      expect(breaker.canExecute()).toBe(true);

      breaker.recordFailure(throttled());

      expect(breaker.getState()).toBe("HALF_OPEN");
      // The probe slot is released
      expect(breaker.canExecute()).toBe(true);
    });

    it("should limit concurrent probes in HALF_OPEN", () => {
      const breaker = createBreaker({ halfOpenMaxRequests: 2 });

      trip(breaker);
      vi.advanceTimersByTime(5000);

      expect(breaker.canExecute()).toBe(true);
      expect(breaker.canExecute()).toBe(true);
      expect(breaker.canExecute()).toBe(false);
      expect(breaker.getMetrics().halfOpenInFlight).toBe(2);

      breaker.recordSuccess();
      expect(breaker.canExecute()).toBe(true);
    });

    it("should reopen when HALF_OPEN outlasts halfOpenTimeoutMs", () => {
      const breaker = createBreaker({ halfOpenTimeoutMs: 1000, halfOpenMaxRequests: 5 });

      trip(breaker);
      vi.advanceTimersByTime(5000);
      expect(breaker.canExecute()).toBe(true);

      vi.advanceTimersByTime(1000);
      expect(breaker.canExecute()).toBe(false);

      const metrics = breaker.getMetrics();
      expect(metrics.state).toBe("OPEN");
      expect(metrics.tripCount).toBe(2);
      expect(metrics.openedAt).toBe(1_006_000);
    });
  });

  describe("permits", () => {
    const acquire = (breaker: ReturnType<typeof createBreaker>): CircuitPermit => {
      const permit = breaker.acquirePermit();
      if (permit === null) {
        throw new Error("circuit refused admission");
      }
      return permit;
    };

    it("should stamp permits with the state they were issued in", () => {
      const breaker = createBreaker();

      expect(acquire(breaker)).toEqual({ generation: 0, halfOpenSlot: false });

      trip(breaker);
      vi.advanceTimersByTime(5000);

      expect(acquire(breaker)).toEqual({ generation: 2, halfOpenSlot: true });
    });

    it("should ignore a success from an attempt admitted while CLOSED", () => {
      const breaker = createBreaker();
      const closedEra = acquire(breaker);
      trip(breaker);
      vi.advanceTimersByTime(5000);
      acquire(breaker);

      breaker.recordSuccess(closedEra);

      expect(breaker.canExecute()).toBe(false);
      expect(breaker.getMetrics()).toMatchObject({
        state: "HALF_OPEN",
        successCount: 0,
        halfOpenInFlight: 1,
        totalRequests: 3,
      });
    });

    it("should ignore a failure from an attempt admitted while CLOSED", () => {
      const breaker = createBreaker();
      const closedEra = acquire(breaker);
      trip(breaker);
      vi.advanceTimersByTime(5000);
      const halfOpen = acquire(breaker);

      breaker.recordFailure(serverError(), closedEra);

      expect(breaker.getState()).toBe("HALF_OPEN");
      expect(breaker.getMetrics().totalFailures).toBe(3);

      breaker.recordSuccess(halfOpen);

      expect(breaker.getMetrics()).toMatchObject({ successCount: 1, halfOpenInFlight: 0 });
    });

    it("should free the half-open slot of a released permit", () => {
      const breaker = createBreaker();
      trip(breaker);
      vi.advanceTimersByTime(5000);
      const permit = acquire(breaker);

      expect(breaker.canExecute()).toBe(false);

      breaker.releasePermit(permit);

      expect(breaker.getMetrics()).toMatchObject({ state: "HALF_OPEN", halfOpenInFlight: 0 });
      expect(breaker.canExecute()).toBe(true);
    });

    it("should count outcomes of current CLOSED permits", () => {
      const breaker = createBreaker();

      for (let i = 0; i < 3; i++) {
        breaker.recordFailure(serverError(), acquire(breaker));
      }

      expect(breaker.getState()).toBe("OPEN");
      expect(breaker.getMetrics().tripCount).toBe(1);
    });
  });

  describe("execute", () => {
    it("should return the result and record success", async () => {
      const breaker = createBreaker();

      const result = await breaker.execute(async () => "completion");

      expect(result).toBe("completion");
      expect(breaker.getMetrics().totalRequests).toBe(1);
    });

    it("should propagate errors and record the failure", async () => {
      const breaker = createBreaker();

      await expect(
        breaker.execute(async () => {
          throw serverError();
        }),
      ).rejects.toThrow("upstream unavailable");
      expect(breaker.getMetrics().failureCount).toBe(1);
    });

    it("should fail fast with CircuitOpenError while open", async () => {
      const breaker = createBreaker();
      const fn = vi.fn(async () => "completion");

      trip(breaker);
      vi.advanceTimersByTime(2000);

      const error = await breaker.execute(fn).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CircuitOpenError);
      expect(error).toMatchObject({ kind: "circuit_open", state: "OPEN", retryAfterMs: 3000 });
      expect(fn).not.toHaveBeenCalled();
    });
  });

  describe("state change events", () => {
    it("should notify every transition with its reason", () => {
      const breaker = createBreaker({ successThreshold: 1 });
      const changes: CircuitStateChange[] = [];
      breaker.onStateChange((change) => {
        changes.push(change);
      });

      trip(breaker);
      vi.advanceTimersByTime(5000);
      breaker.canExecute();
      breaker.recordSuccess();

      expect(changes).toEqual([
        { from: "CLOSED", to: "OPEN", reason: "failure_threshold", at: 1_000_000 },
        { from: "OPEN", to: "HALF_OPEN", reason: "open_timeout_elapsed", at: 1_005_000 },
        { from: "HALF_OPEN", to: "CLOSED", reason: "success_threshold", at: 1_005_000 },
      ]);
    });

    it("should allow unsubscribing", () => {
      const breaker = createBreaker();
      const listener = vi.fn();

      const unsubscribe = breaker.onStateChange(listener);
      unsubscribe();
      trip(breaker);

      expect(listener).not.toHaveBeenCalled();
    });

    it("should log transitions", () => {
      const writer = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const logger = createLogger({ level: "info", writer, format: "json" });
      const breaker = createCircuitBreaker(SCENARIO_CONFIG, { classifier, logger, name: "chat" });

      trip(breaker);

      expect(writer.warn).toHaveBeenCalledTimes(1);
      const entry: unknown = JSON.parse(String(writer.warn.mock.calls[0]?.[0]));
      expect(entry).toMatchObject({
        level: "warn",
        message: "Circuit breaker opened",
        context: { breaker: "chat", from: "CLOSED", reason: "failure_threshold", trips: 1 },
      });
    });
  });

  describe("reset", () => {
    it("should close the circuit and keep lifetime counters", () => {
      const breaker = createBreaker();

      trip(breaker);
      breaker.reset();

      const metrics = breaker.getMetrics();
      expect(metrics.state).toBe("CLOSED");
      expect(metrics.openedAt).toBeNull();
      expect(metrics.tripCount).toBe(1);
      expect(metrics.totalFailures).toBe(3);
      expect(breaker.canExecute()).toBe(true);
    });
  });

  describe("configuration", () => {
    it("should reject a zero failure threshold", () => {
      expect(() => createBreaker({ failureThreshold: 0 })).toThrow(ConfigValidationError);
    });

    it("should reject a fractional probe limit", () => {
      expect(() => createBreaker({ halfOpenMaxRequests: 1.5 })).toThrow(
        /halfOpenMaxRequests/,
      );
    });
  });
});
