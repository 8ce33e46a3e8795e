/**
 * Metrics hooks for the resilient caller.
 *
 * The middleware does not publish metrics itself; it reports each attempt,
 * call, rejection and breaker transition to an optional sink.
 */

import type { CircuitStateChange } from "./circuit-breaker";
import type { FailureKind } from "./errors";

export interface AttemptRecord {
  attempt: number;
  outcome: "success" | "failure";
  durationMs: number;
  error?: unknown;
}

export interface CallRecord {
  outcome: "success" | "failure";
  attempts: number;
  durationMs: number;
  failureKind?: FailureKind;
}

export interface RejectionRecord {
  reason: "circuit_open" | "rate_limited";
}

export interface ResilienceMetricsSink {
  recordAttempt?: (record: AttemptRecord) => void;
  recordCall?: (record: CallRecord) => void;
  recordRejection?: (record: RejectionRecord) => void;
  recordStateChange?: (change: CircuitStateChange) => void;
}

export interface RecordedMetrics {
  attempts: number;
  failedAttempts: number;
  calls: number;
  failedCalls: number;
  /** Failed calls per failure kind */
  failuresByKind: Partial<Record<FailureKind, number>>;
  rejections: Record<RejectionRecord["reason"], number>;
  stateChanges: CircuitStateChange[];
  /** Mean attempt duration (ms), 0 before the first attempt */
  averageAttemptMs: number;
}

export interface MetricsRecorder extends ResilienceMetricsSink {
  getSnapshot: () => RecordedMetrics;
  reset: () => void;
}

interface RecorderState {
  attempts: number;
  failedAttempts: number;
  totalAttemptMs: number;
  calls: number;
  failedCalls: number;
  failuresByKind: Partial<Record<FailureKind, number>>;
  rejections: Record<RejectionRecord["reason"], number>;
  stateChanges: CircuitStateChange[];
}

const emptyState = (): RecorderState => ({
  attempts: 0,
  failedAttempts: 0,
  totalAttemptMs: 0,
  calls: 0,
  failedCalls: 0,
  failuresByKind: {},
  rejections: { circuit_open: 0, rate_limited: 0 },
  stateChanges: [],
});

/**
 * In-memory sink, for tests and for exporting to an external metrics system.
 */
export const createMetricsRecorder = (): MetricsRecorder => {
  let state = emptyState();

  return {
    recordAttempt: (record) => {
      state.attempts++;
      state.totalAttemptMs += record.durationMs;
      if (record.outcome === "failure") {
        state.failedAttempts++;
      }
    },
    recordCall: (record) => {
      state.calls++;
      if (record.outcome === "failure") {
        state.failedCalls++;
        if (record.failureKind) {
          state.failuresByKind[record.failureKind] =
            (state.failuresByKind[record.failureKind] ?? 0) + 1;
        }
      }
    },
    recordRejection: (record) => {
      state.rejections[record.reason]++;
    },
    recordStateChange: (change) => {
      state.stateChanges.push(change);
    },
    getSnapshot: () => ({
      attempts: state.attempts,
      failedAttempts: state.failedAttempts,
      calls: state.calls,
      failedCalls: state.failedCalls,
      failuresByKind: { ...state.failuresByKind },
      rejections: { ...state.rejections },
      stateChanges: [...state.stateChanges],
      averageAttemptMs: state.attempts === 0 ? 0 : state.totalAttemptMs / state.attempts,
    }),
    reset: () => {
      state = emptyState();
    },
  };
};
