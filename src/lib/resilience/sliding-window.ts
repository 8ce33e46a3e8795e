/**
 * Sliding window rate limiter: at most `maxRequests` admissions within any
 * `windowMs` interval.
 */

import type { AcquireResult } from "./token-bucket";

export interface SlidingWindowConfig {
  windowMs: number;
  maxRequests: number;
}

export interface SlidingWindow {
  /** Prunes expired timestamps, then admits if the window has room */
  tryAcquire: () => AcquireResult;
  /** Number of admissions still inside the window */
  getOccupancy: () => number;
  /** Forgets every recorded admission */
  reset: () => void;
}

export const createSlidingWindow = (
  config: SlidingWindowConfig,
  now: () => number = () => Date.now(),
): SlidingWindow => {
  const { windowMs, maxRequests } = config;

  // Admission timestamps, oldest first
  let timestamps: number[] = [];

  const liveTimestamps = (at: number): number[] =>
    timestamps.filter((timestamp) => timestamp > at - windowMs);

  const waitFor = (live: number[], at: number): number => {
    const oldest = live[0];
    if (live.length < maxRequests || oldest === undefined) {
      return 0;
    }
    return oldest + windowMs - at;
  };

  const tryAcquire = (): AcquireResult => {
    const at = now();
    timestamps = liveTimestamps(at);

    if (timestamps.length < maxRequests) {
      timestamps.push(at);
      return { admitted: true };
    }

    return { admitted: false, waitTimeMs: waitFor(timestamps, at) };
  };

  return {
    tryAcquire,
    getOccupancy: () => liveTimestamps(now()).length,
    reset: () => {
      timestamps = [];
    },
  };
};
