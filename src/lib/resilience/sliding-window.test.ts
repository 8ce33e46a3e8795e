import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createSlidingWindow } from "./sliding-window";

describe("createSlidingWindow", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(1_000_000);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should admit up to maxRequests within the window", () => {
    const slidingWindow = createSlidingWindow({ windowMs: 1000, maxRequests: 2 });

    expect(slidingWindow.tryAcquire()).toEqual({ admitted: true });
    expect(slidingWindow.tryAcquire()).toEqual({ admitted: true });
    expect(slidingWindow.tryAcquire()).toEqual({ admitted: false, waitTimeMs: 1000 });
    expect(slidingWindow.getOccupancy()).toBe(2);
  });

  it("should report the time until the oldest admission leaves the window", () => {
    const slidingWindow = createSlidingWindow({ windowMs: 1000, maxRequests: 2 });

    slidingWindow.tryAcquire();
    vi.advanceTimersByTime(300);
    slidingWindow.tryAcquire();
    vi.advanceTimersByTime(100);

    expect(slidingWindow.tryAcquire()).toEqual({ admitted: false, waitTimeMs: 600 });
  });

  it("should admit again once old admissions expire", () => {
    const slidingWindow = createSlidingWindow({ windowMs: 1000, maxRequests: 2 });

    slidingWindow.tryAcquire();
    vi.advanceTimersByTime(300);
    slidingWindow.tryAcquire();
    vi.advanceTimersByTime(700);

    expect(slidingWindow.getOccupancy()).toBe(1);
    expect(slidingWindow.tryAcquire()).toEqual({ admitted: true });
    expect(slidingWindow.tryAcquire()).toEqual({ admitted: false, waitTimeMs: 300 });
  });

  it("should forget every admission on reset", () => {
    const slidingWindow = createSlidingWindow({ windowMs: 1000, maxRequests: 1 });

    slidingWindow.tryAcquire();
    slidingWindow.reset();

    expect(slidingWindow.getOccupancy()).toBe(0);
    expect(slidingWindow.tryAcquire()).toEqual({ admitted: true });
  });
});
