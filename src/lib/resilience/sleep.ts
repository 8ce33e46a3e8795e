import { CallCancelledError } from "./errors";

/**
 * Creates the error raised when a signal aborts a wait or an attempt.
 */
export const cancellationError = (signal: AbortSignal): CallCancelledError =>
  signal.reason instanceof CallCancelledError
    ? signal.reason
    : new CallCancelledError("Call was cancelled", { cause: signal.reason });

/**
 * Suspends for `ms`, rejecting with `CallCancelledError` if `signal` aborts first.
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancellationError(signal));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timeoutId);
      if (signal) {
        reject(cancellationError(signal));
      }
    };

    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
