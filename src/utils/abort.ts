import { ERROR, QuoteHistoryError } from "@/constants/errors";

export function cancelledError(cause?: unknown): QuoteHistoryError {
  return new QuoteHistoryError(ERROR.CANCELLED, "Request cancelled", cause);
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw cancelledError(signal.reason);
}

/** Stop waiting on `promise` once `signal` aborts. The underlying work keeps running. */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(cancelledError(signal.reason));

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(cancelledError(signal.reason));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
