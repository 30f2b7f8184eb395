import { OperationCancelledError } from "../../core/errors";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const throwIfCancelled = (signal?: AbortSignal): void => {
  if (signal?.aborted) {
    throw new OperationCancelledError();
  }
};

/**
 * Timer-based wait; rejects with OperationCancelledError as soon as `signal` aborts.
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationCancelledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new OperationCancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener("abort", onAbort, { once: true });
  });
