import { SyncCancelledError, describeAbortReason } from "../errors";

export type SleepLike = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Rejects with `SyncCancelledError` as soon as `signal` aborts. */
export async function sleepFor(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw new SyncCancelledError(describeAbortReason(signal.reason));
  }

  await new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timeoutId);
      reject(new SyncCancelledError(describeAbortReason(signal?.reason)));
    };

    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
