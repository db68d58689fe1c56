import { computeExponentialBackoffMs } from "../api/retryPolicy";
import { type FetchFailure, throwIfAborted } from "../errors";
import { err } from "../result";
import type { PageRequest } from "../types";
import type { FetchResult, PageFetcher } from "./capabilities";
import { type SleepLike, sleepFor } from "./sleep";

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  sleep?: SleepLike;
  random?: () => number;
  signal?: AbortSignal;
  onRetry?: (failure: FetchFailure, attempt: number, delayMs: number) => void;
}

export function computeRetryDelayMs(
  failure: FetchFailure,
  attempt: number,
  options: Pick<RetryOptions, "baseDelayMs" | "maxDelayMs" | "random">
): number {
  const backoffDelayMs = computeExponentialBackoffMs(
    attempt,
    options.baseDelayMs,
    options.maxDelayMs,
    options.random ?? Math.random
  );

  if (failure.retryAfterMs === null) {
    return backoffDelayMs;
  }

  const hintMs = Math.min(failure.retryAfterMs, options.maxDelayMs);

  // A rate-limited server's reset hint is a floor, not a replacement.
  return failure.rateLimited ? Math.max(hintMs, backoffDelayMs) : hintMs;
}

/**
 * Retries transient failures with jittered exponential backoff. A transient
 * failure on the last allowed attempt is returned as fatal.
 */
export async function fetchWithRetry(
  fetcher: PageFetcher,
  request: PageRequest,
  options: RetryOptions
): Promise<FetchResult> {
  const sleep = options.sleep ?? sleepFor;
  const maxAttempts = Math.max(1, options.maxRetries + 1);
  let attempt = 1;

  while (true) {
    throwIfAborted(options.signal);

    const result = await fetcher.fetchPage(request, options.signal);
    if (result.ok || result.error.kind === "fatal") {
      return result;
    }

    if (attempt >= maxAttempts) {
      return err({
        ...result.error,
        kind: "fatal",
        retryCeilingExceeded: true,
        message: `Retry ceiling exceeded after ${attempt} attempts: ${result.error.message}`
      });
    }

    const delayMs = computeRetryDelayMs(result.error, attempt, options);
    options.onRetry?.(result.error, attempt, delayMs);
    attempt += 1;

    await sleep(delayMs, options.signal);
  }
}
