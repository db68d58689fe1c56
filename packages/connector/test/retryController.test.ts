import { describe, expect, it, vi } from "vitest";

import { SyncCancelledError, fatalFailure, transientFailure } from "../src/errors";
import { err, ok } from "../src/result";
import type { FetchResult } from "../src/sync/capabilities";
import { computeRetryDelayMs, fetchWithRetry } from "../src/sync/retryController";
import type { PageRequest } from "../src/types";

const request: PageRequest = {
  entityId: "hourly_observations:oslo",
  locationId: "oslo",
  window: { start: "2026-01-01T00:00:00.000Z", end: "2026-01-02T00:00:00.000Z" },
  limit: 100,
  continuationToken: null,
  pageNumber: 1
};

const emptyPage: FetchResult = ok({ records: [], continuationToken: null, watermark: null });

function fetcherReturning(...results: FetchResult[]) {
  const fetchPage = vi.fn(async () => results.shift() ?? emptyPage);
  return { fetchPage };
}

describe("computeRetryDelayMs", () => {
  const settings = { baseDelayMs: 100, maxDelayMs: 1000, random: () => 0 };

  it("uses backoff unless the server supplied a delay", () => {
    expect(computeRetryDelayMs(transientFailure("busy"), 2, settings)).toBe(200);
    expect(computeRetryDelayMs(transientFailure("busy", 503, 50), 2, settings)).toBe(50);
  });

  it("treats a rate limit hint as a floor under the backoff", () => {
    expect(computeRetryDelayMs(transientFailure("slow down", 429, 50, true), 1, settings)).toBe(100);
    expect(computeRetryDelayMs(transientFailure("slow down", 429, 800, true), 1, settings)).toBe(800);
  });

  it("caps server supplied delays at the maximum delay", () => {
    expect(computeRetryDelayMs(transientFailure("busy", 503, 86_400_000), 1, settings)).toBe(1000);
    expect(computeRetryDelayMs(transientFailure("slow down", 429, 86_400_000, true), 1, settings)).toBe(1000);
  });
});

describe("fetchWithRetry", () => {
  it("retries transient failures with backoff until a page arrives", async () => {
    const fetcher = fetcherReturning(
      err(transientFailure("Observations API request failed with status 503", 503)),
      err(transientFailure("Observations API request failed with status 503", 503)),
      emptyPage
    );
    const sleep = vi.fn(async () => undefined);
    const onRetry = vi.fn();

    const result = await fetchWithRetry(fetcher, request, {
      maxRetries: 5,
      baseDelayMs: 100,
      maxDelayMs: 1000,
      random: () => 0,
      sleep,
      onRetry
    });

    expect(result).toEqual(emptyPage);
    expect(fetcher.fetchPage).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([
      [100, undefined],
      [200, undefined]
    ]);
    expect(onRetry).toHaveBeenNthCalledWith(1, expect.objectContaining({ status: 503 }), 1, 100);
    expect(onRetry).toHaveBeenNthCalledWith(2, expect.objectContaining({ status: 503 }), 2, 200);
  });

  it("turns the last transient failure into a fatal one at the retry ceiling", async () => {
    const fetcher = fetcherReturning(
      err(transientFailure("boom")),
      err(transientFailure("boom")),
      err(transientFailure("boom")),
      emptyPage
    );

    const result = await fetchWithRetry(fetcher, request, {
      maxRetries: 2,
      baseDelayMs: 1,
      maxDelayMs: 1,
      sleep: async () => undefined
    });

    expect(fetcher.fetchPage).toHaveBeenCalledTimes(3);
    expect(result).toEqual({
      ok: false,
      error: {
        kind: "fatal",
        message: "Retry ceiling exceeded after 3 attempts: boom",
        status: null,
        retryAfterMs: null,
        rateLimited: false,
        retryCeilingExceeded: true
      }
    });
  });

  it("returns fatal failures without retrying", async () => {
    const fetcher = fetcherReturning(err(fatalFailure("forbidden", 403)));
    const sleep = vi.fn(async () => undefined);

    const result = await fetchWithRetry(fetcher, request, {
      maxRetries: 5,
      baseDelayMs: 100,
      maxDelayMs: 1000,
      sleep
    });

    expect(!result.ok && result.error.status).toBe(403);
    expect(fetcher.fetchPage).toHaveBeenCalledOnce();
    expect(sleep).not.toHaveBeenCalled();
  });

  it("stops before fetching once the run is cancelled", async () => {
    const fetcher = fetcherReturning(emptyPage);
    const controller = new AbortController();
    controller.abort(new Error("shutdown"));

    await expect(
      fetchWithRetry(fetcher, request, {
        maxRetries: 1,
        baseDelayMs: 1,
        maxDelayMs: 1,
        signal: controller.signal
      })
    ).rejects.toBeInstanceOf(SyncCancelledError);
    expect(fetcher.fetchPage).not.toHaveBeenCalled();
  });
});
