import {
  SyncCancelledError,
  describeAbortReason,
  fatalFailure,
  transientFailure
} from "../errors";
import { err, ok } from "../result";
import type { FetchResult, PageFetcher } from "../sync/capabilities";
import { type SleepLike, sleepFor } from "../sync/sleep";
import type { ConnectorConfig, PageRequest } from "../types";
import { type AuthProvider, createApiKeyAuth } from "./auth";
import { parseObservationsPage } from "./responseParser";
import {
  classifyHttpStatus,
  parseNumericHeaderValue,
  parseRateLimitResetMs,
  parseRetryAfterMs,
  parseRetryAfterMsFromBody
} from "./retryPolicy";

type FetchLike = typeof fetch;

export type WeatherClientConfig = Pick<
  ConnectorConfig,
  "apiBaseUrl" | "apiKey" | "apiTimeoutMs"
>;

export interface WeatherClientDependencies {
  fetchImpl?: FetchLike;
  sleep?: SleepLike;
  now?: () => number;
  auth?: AuthProvider;
}

class RequestTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Observations API request timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

function normalizeBaseUrl(apiBaseUrl: string): string {
  return apiBaseUrl.endsWith("/") ? apiBaseUrl : `${apiBaseUrl}/`;
}

export function buildObservationsUrl(apiBaseUrl: string, request: PageRequest): URL {
  const url = new URL(
    `locations/${encodeURIComponent(request.locationId)}/observations`,
    normalizeBaseUrl(apiBaseUrl)
  );
  url.searchParams.set("start", request.window.start);
  url.searchParams.set("end", request.window.end);
  url.searchParams.set("limit", String(request.limit));
  url.searchParams.set("order", "asc");

  if (request.continuationToken) {
    url.searchParams.set("page_token", request.continuationToken);
  }

  return url;
}

function createErrorMessage(status: number, body: string): string {
  if (!body) {
    return `Observations API request failed with status ${status}`;
  }

  return `Observations API request failed with status ${status}: ${body}`;
}

function isNetworkError(error: unknown): boolean {
  if (error instanceof RequestTimeoutError) {
    return true;
  }

  if (error instanceof Error) {
    return error.name === "AbortError" || error.name === "TypeError";
  }

  return false;
}

function abortable<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new DOMException("The operation was aborted", "AbortError"));
    };

    if (signal.aborted) {
      onAbort();
      return;
    }

    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

interface FetchedResponse {
  response: Response;
  body: string;
}

/** The timeout and the run signal cover the body read as well as the headers. */
async function fetchWithTimeout(
  fetchImpl: FetchLike,
  requestUrl: URL,
  requestInit: RequestInit,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<FetchedResponse> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, timeoutMs);
  const onRunAborted = (): void => {
    controller.abort();
  };
  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener("abort", onRunAborted, { once: true });
  }

  try {
    const response = await fetchImpl(requestUrl, {
      ...requestInit,
      signal: controller.signal
    });
    const body = await abortable(response.text(), controller.signal);
    return { response, body };
  } catch (error) {
    if (signal?.aborted) {
      throw new SyncCancelledError(describeAbortReason(signal.reason));
    }

    if (controller.signal.aborted) {
      throw new RequestTimeoutError(timeoutMs);
    }

    throw error;
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener("abort", onRunAborted);
  }
}

/**
 * Page fetcher over the observations endpoint. Never retries on its own
 * (that belongs to the retry controller) except for one credential refresh
 * after a 401.
 */
export function createWeatherClient(
  config: WeatherClientConfig,
  dependencies: WeatherClientDependencies = {}
): PageFetcher {
  const fetchImpl = dependencies.fetchImpl ?? fetch;
  const sleep = dependencies.sleep ?? sleepFor;
  const now = dependencies.now ?? Date.now;
  const auth = dependencies.auth ?? createApiKeyAuth(config.apiKey);
  let nextRequestAllowedAtMs = 0;

  const applyRateLimitPacing = (headers: Headers): void => {
    const remaining = parseNumericHeaderValue(headers.get("X-RateLimit-Remaining"));
    const resetMs = parseRateLimitResetMs(headers.get("X-RateLimit-Reset"), now());

    if (remaining === null || resetMs === null) {
      return;
    }

    if (remaining <= 0) {
      nextRequestAllowedAtMs = Math.max(nextRequestAllowedAtMs, now() + resetMs);
    }
  };

  return {
    async fetchPage(request: PageRequest, signal?: AbortSignal): Promise<FetchResult> {
      const url = buildObservationsUrl(config.apiBaseUrl, request);
      let refreshed = false;

      while (true) {
        const waitMs = Math.max(0, nextRequestAllowedAtMs - now());
        if (waitMs > 0) {
          await sleep(waitMs, signal);
        }

        let authHeaders: Record<string, string>;
        try {
          authHeaders = await auth.headers();
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          return err(fatalFailure(message));
        }

        const requestInit: RequestInit = {
          method: "GET",
          headers: {
            Accept: "application/json",
            ...authHeaders
          }
        };

        let fetched: FetchedResponse;

        try {
          fetched = await fetchWithTimeout(
            fetchImpl,
            url,
            requestInit,
            config.apiTimeoutMs,
            signal
          );
        } catch (error) {
          if (error instanceof SyncCancelledError) {
            throw error;
          }

          const message = error instanceof Error ? error.message : String(error);
          return err(
            isNetworkError(error) ? transientFailure(message) : fatalFailure(message)
          );
        }

        const { response, body } = fetched;

        if (response.ok) {
          applyRateLimitPacing(response.headers);

          try {
            const payload: unknown = JSON.parse(body);
            return ok(parseObservationsPage(payload));
          } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            return err(fatalFailure(`Malformed observations response: ${message}`, response.status));
          }
        }

        if (response.status === 401 && auth.refresh && !refreshed) {
          refreshed = true;

          try {
            await auth.refresh();
          } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            return err(fatalFailure(message, 401));
          }

          continue;
        }

        const message = createErrorMessage(response.status, body);
        if (classifyHttpStatus(response.status) === "fatal") {
          return err(fatalFailure(message, response.status));
        }

        const rateLimited = response.status === 429;
        const retryAfterMs = rateLimited
          ? parseRetryAfterMs(response.headers.get("Retry-After"), now()) ??
            parseRetryAfterMsFromBody(body) ??
            parseRateLimitResetMs(response.headers.get("X-RateLimit-Reset"), now())
          : parseRetryAfterMs(response.headers.get("Retry-After"), now());

        if (rateLimited) {
          applyRateLimitPacing(response.headers);
        }

        return err(transientFailure(message, response.status, retryAfterMs, rateLimited));
      }
    }
  };
}
