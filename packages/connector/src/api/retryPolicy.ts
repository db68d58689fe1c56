export type FailureClass = "transient" | "fatal";

export function classifyHttpStatus(statusCode: number): FailureClass {
  if (statusCode === 408 || statusCode === 429 || statusCode >= 500) {
    return "transient";
  }

  return "fatal";
}

export function parseRetryAfterMs(
  retryAfterHeader: string | null,
  nowMs: number
): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  const trimmed = retryAfterHeader.trim();

  if (trimmed.length === 0) {
    return null;
  }

  if (/^\d+$/.test(trimmed)) {
    const seconds = Number.parseInt(trimmed, 10);
    return Math.max(0, seconds * 1000);
  }

  const retryDateMs = Date.parse(trimmed);
  if (Number.isNaN(retryDateMs)) {
    return null;
  }

  return Math.max(0, retryDateMs - nowMs);
}

export function parseNumericHeaderValue(value: string | null): number | null {
  if (!value) {
    return null;
  }

  const numeric = Number(value.trim());
  if (Number.isNaN(numeric)) {
    return null;
  }

  return numeric;
}

/**
 * `X-RateLimit-Reset` shows up as delta seconds, epoch seconds, epoch
 * milliseconds or an HTTP date depending on the provider.
 */
export function parseRateLimitResetMs(
  value: string | null,
  nowMs: number
): number | null {
  const numeric = parseNumericHeaderValue(value);
  if (numeric === null) {
    return parseRetryAfterMs(value, nowMs);
  }

  if (numeric >= 1_000_000_000_000) {
    return Math.max(0, Math.floor(numeric - nowMs));
  }

  if (numeric >= 1_000_000_000) {
    return Math.max(0, Math.floor(numeric * 1000 - nowMs));
  }

  return Math.max(0, Math.floor(numeric * 1000));
}

function secondsToMs(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.max(0, Math.floor(value * 1000));
  }

  if (typeof value === "string" && value.trim().length > 0) {
    const asNumber = Number(value);
    if (!Number.isNaN(asNumber)) {
      return Math.max(0, Math.floor(asNumber * 1000));
    }
  }

  return null;
}

export function parseRetryAfterMsFromBody(body: string): number | null {
  if (!body) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }

  if (typeof parsed !== "object" || parsed === null || !("rateLimit" in parsed)) {
    return null;
  }

  const rateLimit = parsed.rateLimit;
  if (typeof rateLimit !== "object" || rateLimit === null) {
    return null;
  }

  const retryAfter = "retryAfter" in rateLimit ? secondsToMs(rateLimit.retryAfter) : null;
  if (retryAfter !== null) {
    return retryAfter;
  }

  return "reset" in rateLimit ? secondsToMs(rateLimit.reset) : null;
}

export function computeExponentialBackoffMs(
  retryAttempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  randomFn: () => number
): number {
  const base = Math.max(1, baseDelayMs);
  const max = Math.max(base, maxDelayMs);
  const exponential = Math.min(max, base * 2 ** Math.max(0, retryAttempt - 1));
  const jitterWindow = Math.floor(exponential * 0.2);
  const jitter = Math.floor(randomFn() * (jitterWindow + 1));

  return Math.min(max, exponential + jitter);
}
