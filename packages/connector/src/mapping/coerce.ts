import type { Result } from "../result";
import { err, ok } from "../result";

export type Coerced<T> = Result<T, string>;

// 1e8 epoch seconds is 1973-03-03; anything smaller is not a plausible timestamp.
const MIN_EPOCH_MAGNITUDE = 1e8;

const ZONELESS_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

function toIsoDateFromEpoch(value: number): string | null {
  if (!Number.isFinite(value)) {
    return null;
  }

  const abs = Math.abs(value);
  if (abs < MIN_EPOCH_MAGNITUDE) {
    return null;
  }

  let millis = value;

  if (abs >= 1e17) {
    millis = value / 1_000_000;
  } else if (abs >= 1e14) {
    millis = value / 1_000;
  } else if (abs < 1e11) {
    millis = value * 1_000;
  }

  const date = new Date(millis);
  if (Number.isNaN(date.getTime())) {
    return null;
  }

  return date.toISOString();
}

export function isBlank(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    (typeof value === "string" && value.trim().length === 0)
  );
}

/**
 * Accepts ISO strings, HTTP dates and epoch seconds/ms/µs/ns, as numbers or
 * numeric strings. An ISO date-time without an offset is read as UTC.
 */
export function coerceTimestamp(value: unknown): Coerced<string> {
  if (typeof value === "number") {
    const iso = toIsoDateFromEpoch(value);
    return iso === null ? err(`invalid epoch timestamp ${value}`) : ok(iso);
  }

  if (typeof value !== "string") {
    return err(`expected timestamp, got ${typeof value}`);
  }

  const trimmed = value.trim();
  const numericCandidate = Number(trimmed);
  if (trimmed.length > 0 && !Number.isNaN(numericCandidate)) {
    const iso = toIsoDateFromEpoch(numericCandidate);
    return iso === null ? err(`invalid epoch timestamp ${trimmed}`) : ok(iso);
  }

  const zoneless = ZONELESS_DATE_TIME.exec(trimmed);
  const parsed = Date.parse(zoneless ? `${zoneless[1]}T${zoneless[2]}Z` : trimmed);
  if (Number.isNaN(parsed)) {
    return err(`unparseable timestamp "${trimmed}"`);
  }

  return ok(new Date(parsed).toISOString());
}

export function coerceNaiveDate(value: unknown): Coerced<string> {
  if (typeof value === "string" && /^\d{4}-\d{2}-\d{2}$/.test(value.trim())) {
    const trimmed = value.trim();
    const parsed = Date.parse(`${trimmed}T00:00:00.000Z`);
    if (!Number.isNaN(parsed) && new Date(parsed).toISOString().startsWith(trimmed)) {
      return ok(trimmed);
    }
  }

  const timestamp = coerceTimestamp(value);
  if (!timestamp.ok) {
    return err(`unparseable date "${String(value)}"`);
  }

  return ok(timestamp.value.slice(0, 10));
}

export function coerceNumber(value: unknown): Coerced<number> {
  if (typeof value === "number") {
    return Number.isFinite(value) ? ok(value) : err(`non-finite number ${value}`);
  }

  if (typeof value === "string") {
    const parsed = Number(value.trim());
    if (value.trim().length > 0 && Number.isFinite(parsed)) {
      return ok(parsed);
    }
  }

  return err(`expected number, got ${JSON.stringify(value)}`);
}

export function coerceInteger(value: unknown): Coerced<number> {
  const numeric = coerceNumber(value);
  if (!numeric.ok) {
    return numeric;
  }

  if (!Number.isInteger(numeric.value)) {
    return err(`expected integer, got ${numeric.value}`);
  }

  return numeric;
}

export function coerceBoolean(value: unknown): Coerced<boolean> {
  if (typeof value === "boolean") {
    return ok(value);
  }

  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true") {
      return ok(true);
    }
    if (normalized === "false") {
      return ok(false);
    }
  }

  if (typeof value === "number") {
    if (value === 1) {
      return ok(true);
    }
    if (value === 0) {
      return ok(false);
    }
  }

  return err(`expected boolean, got ${JSON.stringify(value)}`);
}

export function coerceString(value: unknown): Coerced<string> {
  if (typeof value === "string") {
    return ok(value);
  }

  if (typeof value === "number" || typeof value === "boolean") {
    return ok(String(value));
  }

  return err(`expected string, got ${typeof value}`);
}

export function coerceJson(value: unknown): Coerced<string> {
  try {
    return ok(JSON.stringify(value));
  } catch (error) {
    return err(error instanceof Error ? error.message : "value is not serializable");
  }
}
