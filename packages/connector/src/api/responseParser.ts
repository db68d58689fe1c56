import { coerceTimestamp } from "../mapping/coerce";
import type { Page } from "../types";

interface RecordLike {
  [key: string]: unknown;
}

function isRecordLike(value: unknown): value is RecordLike {
  return typeof value === "object" && value !== null;
}

function readRecords(payload: RecordLike): unknown {
  if (Array.isArray(payload.observations)) {
    return payload.observations;
  }

  if (Array.isArray(payload.data)) {
    return payload.data;
  }

  return payload.observations ?? payload.data;
}

function readContinuationToken(payload: RecordLike): unknown {
  const pagination = isRecordLike(payload.pagination) ? payload.pagination : null;

  return (
    payload.next_page_token ??
    payload.nextPageToken ??
    pagination?.next_page_token ??
    pagination?.nextPageToken ??
    null
  );
}

function readWatermark(payload: RecordLike): string | null {
  const candidate = payload.watermark ?? payload.complete_through ?? null;

  if (candidate === null) {
    return null;
  }

  const parsed = coerceTimestamp(candidate);
  if (!parsed.ok) {
    throw new Error(`Invalid observations response: ${parsed.error} in watermark`);
  }

  return parsed.value;
}

/**
 * Validates the page envelope only. Individual records stay raw so that a
 * bad record costs one row, not the page.
 */
export function parseObservationsPage(payload: unknown): Page {
  if (!isRecordLike(payload)) {
    throw new Error("Invalid observations response: expected object");
  }

  const records = readRecords(payload);
  if (!Array.isArray(records)) {
    throw new Error("Invalid observations response: observations must be an array");
  }

  const token = readContinuationToken(payload);
  if (!(typeof token === "string" || token === null)) {
    throw new Error(
      "Invalid observations response: next_page_token must be string or null"
    );
  }

  return {
    records,
    continuationToken: token !== null && token.length > 0 ? token : null,
    watermark: readWatermark(payload)
  };
}
