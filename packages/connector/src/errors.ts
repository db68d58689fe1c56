export interface FetchFailure {
  kind: "transient" | "fatal";
  message: string;
  status: number | null;
  retryAfterMs: number | null;
  rateLimited: boolean;
  retryCeilingExceeded?: boolean;
}

export interface MappingError {
  column: string | null;
  reason: string;
  record: unknown;
}

export interface CommitError {
  stage: "sink" | "cursor";
  message: string;
}

export type SyncErrorKind =
  | "fatal_fetch"
  | "mapping_threshold"
  | "commit"
  | "invalid_pagination"
  | "cancelled"
  | "unexpected";

export interface EntityErrorReport {
  entityId: string;
  errorKind: SyncErrorKind;
  message: string;
  lastGoodCursor: string | null;
}

export class SyncError extends Error {
  readonly kind: SyncErrorKind;

  constructor(kind: SyncErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SyncError";
    this.kind = kind;
  }
}

export class SyncCancelledError extends SyncError {
  constructor(reason = "Sync run cancelled") {
    super("cancelled", reason);
    this.name = "SyncCancelledError";
  }
}

export function transientFailure(
  message: string,
  status: number | null = null,
  retryAfterMs: number | null = null,
  rateLimited = false
): FetchFailure {
  return { kind: "transient", message, status, retryAfterMs, rateLimited };
}

export function fatalFailure(message: string, status: number | null = null): FetchFailure {
  return { kind: "fatal", message, status, retryAfterMs: null, rateLimited: false };
}

export function toSyncError(error: unknown): SyncError {
  if (error instanceof SyncError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new SyncError("unexpected", message, { cause: error });
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new SyncCancelledError(describeAbortReason(signal.reason));
  }
}

export function describeAbortReason(reason: unknown): string {
  if (reason instanceof Error && reason.message.length > 0) {
    return `Sync run cancelled: ${reason.message}`;
  }

  if (typeof reason === "string" && reason.length > 0) {
    return `Sync run cancelled: ${reason}`;
  }

  return "Sync run cancelled";
}
