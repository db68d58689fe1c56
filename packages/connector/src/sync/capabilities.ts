import type { CommitError, FetchFailure } from "../errors";
import type { Result } from "../result";
import type { CursorState, Page, PageRequest, RowOperation, TableSchema } from "../types";

export type FetchResult = Result<Page, FetchFailure>;

export interface PageFetcher {
  fetchPage: (request: PageRequest, signal?: AbortSignal) => Promise<FetchResult>;
}

export interface SinkBatch {
  entityId: string;
  batchToken: string;
  schema: TableSchema;
  operations: RowOperation[];
}

export interface SinkWriteResult {
  upserted: number;
  deleted: number;
}

/**
 * Persists a batch transactionally and records `batchToken` so the cursor
 * store can verify the data landed before moving the cursor.
 */
export interface SyncSink {
  writeBatch: (batch: SinkBatch) => Promise<Result<SinkWriteResult, CommitError>>;
}

export interface CursorStore {
  load: (entityId: string) => Promise<CursorState>;
  commit: (
    entityId: string,
    cursor: string | null,
    batchToken: string
  ) => Promise<Result<CursorState, CommitError>>;
}

export function initialCursorState(entityId: string): CursorState {
  return {
    entityId,
    value: null,
    batchToken: null,
    rowsCommitted: 0,
    updatedAt: null
  };
}
