import type { CommitError } from "../errors";
import type { Result } from "../result";
import { err, ok } from "../result";
import type { CellValue, CursorState } from "../types";
import {
  type CursorStore,
  type SinkBatch,
  type SinkWriteResult,
  type SyncSink,
  initialCursorState
} from "../sync/capabilities";

export interface MemorySyncStore {
  sink: SyncSink;
  cursorStore: CursorStore;
  rows: (table: string) => Array<Record<string, CellValue>>;
  batches: () => Array<{ batchToken: string; entityId: string; rowCount: number }>;
}

/**
 * In-process sink and cursor store sharing one batch ledger, used for dry
 * runs (`SINK_MODE=memory`) and as the tests' stand-in for PostgreSQL.
 */
export function createMemorySyncStore(now: () => number = Date.now): MemorySyncStore {
  const tables = new Map<string, Map<string, Record<string, CellValue>>>();
  const batchLedger = new Map<string, { entityId: string; rowCount: number }>();
  const cursors = new Map<string, CursorState>();
  const commitQueues = new Map<string, Promise<unknown>>();

  const tableRows = (table: string): Map<string, Record<string, CellValue>> => {
    let rows = tables.get(table);
    if (!rows) {
      rows = new Map();
      tables.set(table, rows);
    }
    return rows;
  };

  const serialize = <T>(entityId: string, work: () => T): Promise<T> => {
    const previous = commitQueues.get(entityId) ?? Promise.resolve();
    const next = previous.then(work, work);
    commitQueues.set(entityId, next);
    return next;
  };

  const applyCommit = (
    entityId: string,
    cursor: string | null,
    batchToken: string
  ): Result<CursorState, CommitError> => {
    const batch = batchLedger.get(batchToken);
    if (!batch || batch.entityId !== entityId) {
      return err({
        stage: "cursor",
        message: `Checkpoint rejected: batch ${batchToken} was not persisted for ${entityId}`
      });
    }

    const current = cursors.get(entityId) ?? initialCursorState(entityId);
    if (current.value !== null && (cursor === null || cursor < current.value)) {
      return err({
        stage: "cursor",
        message: `Checkpoint rejected: cursor would regress from ${current.value} to ${cursor ?? "null"}`
      });
    }

    const next: CursorState = {
      entityId,
      value: cursor,
      batchToken,
      rowsCommitted: current.rowsCommitted + batch.rowCount,
      updatedAt: new Date(now()).toISOString()
    };
    cursors.set(entityId, next);
    return ok(next);
  };

  const sink: SyncSink = {
    async writeBatch(batch: SinkBatch): Promise<Result<SinkWriteResult, CommitError>> {
      const rows = tableRows(batch.schema.table);
      let upserted = 0;
      let deleted = 0;

      for (const operation of batch.operations) {
        if (operation.kind === "delete") {
          if (rows.delete(operation.primaryKey)) {
            deleted += 1;
          }
          continue;
        }

        rows.set(operation.primaryKey, { ...operation.values });
        upserted += 1;
      }

      batchLedger.set(batch.batchToken, {
        entityId: batch.entityId,
        rowCount: batch.operations.length
      });

      return ok({ upserted, deleted });
    }
  };

  const cursorStore: CursorStore = {
    async load(entityId: string): Promise<CursorState> {
      return cursors.get(entityId) ?? initialCursorState(entityId);
    },
    commit(entityId, cursor, batchToken) {
      return serialize(entityId, () => applyCommit(entityId, cursor, batchToken));
    }
  };

  return {
    sink,
    cursorStore,
    rows: (table: string) => [...tableRows(table).values()],
    batches: () =>
      [...batchLedger.entries()].map(([batchToken, batch]) => ({ batchToken, ...batch }))
  };
}
