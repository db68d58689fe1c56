import type { Pool, PoolClient, QueryResult, QueryResultRow } from "pg";

import type { CommitError } from "../errors";
import type { Result } from "../result";
import { err, ok } from "../result";
import { type CursorStore, initialCursorState } from "../sync/capabilities";
import type { CursorState } from "../types";

interface CursorRow {
  entity_id: string;
  cursor: string | null;
  batch_token: string | null;
  rows_committed: string;
  updated_at: Date;
}

interface BatchRow {
  row_count: number;
}

export interface Queryable {
  query: <R extends QueryResultRow>(
    text: string,
    values?: unknown[]
  ) => Promise<QueryResult<R>>;
}

const SELECT_CURSOR_SQL = `
SELECT entity_id, cursor, batch_token, rows_committed, updated_at
FROM sync_cursors
WHERE entity_id = $1;
`;

const ENSURE_CURSOR_ROW_SQL = `
INSERT INTO sync_cursors (entity_id)
VALUES ($1)
ON CONFLICT (entity_id) DO NOTHING;
`;

const LOCK_CURSOR_SQL = `
SELECT entity_id, cursor, batch_token, rows_committed, updated_at
FROM sync_cursors
WHERE entity_id = $1
FOR UPDATE;
`;

const SELECT_BATCH_SQL = `
SELECT row_count
FROM sync_batches
WHERE batch_token = $1 AND entity_id = $2;
`;

const ADVANCE_CURSOR_SQL = `
UPDATE sync_cursors
SET
  cursor = $2,
  batch_token = $3,
  rows_committed = rows_committed + $4,
  updated_at = NOW()
WHERE entity_id = $1
RETURNING entity_id, cursor, batch_token, rows_committed, updated_at;
`;

function rowToCursorState(row: CursorRow): CursorState {
  return {
    entityId: row.entity_id,
    value: row.cursor,
    batchToken: row.batch_token,
    rowsCommitted: Number.parseInt(row.rows_committed, 10),
    updatedAt: row.updated_at.toISOString()
  };
}

export async function loadCursor(runner: Queryable, entityId: string): Promise<CursorState> {
  const result = await runner.query<CursorRow>(SELECT_CURSOR_SQL, [entityId]);

  if (result.rowCount !== 1) {
    return initialCursorState(entityId);
  }

  return rowToCursorState(result.rows[0]);
}

/**
 * Moves the cursor inside one transaction. The row lock serializes commits
 * for the entity; the batch lookup keeps the cursor from getting ahead of
 * data the sink has not recorded.
 */
export async function commitCursorWithClient(
  client: Queryable,
  entityId: string,
  cursor: string | null,
  batchToken: string
): Promise<CursorState> {
  await client.query("BEGIN");

  try {
    await client.query(ENSURE_CURSOR_ROW_SQL, [entityId]);
    const locked = await client.query<CursorRow>(LOCK_CURSOR_SQL, [entityId]);
    const current = locked.rows[0]?.cursor ?? null;

    if (current !== null && (cursor === null || cursor < current)) {
      throw new Error(
        `Checkpoint rejected: cursor would regress from ${current} to ${cursor ?? "null"}`
      );
    }

    const batch = await client.query<BatchRow>(SELECT_BATCH_SQL, [batchToken, entityId]);
    if (batch.rowCount !== 1) {
      throw new Error(
        `Checkpoint rejected: batch ${batchToken} was not persisted for ${entityId}`
      );
    }

    const updated = await client.query<CursorRow>(ADVANCE_CURSOR_SQL, [
      entityId,
      cursor,
      batchToken,
      batch.rows[0].row_count
    ]);

    if (updated.rowCount !== 1) {
      throw new Error(`failed to advance cursor for ${entityId}`);
    }

    await client.query("COMMIT");
    return rowToCursorState(updated.rows[0]);
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  }
}

export function createPostgresCursorStore(pool: Pool): CursorStore {
  return {
    async load(entityId: string): Promise<CursorState> {
      return loadCursor(pool, entityId);
    },

    async commit(
      entityId: string,
      cursor: string | null,
      batchToken: string
    ): Promise<Result<CursorState, CommitError>> {
      let client: PoolClient | null = null;

      try {
        client = await pool.connect();
        return ok(await commitCursorWithClient(client, entityId, cursor, batchToken));
      } catch (error) {
        return err({
          stage: "cursor",
          message: error instanceof Error ? error.message : String(error)
        });
      } finally {
        client?.release();
      }
    }
  };
}
