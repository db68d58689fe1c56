import type { Pool, PoolClient } from "pg";

import type { CommitError } from "../errors";
import type { Result } from "../result";
import { err, ok } from "../result";
import type { SinkBatch, SinkWriteResult, SyncSink } from "../sync/capabilities";
import type { CellValue, ColumnType, RowOperation, TableSchema } from "../types";
import type { Queryable } from "./cursorStore";

export const MAX_OPERATIONS_PER_STATEMENT = 10000;

const RECORD_BATCH_SQL = `
INSERT INTO sync_batches (batch_token, entity_id, row_count)
VALUES ($1, $2, $3)
ON CONFLICT (batch_token) DO NOTHING;
`;

const POSTGRES_ARRAY_TYPES: Record<ColumnType, string> = {
  STRING: "text[]",
  INT: "bigint[]",
  DOUBLE: "double precision[]",
  BOOLEAN: "boolean[]",
  UTC_DATETIME: "timestamptz[]",
  NAIVE_DATE: "date[]",
  JSON: "jsonb[]"
};

export interface Statement {
  sql: string;
  values: unknown[];
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function columnArrays(
  operations: RowOperation[],
  columns: string[],
  source: "key" | "values"
): CellValue[][] {
  return columns.map((column) =>
    operations.map((operation) => operation[source][column] ?? null)
  );
}

function unnestList(schema: TableSchema, columns: string[]): string {
  return columns
    .map((column, index) => `$${index + 1}::${POSTGRES_ARRAY_TYPES[schema.columns[column].type]}`)
    .join(", ");
}

export function buildUpsertStatement(
  schema: TableSchema,
  operations: RowOperation[]
): Statement {
  if (operations.length === 0) {
    throw new Error("Cannot build upsert statement for empty batch");
  }

  const columns = Object.keys(schema.columns);
  const quoted = columns.map(quoteIdentifier);
  const keyColumns = new Set(schema.primaryKey);
  const updates = columns
    .filter((column) => !keyColumns.has(column))
    .map((column) => `${quoteIdentifier(column)} = EXCLUDED.${quoteIdentifier(column)}`);
  const conflictAction =
    updates.length > 0 ? `DO UPDATE SET ${updates.join(", ")}` : "DO NOTHING";

  return {
    sql: `
INSERT INTO ${quoteIdentifier(schema.table)} (${quoted.join(", ")})
SELECT ${quoted.join(", ")}
FROM UNNEST(${unnestList(schema, columns)}) AS rows(${quoted.join(", ")})
ON CONFLICT (${schema.primaryKey.map(quoteIdentifier).join(", ")}) ${conflictAction};
`,
    values: columnArrays(operations, columns, "values")
  };
}

export function buildDeleteStatement(
  schema: TableSchema,
  operations: RowOperation[]
): Statement {
  if (operations.length === 0) {
    throw new Error("Cannot build delete statement for empty batch");
  }

  const keyColumns = schema.primaryKey;
  const quoted = keyColumns.map(quoteIdentifier);
  const matches = quoted
    .map((column) => `target.${column} = doomed.${column}`)
    .join(" AND ");

  return {
    sql: `
DELETE FROM ${quoteIdentifier(schema.table)} AS target
USING UNNEST(${unnestList(schema, keyColumns)}) AS doomed(${quoted.join(", ")})
WHERE ${matches};
`,
    values: columnArrays(operations, keyColumns, "key")
  };
}

async function runChunked(
  client: Queryable,
  schema: TableSchema,
  operations: RowOperation[],
  build: (schema: TableSchema, chunk: RowOperation[]) => Statement
): Promise<number> {
  let affected = 0;

  for (let index = 0; index < operations.length; index += MAX_OPERATIONS_PER_STATEMENT) {
    const chunk = operations.slice(index, index + MAX_OPERATIONS_PER_STATEMENT);
    const statement = build(schema, chunk);
    const result = await client.query(statement.sql, statement.values);
    affected += result.rowCount ?? 0;
  }

  return affected;
}

/**
 * Applies one batch and records its token in the same transaction. Expects
 * at most one operation per primary key.
 */
export async function writeBatchWithClient(
  client: Queryable,
  batch: SinkBatch
): Promise<SinkWriteResult> {
  const upserts = batch.operations.filter((operation) => operation.kind === "upsert");
  const deletes = batch.operations.filter((operation) => operation.kind === "delete");

  await client.query("BEGIN");

  try {
    const upserted = await runChunked(client, batch.schema, upserts, buildUpsertStatement);
    const deleted = await runChunked(client, batch.schema, deletes, buildDeleteStatement);

    await client.query(RECORD_BATCH_SQL, [
      batch.batchToken,
      batch.entityId,
      batch.operations.length
    ]);
    await client.query("COMMIT");

    return { upserted, deleted };
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  }
}

export function createPostgresSink(pool: Pool): SyncSink {
  return {
    async writeBatch(batch: SinkBatch): Promise<Result<SinkWriteResult, CommitError>> {
      let client: PoolClient | null = null;

      try {
        client = await pool.connect();
        return ok(await writeBatchWithClient(client, batch));
      } catch (error) {
        return err({
          stage: "sink",
          message: error instanceof Error ? error.message : String(error)
        });
      } finally {
        client?.release();
      }
    }
  };
}
