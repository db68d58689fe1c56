import { randomUUID } from "node:crypto";

import type { CommitError } from "../errors";
import type { Result } from "../result";
import { err, ok } from "../result";
import type { RowOperation, TableSchema } from "../types";
import type { CursorStore, SyncSink } from "./capabilities";
import { maxCursor } from "./planner";

export interface BatchEmitterOptions {
  entityId: string;
  schema: TableSchema;
  sink: SyncSink;
  cursorStore: CursorStore;
  committedCursor: string | null;
  maxRows: number;
  maxAgeMs: number;
  now?: () => number;
  createBatchToken?: (entityId: string, sequence: number) => string;
}

export interface FlushOutcome {
  flushed: boolean;
  batchToken: string | null;
  rowCount: number;
  upserted: number;
  deleted: number;
  cursor: string | null;
}

export interface BatchEmitter {
  add: (operation: RowOperation) => void;
  isFlushDue: () => boolean;
  flush: (cursorCandidate: string | null) => Promise<Result<FlushOutcome, CommitError>>;
  pendingCount: () => number;
  committedCursor: () => string | null;
}

function defaultBatchToken(entityId: string, sequence: number): string {
  return `${entityId}:${sequence}:${randomUUID()}`;
}

/** Keeps the last operation per primary key, in first-seen key order. */
export function collapseOperations(operations: RowOperation[]): RowOperation[] {
  const byKey = new Map<string, RowOperation>();

  for (const operation of operations) {
    byKey.set(operation.primaryKey, operation);
  }

  return [...byKey.values()];
}

export function createBatchEmitter(options: BatchEmitterOptions): BatchEmitter {
  const now = options.now ?? Date.now;
  const createBatchToken = options.createBatchToken ?? defaultBatchToken;
  const maxRows = Math.max(1, options.maxRows);
  const maxAgeMs = Math.max(1, options.maxAgeMs);

  let buffer: RowOperation[] = [];
  let committed = options.committedCursor;
  let lastFlushAtMs = now();
  let sequence = 0;

  return {
    add(operation: RowOperation): void {
      buffer.push(operation);
    },

    isFlushDue(): boolean {
      if (buffer.length === 0) {
        return false;
      }

      return buffer.length >= maxRows || now() - lastFlushAtMs >= maxAgeMs;
    },

    async flush(cursorCandidate: string | null): Promise<Result<FlushOutcome, CommitError>> {
      const cursor = maxCursor(committed, cursorCandidate);

      if (buffer.length === 0 && cursor === committed) {
        lastFlushAtMs = now();
        return ok({
          flushed: false,
          batchToken: null,
          rowCount: 0,
          upserted: 0,
          deleted: 0,
          cursor: committed
        });
      }

      const pending = buffer;
      sequence += 1;
      const batchToken = createBatchToken(options.entityId, sequence);

      const written = await options.sink.writeBatch({
        entityId: options.entityId,
        batchToken,
        schema: options.schema,
        operations: collapseOperations(pending)
      });

      if (!written.ok) {
        return err(written.error);
      }

      const commit = await options.cursorStore.commit(options.entityId, cursor, batchToken);
      if (!commit.ok) {
        return err(commit.error);
      }

      buffer = buffer.slice(pending.length);
      committed = cursor;
      lastFlushAtMs = now();

      return ok({
        flushed: true,
        batchToken,
        rowCount: pending.length,
        upserted: written.value.upserted,
        deleted: written.value.deleted,
        cursor
      });
    },

    pendingCount(): number {
      return buffer.length;
    },

    committedCursor(): string | null {
      return committed;
    }
  };
}
