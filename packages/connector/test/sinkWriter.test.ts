import { describe, expect, it, vi } from "vitest";

import {
  buildDeleteStatement,
  buildUpsertStatement,
  createPostgresSink,
  quoteIdentifier,
  writeBatchWithClient
} from "../src/db/sinkWriter";
import { hourlyObservationsSchema } from "../src/mapping/weatherSchema";
import type { TableSchema } from "../src/types";
import { observationOperation } from "./helpers";

const at = "2026-01-01T00:00:00.000Z";
const entityId = "hourly_observations:oslo";

describe("quoteIdentifier", () => {
  it("doubles embedded quotes", () => {
    expect(quoteIdentifier('we"ird')).toBe('"we""ird"');
  });
});

describe("buildUpsertStatement", () => {
  it("builds an UNNEST upsert with one typed array per column", () => {
    const statement = buildUpsertStatement(hourlyObservationsSchema, [
      observationOperation(at, 4.5)
    ]);

    expect(statement.sql).toContain(
      "FROM UNNEST($1::text[], $2::timestamptz[], $3::double precision[], $4::double precision[], $5::double precision[], $6::double precision[], $7::text[])"
    );
    expect(statement.sql).toContain(
      'ON CONFLICT ("location_id", "observed_at") DO UPDATE SET "temperature_c" = EXCLUDED."temperature_c"'
    );
    expect(statement.values).toEqual([["oslo"], [at], [4.5], [null], [null], [null], [null]]);
  });

  it("does nothing on conflict when every column is part of the key", () => {
    const keyOnly: TableSchema = {
      table: "station_days",
      primaryKey: ["station", "day"],
      orderingColumn: "day",
      columns: {
        station: { type: "STRING", nullable: false },
        day: { type: "NAIVE_DATE", nullable: false }
      }
    };

    const statement = buildUpsertStatement(keyOnly, [
      {
        kind: "upsert",
        primaryKey: '["oslo","2026-01-01"]',
        key: { station: "oslo", day: "2026-01-01" },
        values: { station: "oslo", day: "2026-01-01" },
        orderingValue: "2026-01-01"
      }
    ]);

    expect(statement.sql).toContain('ON CONFLICT ("station", "day") DO NOTHING');
    expect(statement.sql).toContain("$2::date[]");
  });

  it("rejects empty batches", () => {
    expect(() => buildUpsertStatement(hourlyObservationsSchema, [])).toThrow(
      "Cannot build upsert statement for empty batch"
    );
  });
});

describe("buildDeleteStatement", () => {
  it("deletes by primary key through UNNEST", () => {
    const statement = buildDeleteStatement(hourlyObservationsSchema, [
      observationOperation(at, null, "delete")
    ]);

    expect(statement.sql).toContain('DELETE FROM "hourly_observations" AS target');
    expect(statement.sql).toContain(
      'USING UNNEST($1::text[], $2::timestamptz[]) AS doomed("location_id", "observed_at")'
    );
    expect(statement.sql).toContain(
      'WHERE target."location_id" = doomed."location_id" AND target."observed_at" = doomed."observed_at"'
    );
    expect(statement.values).toEqual([["oslo"], [at]]);
  });
});

describe("writeBatchWithClient", () => {
  it("applies upserts and deletes and records the batch in one transaction", async () => {
    const query = vi.fn(async (text: string) => {
      if (text === "BEGIN" || text === "COMMIT") {
        return { rowCount: null, rows: [] };
      }

      if (text.includes('INSERT INTO "hourly_observations"') || text.includes("DELETE FROM")) {
        return { rowCount: 1, rows: [] };
      }

      if (text.includes("INSERT INTO sync_batches")) {
        return { rowCount: 1, rows: [] };
      }

      throw new Error(`Unexpected SQL: ${text}`);
    });

    const result = await writeBatchWithClient({ query, release: vi.fn() } as never, {
      entityId,
      batchToken: "batch-1",
      schema: hourlyObservationsSchema,
      operations: [
        observationOperation(at, 3),
        observationOperation("2026-01-01T01:00:00.000Z", null, "delete")
      ]
    });

    expect(result).toEqual({ upserted: 1, deleted: 1 });
    expect(query).toHaveBeenNthCalledWith(1, "BEGIN");
    expect(query).toHaveBeenNthCalledWith(
      2,
      expect.stringContaining('INSERT INTO "hourly_observations"'),
      expect.any(Array)
    );
    expect(query).toHaveBeenNthCalledWith(3, expect.stringContaining("DELETE FROM"), expect.any(Array));
    expect(query).toHaveBeenNthCalledWith(4, expect.stringContaining("INSERT INTO sync_batches"), [
      "batch-1",
      entityId,
      2
    ]);
    expect(query).toHaveBeenNthCalledWith(5, "COMMIT");
  });

  it("records an empty batch so a cursor-only checkpoint can commit", async () => {
    const query = vi.fn(async () => ({ rowCount: null, rows: [] }));

    const result = await writeBatchWithClient({ query } as never, {
      entityId,
      batchToken: "batch-2",
      schema: hourlyObservationsSchema,
      operations: []
    });

    expect(result).toEqual({ upserted: 0, deleted: 0 });
    expect(query).toHaveBeenCalledTimes(3);
    expect(query).toHaveBeenNthCalledWith(2, expect.stringContaining("INSERT INTO sync_batches"), [
      "batch-2",
      entityId,
      0
    ]);
  });

  it("rolls back on errors", async () => {
    const query = vi.fn(async (text: string) => {
      if (text.includes('INSERT INTO "hourly_observations"')) {
        throw new Error("insert failed");
      }

      return { rowCount: null, rows: [] };
    });

    await expect(
      writeBatchWithClient({ query } as never, {
        entityId,
        batchToken: "batch-3",
        schema: hourlyObservationsSchema,
        operations: [observationOperation(at)]
      })
    ).rejects.toThrow("insert failed");
    expect(query).toHaveBeenLastCalledWith("ROLLBACK");
  });
});

describe("createPostgresSink", () => {
  it("reports failures as sink commit errors and releases the client", async () => {
    const release = vi.fn();
    const pool = {
      connect: vi.fn(async () => ({
        query: vi.fn(async (text: string) => {
          if (text === "BEGIN" || text === "ROLLBACK") {
            return { rowCount: null, rows: [] };
          }
          throw new Error("connection reset");
        }),
        release
      }))
    };

    const result = await createPostgresSink(pool as never).writeBatch({
      entityId,
      batchToken: "batch-4",
      schema: hourlyObservationsSchema,
      operations: [observationOperation(at)]
    });

    expect(result).toEqual({ ok: false, error: { stage: "sink", message: "connection reset" } });
    expect(release).toHaveBeenCalledOnce();
  });
});
