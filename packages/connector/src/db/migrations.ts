import { readdir, readFile } from "node:fs/promises";
import path from "node:path";

import type { Pool } from "pg";

import type { Queryable } from "./cursorStore";

export interface MigrationFile {
  name: string;
  sql: string;
}

interface AppliedMigrationRow {
  name: string;
}

export const DEFAULT_MIGRATIONS_DIR = path.resolve(__dirname, "../../migrations");

const CREATE_MIGRATIONS_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS schema_migrations (
  name TEXT PRIMARY KEY,
  applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

const SELECT_APPLIED_SQL = `
SELECT name
FROM schema_migrations;
`;

const INSERT_APPLIED_SQL = `
INSERT INTO schema_migrations (name)
VALUES ($1);
`;

export async function discoverMigrations(migrationsDir: string): Promise<MigrationFile[]> {
  const files = await readdir(migrationsDir);
  const sqlFiles = files.filter((name) => name.endsWith(".sql")).sort();

  return Promise.all(
    sqlFiles.map(async (name) => ({
      name,
      sql: await readFile(path.join(migrationsDir, name), "utf8")
    }))
  );
}

export async function applyMigration(
  client: Queryable,
  migration: MigrationFile
): Promise<void> {
  await client.query("BEGIN");

  try {
    await client.query(migration.sql);
    await client.query(INSERT_APPLIED_SQL, [migration.name]);
    await client.query("COMMIT");
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  }
}

/** Applies pending migrations in lexical order and returns their names. */
export async function runMigrations(
  pool: Pick<Pool, "connect">,
  migrationsDir: string = DEFAULT_MIGRATIONS_DIR
): Promise<string[]> {
  const migrations = await discoverMigrations(migrationsDir);
  const client = await pool.connect();

  try {
    await client.query(CREATE_MIGRATIONS_TABLE_SQL);
    const result = await client.query<AppliedMigrationRow>(SELECT_APPLIED_SQL);
    const appliedNames = new Set(result.rows.map((row) => row.name));
    const appliedNow: string[] = [];

    for (const migration of migrations) {
      if (appliedNames.has(migration.name)) {
        continue;
      }

      await applyMigration(client, migration);
      appliedNames.add(migration.name);
      appliedNow.push(migration.name);
    }

    return appliedNow;
  } finally {
    client.release();
  }
}
