import { Pool } from "pg";

export function createPool(databaseUrl: string, max = 10): Pool {
  return new Pool({
    connectionString: databaseUrl,
    max,
    idleTimeoutMillis: 30_000
  });
}
