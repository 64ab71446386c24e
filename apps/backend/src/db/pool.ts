import pg from "pg";
import type { Env } from "../config/env.js";

const { Pool, types } = pg;

const DATE_OID = 1082;
const NUMERIC_OID = 1700;

// DATE columns stay as YYYY-MM-DD strings; NUMERIC money columns come back as numbers.
types.setTypeParser(DATE_OID, (value: string) => value);
types.setTypeParser(NUMERIC_OID, (value: string) => Number.parseFloat(value));

export function createPool(env: Env): pg.Pool {
  return new Pool({
    connectionString: env.db_connection_string,
    ssl: env.DB_SSL ? { rejectUnauthorized: false } : undefined,
    max: env.DB_POOL_MAX,
    idleTimeoutMillis: 30_000,
  });
}

export async function withClient<T>(
  pool: pg.Pool,
  fn: (client: pg.PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    return await fn(client);
  } finally {
    client.release();
  }
}
