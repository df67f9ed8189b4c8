/**
 * PostgreSQL database connection and helpers.
 * Uses a connection pool, created on first use so file-backed runs never open one.
 */

import "dotenv/config";
import pg from "pg";
import type { QueryResultRow } from "pg";

// ─── Config ─────────────────────────────────────────────────────────────────

let pool: pg.Pool | null = null;

/** Signature shared by `query` and test doubles. Rows are untyped; callers validate them. */
export type QueryFn = (text: string, values?: unknown[]) => Promise<QueryResultRow[]>;

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Get the shared connection pool, creating it from DATABASE_URL on first call.
 * Prefer using `query` for one-off queries.
 */
export function getPool(): pg.Pool {
  pool ??= new pg.Pool({
    connectionString: process.env.DATABASE_URL,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });
  return pool;
}

/**
 * Run a parameterized query and return all rows.
 */
export const query: QueryFn = async (text, values) => {
  const { rows } = await getPool().query(text, values);
  return rows;
};

/**
 * Get a client from the pool. Remember to release it
 * (e.g. with try/finally client.release()).
 */
export async function getClient(): Promise<pg.PoolClient> {
  return getPool().connect();
}

/**
 * Close the pool if one was opened. Call on app shutdown; safe to call twice.
 */
export async function close(): Promise<void> {
  if (!pool) return;
  const closing = pool;
  pool = null;
  await closing.end();
}
