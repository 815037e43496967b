import pg from "pg";
import { logger } from "./logger.js";
import { toErrorString } from "./errors.js";

const { Pool } = pg;

let _pool: pg.Pool | null = null;

/**
 * Shared Postgres pool for the process. Modules accept an optional pool so
 * tests can pass a fake; everything else goes through this one.
 */
export function getPool(): pg.Pool {
  if (!_pool) {
    const url = process.env.DATABASE_URL;
    if (!url) throw new Error("DATABASE_URL is required");
    _pool = new Pool({
      connectionString: url,
      max: 15,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
      options: "-c statement_timeout=30000",
    });
    _pool.on("error", (err) => {
      logger.error("pool error (connection lost; new queries may reconnect)", { error: toErrorString(err) });
    });
  }
  return _pool;
}

/** Drain and close the pool during shutdown. Safe to call twice. */
export async function drainPool(): Promise<void> {
  if (_pool) {
    const p = _pool;
    _pool = null;
    await p.end();
  }
}

/**
 * Run `fn` inside a transaction with ROLLBACK on error and connection release
 * in all cases. Errors from `fn` are rethrown unchanged so callers can still
 * match on their type.
 */
export async function runInTransaction<T>(
  fn: (client: pg.PoolClient) => Promise<T>,
  pool?: pg.Pool,
): Promise<T> {
  const p = pool ?? getPool();
  const client = await p.connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (e) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackErr) {
      logger.warn("rollback failed", { error: toErrorString(rollbackErr) });
    }
    throw e;
  } finally {
    client.release();
  }
}
