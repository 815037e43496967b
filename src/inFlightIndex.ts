import pg from "pg";
import { getPool } from "./db.js";
import { withRetry } from "./resilience.js";

export type Lane = "default" | "stream";

export interface InFlightEntry {
  idempotencyKey: string;
  sessionId: string;
  taskType: string;
  lane: Lane;
  /** Session version the task was submitted against. */
  baseVersion: number;
  acquiredAt: string;
}

export type AcquireResult =
  | { acquired: true }
  | { acquired: false; holder: InFlightEntry | null };

/**
 * Single-flight table: at most one entry per (sessionId, taskType) and per
 * idempotency key. `tryAcquire` is an atomic check-and-set so concurrent
 * submissions (from any replica) cannot both win.
 */
export interface InFlightIndex {
  tryAcquire(entry: InFlightEntry): Promise<AcquireResult>;
  get(idempotencyKey: string): Promise<InFlightEntry | null>;
  /** Returns false when the key was not held (already released). */
  release(idempotencyKey: string): Promise<boolean>;
  listBySession(sessionId: string): Promise<InFlightEntry[]>;
}

interface InFlightRow {
  idempotency_key: string;
  session_id: string;
  task_type: string;
  lane: string;
  base_version: string | number;
  acquired_at: Date | string;
}

function toEntry(row: InFlightRow): InFlightEntry {
  return {
    idempotencyKey: row.idempotency_key,
    sessionId: row.session_id,
    taskType: row.task_type,
    lane: row.lane === "stream" ? "stream" : "default",
    baseVersion: Number(row.base_version),
    acquiredAt: row.acquired_at instanceof Date ? row.acquired_at.toISOString() : String(row.acquired_at),
  };
}

const READ_RETRY = { maxRetries: 2, backoffMs: 50, maxBackoffMs: 500 };

const SELECT_COLUMNS = "idempotency_key, session_id, task_type, lane, base_version, acquired_at";

export class PgInFlightIndex implements InFlightIndex {
  constructor(private readonly pool?: pg.Pool) {}

  private p(): pg.Pool {
    return this.pool ?? getPool();
  }

  async tryAcquire(entry: InFlightEntry): Promise<AcquireResult> {
    // No conflict target: both the key and the (session, task type) pair are unique.
    const res = await this.p().query(
      `INSERT INTO agent_task_inflight (idempotency_key, session_id, task_type, lane, base_version, acquired_at)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT DO NOTHING
       RETURNING idempotency_key`,
      [entry.idempotencyKey, entry.sessionId, entry.taskType, entry.lane, entry.baseVersion, entry.acquiredAt],
    );
    if ((res.rowCount ?? 0) > 0) return { acquired: true };
    const holder = await this.p().query<InFlightRow>(
      `SELECT ${SELECT_COLUMNS} FROM agent_task_inflight
       WHERE (session_id = $1 AND task_type = $2) OR idempotency_key = $3
       LIMIT 1`,
      [entry.sessionId, entry.taskType, entry.idempotencyKey],
    );
    return { acquired: false, holder: holder.rows[0] ? toEntry(holder.rows[0]) : null };
  }

  async get(idempotencyKey: string): Promise<InFlightEntry | null> {
    const res = await withRetry(
      () =>
        this.p().query<InFlightRow>(`SELECT ${SELECT_COLUMNS} FROM agent_task_inflight WHERE idempotency_key = $1`, [
          idempotencyKey,
        ]),
      READ_RETRY,
    );
    return res.rows[0] ? toEntry(res.rows[0]) : null;
  }

  async release(idempotencyKey: string): Promise<boolean> {
    const res = await this.p().query(
      "DELETE FROM agent_task_inflight WHERE idempotency_key = $1",
      [idempotencyKey],
    );
    return (res.rowCount ?? 0) > 0;
  }

  async listBySession(sessionId: string): Promise<InFlightEntry[]> {
    const res = await withRetry(
      () =>
        this.p().query<InFlightRow>(
          `SELECT ${SELECT_COLUMNS} FROM agent_task_inflight WHERE session_id = $1 ORDER BY acquired_at`,
          [sessionId],
        ),
      READ_RETRY,
    );
    return res.rows.map(toEntry);
  }
}
