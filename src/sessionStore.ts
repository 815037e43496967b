import pg from "pg";
import { getPool, runInTransaction } from "./db.js";
import { SessionNotFoundError, UnknownRequestError, VersionConflictError } from "./errors.js";
import type { InFlightEntry } from "./inFlightIndex.js";
import { withRetry } from "./resilience.js";
import { sessionStateSchema, type SessionState } from "./sessionState.js";

/**
 * Sole writer of record for session snapshots. Every write is a
 * compare-and-swap on `version`; readers only ever get whole snapshots.
 */
export interface SessionStore {
  /** Insert a new session at version 1 and return `state` itself; returns the stored snapshot instead if the id is taken. */
  init(state: SessionState): Promise<SessionState>;
  get(sessionId: string): Promise<SessionState | null>;
  /** Historical snapshot; used to see what an in-flight task was computed against. */
  getAtVersion(sessionId: string, version: number): Promise<SessionState | null>;
  /**
   * Persist `next` only if the head is still at `expectedVersion`.
   * Throws VersionConflictError otherwise, SessionNotFoundError for an unknown id.
   * With `claim`, the task's in-flight marker is removed in the same write;
   * when that marker is already gone (cancelled, or re-acquired by a newer run)
   * nothing is written and UnknownRequestError is thrown.
   */
  commit(next: SessionState, expectedVersion: number, claim?: InFlightEntry): Promise<SessionState>;
}

export function assertNextVersion(next: SessionState, expectedVersion: number): void {
  if (next.version !== expectedVersion + 1) {
    throw new Error(
      `commit for ${next.sessionId} must carry version ${expectedVersion + 1}, got ${next.version}`,
    );
  }
}

/* ---- Postgres-backed persistence ---- */

/** Reads are idempotent, so dropped connections and failovers are retried. Writes are not. */
const READ_RETRY = { maxRetries: 2, backoffMs: 50, maxBackoffMs: 500 };

const SCHEMA_REQUIRED_MSG =
  "Table research_sessions does not exist. Run schema migrations first (npm run ensure-schema).";

function parseState(raw: unknown): SessionState {
  const value = typeof raw === "string" ? (JSON.parse(raw) as unknown) : raw;
  return sessionStateSchema.parse(value);
}

export class PgSessionStore implements SessionStore {
  private tableEnsured = false;

  constructor(private readonly pool?: pg.Pool) {}

  private p(): pg.Pool {
    return this.pool ?? getPool();
  }

  private async ensureTables(): Promise<void> {
    if (this.tableEnsured) return;
    const res = await this.p().query(
      "SELECT 1 FROM information_schema.tables WHERE table_schema = 'public' AND table_name = 'research_sessions'",
    );
    if ((res.rowCount ?? 0) === 0) throw new Error(SCHEMA_REQUIRED_MSG);
    this.tableEnsured = true;
  }

  async init(state: SessionState): Promise<SessionState> {
    await this.ensureTables();
    const inserted = await runInTransaction(async (client) => {
      const res = await client.query(
        `INSERT INTO research_sessions (session_id, version, phase, state, updated_at)
         VALUES ($1, $2, $3, $4::jsonb, now())
         ON CONFLICT (session_id) DO NOTHING
         RETURNING version`,
        [state.sessionId, state.version, state.phase, JSON.stringify(state)],
      );
      if ((res.rowCount ?? 0) === 0) return false;
      await client.query(
        `INSERT INTO research_session_snapshots (session_id, version, state)
         VALUES ($1, $2, $3::jsonb)`,
        [state.sessionId, state.version, JSON.stringify(state)],
      );
      return true;
    }, this.p());
    if (inserted) return state;
    const existing = await this.get(state.sessionId);
    if (!existing) throw new SessionNotFoundError(state.sessionId);
    return existing;
  }

  async get(sessionId: string): Promise<SessionState | null> {
    await this.ensureTables();
    const res = await withRetry(
      () => this.p().query<{ state: unknown }>("SELECT state FROM research_sessions WHERE session_id = $1", [sessionId]),
      READ_RETRY,
    );
    if ((res.rowCount ?? 0) === 0) return null;
    return parseState(res.rows[0].state);
  }

  async getAtVersion(sessionId: string, version: number): Promise<SessionState | null> {
    await this.ensureTables();
    const res = await withRetry(
      () =>
        this.p().query<{ state: unknown }>(
          "SELECT state FROM research_session_snapshots WHERE session_id = $1 AND version = $2",
          [sessionId, version],
        ),
      READ_RETRY,
    );
    if ((res.rowCount ?? 0) === 0) return null;
    return parseState(res.rows[0].state);
  }

  async commit(next: SessionState, expectedVersion: number, claim?: InFlightEntry): Promise<SessionState> {
    assertNextVersion(next, expectedVersion);
    await this.ensureTables();
    return runInTransaction(async (client) => {
      const res = await client.query(
        `UPDATE research_sessions
         SET version = $2, phase = $3, state = $4::jsonb, updated_at = now()
         WHERE session_id = $1 AND version = $5
         RETURNING version`,
        [next.sessionId, next.version, next.phase, JSON.stringify(next), expectedVersion],
      );
      if ((res.rowCount ?? 0) === 0) {
        const cur = await client.query<{ version: string | number }>(
          "SELECT version FROM research_sessions WHERE session_id = $1",
          [next.sessionId],
        );
        if ((cur.rowCount ?? 0) === 0) throw new SessionNotFoundError(next.sessionId);
        throw new VersionConflictError(next.sessionId, expectedVersion, Number(cur.rows[0].version));
      }
      if (claim) {
        const claimed = await client.query(
          "DELETE FROM agent_task_inflight WHERE idempotency_key = $1 AND acquired_at = $2::timestamptz",
          [claim.idempotencyKey, claim.acquiredAt],
        );
        if ((claimed.rowCount ?? 0) === 0) throw new UnknownRequestError(claim.idempotencyKey);
      }
      // Snapshot row in the same transaction: head and history never disagree.
      await client.query(
        `INSERT INTO research_session_snapshots (session_id, version, state)
         VALUES ($1, $2, $3::jsonb)`,
        [next.sessionId, next.version, JSON.stringify(next)],
      );
      return next;
    }, this.p());
  }
}
