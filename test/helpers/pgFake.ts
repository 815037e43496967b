import { vi } from "vitest";
import type pg from "pg";

export interface RecordedQuery {
  text: string;
  values: unknown[];
}

export interface FakeResult {
  rows: unknown[];
  rowCount?: number;
}

export type QueryResponder = (text: string, values: unknown[]) => FakeResult | undefined;

/**
 * Pool stand-in that records every statement. `respond` answers by SQL text;
 * unanswered queries get an empty result. `connect()` hands out a client that
 * shares the same log, so transactions show up as BEGIN ... COMMIT/ROLLBACK.
 */
export function mockPool(respond?: QueryResponder) {
  const calls: RecordedQuery[] = [];
  const query = vi.fn(async (text: string, values?: unknown[]) => {
    const v = values ?? [];
    calls.push({ text, values: v });
    const result = respond?.(text, v);
    if (result) return { rowCount: result.rows.length, ...result };
    return { rows: [], rowCount: 0 };
  });
  const release = vi.fn();
  const fake = {
    query,
    connect: vi.fn(async () => ({ query, release })),
  };
  return { pool: fake as unknown as pg.Pool, calls, release };
}
