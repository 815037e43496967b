import type { AcquireResult, InFlightEntry, InFlightIndex, Lane } from "./inFlightIndex.js";
import { TtlCache } from "./ttlCache.js";

export type TaskStatus = "queued" | "running" | "succeeded" | "failed" | "cancelled" | "unknown";

export interface CompletedTask {
  sessionId: string;
  taskType: string;
  lane: Lane;
  status: "succeeded" | "failed";
}

export interface LedgerOptions {
  ttlMs: number;
  maxEntries: number;
  now?: () => number;
}

/**
 * Bookkeeping shared by the dispatcher and the reconciler: the single-flight
 * index, keys cancelled on this replica, completed keys for idempotent
 * resubmission, and a status view for polling.
 */
export class TaskLedger {
  private readonly cancelled: TtlCache<true>;
  private readonly completed: TtlCache<CompletedTask>;
  private readonly statuses: TtlCache<TaskStatus>;

  constructor(
    private readonly index: InFlightIndex,
    opts: LedgerOptions,
  ) {
    this.cancelled = new TtlCache(opts.ttlMs, opts.maxEntries, opts.now);
    this.completed = new TtlCache(opts.ttlMs, opts.maxEntries, opts.now);
    this.statuses = new TtlCache(opts.ttlMs, opts.maxEntries, opts.now);
  }

  tryAcquire(entry: InFlightEntry): Promise<AcquireResult> {
    return this.index.tryAcquire(entry);
  }

  lookup(idempotencyKey: string): Promise<InFlightEntry | null> {
    return this.index.get(idempotencyKey);
  }

  release(idempotencyKey: string): Promise<boolean> {
    return this.index.release(idempotencyKey);
  }

  inFlightForSession(sessionId: string): Promise<InFlightEntry[]> {
    return this.index.listBySession(sessionId);
  }

  markCancelled(idempotencyKey: string): void {
    this.cancelled.set(idempotencyKey, true);
    this.statuses.set(idempotencyKey, "cancelled");
  }

  /** A new run acquired the key; its results are no longer those of the cancelled run. */
  clearCancelled(idempotencyKey: string): void {
    this.cancelled.delete(idempotencyKey);
  }

  isCancelled(idempotencyKey: string): boolean {
    return this.cancelled.has(idempotencyKey);
  }

  markCompleted(idempotencyKey: string, task: CompletedTask): void {
    this.completed.set(idempotencyKey, task);
    this.statuses.set(idempotencyKey, task.status);
  }

  getCompleted(idempotencyKey: string): CompletedTask | undefined {
    return this.completed.get(idempotencyKey);
  }

  setStatus(idempotencyKey: string, status: TaskStatus): void {
    this.statuses.set(idempotencyKey, status);
  }

  localStatus(idempotencyKey: string): TaskStatus | undefined {
    return this.statuses.get(idempotencyKey);
  }
}
