import { createHash } from "crypto";
import type { AgentRoleConfig, RoleConfigSource } from "./agentRoles.js";
import type { AgentTaskRequest, AgentTaskResult, AgentTaskRunner } from "./agentRunner.js";
import type { DeliveryPublisher, StreamMessage, TaskNoticeKind } from "./deliveryRouter.js";
import {
  DuplicateInFlightError,
  ServiceUnavailableError,
  SessionClosedError,
  SessionNotFoundError,
  TaskTypeUnknownError,
  TransientTaskError,
  UnknownRequestError,
  isTransientTaskError,
  isWorkflowError,
  toErrorString,
} from "./errors.js";
import type { InFlightEntry, Lane } from "./inFlightIndex.js";
import { childLogger } from "./logger.js";
import { recordTaskDuplicate, recordTaskOutcome, recordTaskRetry, recordTaskSubmitted } from "./metrics.js";
import { withRetry } from "./resilience.js";
import type { ReconcileOutcome } from "./resultReconciler.js";
import type { SessionStore } from "./sessionStore.js";
import type { TaskLedger, TaskStatus } from "./taskLedger.js";
import { isKnownTaskType } from "./taskOutputs.js";
import { WorkerLane } from "./workerLane.js";

export interface SubmitRequest {
  sessionId: string;
  taskType: string;
  payload: Record<string, unknown>;
  /** Derived from (session, task type, payload, session version) when omitted. */
  idempotencyKey?: string;
  /** Overrides the role's lane. */
  lane?: Lane;
}

export interface SubmitAccepted {
  accepted: true;
  idempotencyKey: string;
  lane: Lane;
  /** True when the key had already completed and nothing was enqueued. */
  deduplicated: boolean;
}

/** Where finished task results go. The result reconciler in production. */
export interface ResultHandler {
  reconcile(result: AgentTaskResult): Promise<ReconcileOutcome>;
}

export interface TaskDispatcherDeps {
  roles: RoleConfigSource;
  ledger: TaskLedger;
  runner: AgentTaskRunner;
  store: SessionStore;
  publisher: DeliveryPublisher;
  results: ResultHandler;
  terminalPhase: string;
  laneConcurrency: { default: number; stream: number };
}

interface LocalTask {
  entry: InFlightEntry;
  controller: AbortController;
}

const log = childLogger({ component: "task_dispatcher" });

function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(",")}]`;
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

/** SHA-256 over the logical request; key order in the payload does not matter. */
export function deriveIdempotencyKey(
  sessionId: string,
  taskType: string,
  payload: Record<string, unknown>,
  sessionVersion: number,
): string {
  return createHash("sha256")
    .update(canonicalJson([sessionId, taskType, payload, sessionVersion]))
    .digest("hex");
}

/**
 * Accepts agent tasks, enforces single-flight per (session, task type), runs
 * them on two independent lanes and hands every result to the reconciler.
 * `submit` returns once the task is queued; nothing on the request path
 * waits for task completion.
 */
export class TaskDispatcher {
  private readonly lanes: Record<Lane, WorkerLane>;
  private readonly local = new Map<string, LocalTask>();
  private closed = false;

  constructor(private readonly deps: TaskDispatcherDeps) {
    this.lanes = {
      default: new WorkerLane("default", deps.laneConcurrency.default),
      stream: new WorkerLane("stream", deps.laneConcurrency.stream),
    };
  }

  async submit(request: SubmitRequest): Promise<SubmitAccepted> {
    if (this.closed) throw new ServiceUnavailableError("task dispatcher is shutting down");

    const role = await this.deps.roles.getRoleConfig(request.taskType);
    if (!role || !isKnownTaskType(request.taskType)) throw new TaskTypeUnknownError(request.taskType);

    if (request.idempotencyKey) {
      const cached = this.cachedAcceptance(request.idempotencyKey);
      if (cached) return cached;
    }

    const session = await this.deps.store.get(request.sessionId);
    if (!session) throw new SessionNotFoundError(request.sessionId);
    if (session.phase === this.deps.terminalPhase) throw new SessionClosedError(request.sessionId);

    const idempotencyKey =
      request.idempotencyKey ??
      deriveIdempotencyKey(request.sessionId, request.taskType, request.payload, session.version);
    if (!request.idempotencyKey) {
      const cached = this.cachedAcceptance(idempotencyKey);
      if (cached) return cached;
    }

    const lane = request.lane ?? role.lane;
    const entry: InFlightEntry = {
      idempotencyKey,
      sessionId: request.sessionId,
      taskType: request.taskType,
      lane,
      baseVersion: session.version,
      acquiredAt: new Date().toISOString(),
    };
    const acquired = await this.deps.ledger.tryAcquire(entry);
    if (!acquired.acquired) {
      recordTaskDuplicate(request.taskType, "in_flight");
      throw new DuplicateInFlightError(request.sessionId, request.taskType, acquired.holder?.idempotencyKey ?? null);
    }

    this.deps.ledger.clearCancelled(idempotencyKey);
    const task: LocalTask = { entry, controller: new AbortController() };
    this.local.set(idempotencyKey, task);
    this.deps.ledger.setStatus(idempotencyKey, "queued");
    const taskRequest: AgentTaskRequest = {
      taskType: request.taskType,
      sessionId: request.sessionId,
      idempotencyKey,
      payload: request.payload,
      lane,
    };
    const queued = this.lanes[lane].enqueue(() => this.execute(taskRequest, role, task));
    if (!queued) {
      this.local.delete(idempotencyKey);
      await this.deps.ledger.release(idempotencyKey);
      throw new ServiceUnavailableError("task dispatcher is shutting down");
    }

    recordTaskSubmitted(request.taskType, lane);
    log.info("task accepted", {
      session_id: request.sessionId,
      task_type: request.taskType,
      idempotency_key: idempotencyKey,
      lane,
      base_version: session.version,
    });
    return { accepted: true, idempotencyKey, lane, deduplicated: false };
  }

  /**
   * Abort a task, free its single-flight slot now and make sure a late result
   * is discarded. Throws UnknownRequestError for a key that is not in flight.
   */
  async cancel(idempotencyKey: string, reason = "cancelled by request"): Promise<void> {
    const task = this.local.get(idempotencyKey);
    const entry = task?.entry ?? (await this.deps.ledger.lookup(idempotencyKey));
    if (!entry) throw new UnknownRequestError(idempotencyKey);

    this.deps.ledger.markCancelled(idempotencyKey);
    task?.controller.abort(new TransientTaskError(reason));
    this.local.delete(idempotencyKey);
    await this.deps.ledger.release(idempotencyKey);
    recordTaskOutcome(entry.taskType, "cancelled");
    log.info("task cancelled", {
      session_id: entry.sessionId,
      task_type: entry.taskType,
      idempotency_key: idempotencyKey,
      reason,
    });
    await this.notify("task_cancelled", entry, reason);
  }

  /** Cancel every in-flight task of a session. Returns how many were cancelled. */
  async cancelSession(sessionId: string, reason = "session closed"): Promise<number> {
    const keys = new Set<string>();
    for (const e of await this.deps.ledger.inFlightForSession(sessionId)) keys.add(e.idempotencyKey);
    for (const t of this.local.values()) if (t.entry.sessionId === sessionId) keys.add(t.entry.idempotencyKey);
    let count = 0;
    for (const key of keys) {
      try {
        await this.cancel(key, reason);
        count++;
      } catch (e) {
        // Finished between listing and cancelling.
        if (!(e instanceof UnknownRequestError)) throw e;
      }
    }
    return count;
  }

  async getTaskStatus(idempotencyKey: string): Promise<TaskStatus> {
    const status = this.deps.ledger.localStatus(idempotencyKey);
    if (status) return status;
    // Held by another replica: we only know it has not finished.
    return (await this.deps.ledger.lookup(idempotencyKey)) ? "queued" : "unknown";
  }

  laneStats() {
    return [this.lanes.default.stats(), this.lanes.stream.stats()];
  }

  /** Stop accepting work, cancel everything this replica holds, wait up to graceMs for lanes to drain. */
  async shutdown(graceMs = 10_000): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.lanes.default.close();
    this.lanes.stream.close();
    for (const key of [...this.local.keys()]) {
      await this.cancel(key, "service shutting down").catch((e: unknown) => {
        log.warn("cancel during shutdown failed", { idempotency_key: key, error: toErrorString(e) });
      });
    }
    let timer: NodeJS.Timeout | undefined;
    const grace = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, graceMs);
    });
    await Promise.race([Promise.all([this.lanes.default.onIdle(), this.lanes.stream.onIdle()]), grace]);
    clearTimeout(timer);
  }

  private cachedAcceptance(idempotencyKey: string): SubmitAccepted | null {
    const done = this.deps.ledger.getCompleted(idempotencyKey);
    if (!done) return null;
    recordTaskDuplicate(done.taskType, "cached");
    return { accepted: true, idempotencyKey, lane: done.lane, deduplicated: true };
  }

  private async execute(request: AgentTaskRequest, role: AgentRoleConfig, task: LocalTask): Promise<void> {
    const { signal } = task.controller;
    const key = request.idempotencyKey;
    if (signal.aborted) return;
    this.deps.ledger.setStatus(key, "running");
    const startedAt = Date.now();

    let seq = 0;
    let streamChain: Promise<void> = Promise.resolve();
    const onChunk = (chunk: string): void => {
      if (signal.aborted) return;
      const msg: StreamMessage = {
        channel: "stream",
        sessionId: request.sessionId,
        taskType: request.taskType,
        idempotencyKey: key,
        seq: seq++,
        chunk,
      };
      // Chained so an async publisher cannot reorder chunks.
      streamChain = streamChain
        .then(() => this.deps.publisher.publish(msg))
        .catch((e: unknown) => log.warn("stream publish failed", { idempotency_key: key, error: toErrorString(e) }));
    };

    const result = await this.runWithRetry(request, role, signal, onChunk);
    await streamChain;
    const latencyMs = Date.now() - startedAt;
    // Cancelled while running: cancel() already freed the slot, and the key may belong to a newer run by now.
    if (signal.aborted) {
      this.forget(task);
      return;
    }

    let outcome: ReconcileOutcome;
    try {
      outcome = await this.deps.results.reconcile(result);
    } catch (e) {
      if (isWorkflowError(e) && (e.code === "stale_result" || e.code === "unknown_request")) {
        log.warn("result not applied", { idempotency_key: key, code: e.code, error: e.message });
        this.finish(task, "failed");
        recordTaskOutcome(request.taskType, "stale", latencyMs);
        return;
      }
      // Reconciliation itself broke (store unreachable): free the slot and tell the client.
      this.finish(task, "failed");
      recordTaskOutcome(request.taskType, "failed", latencyMs);
      await this.deps.ledger.release(key).catch((releaseErr: unknown) => {
        log.error("in-flight release failed", { idempotency_key: key, error: toErrorString(releaseErr) });
      });
      await this.notify("task_failed", task.entry, `reconciliation failed: ${toErrorString(e)}`);
      throw e;
    }

    if (!outcome.applied && outcome.discarded) {
      this.forget(task);
      recordTaskOutcome(request.taskType, "discarded", latencyMs);
      return;
    }
    this.finish(task, outcome.applied ? "succeeded" : "failed");
    recordTaskOutcome(request.taskType, outcome.applied ? "applied" : "failed", latencyMs);
  }

  private async runWithRetry(
    request: AgentTaskRequest,
    role: AgentRoleConfig,
    signal: AbortSignal,
    onChunk: (chunk: string) => void,
  ): Promise<AgentTaskResult> {
    let last: AgentTaskResult | null = null;
    const attempt = async (n: number): Promise<AgentTaskResult> => {
      const r = await this.deps.runner.run(request, role, { signal, onChunk });
      last = { ...r, attempts: n + 1 };
      if (r.outcome === "failure" && r.error.kind === "transient" && !signal.aborted) {
        throw new TransientTaskError(r.error.message);
      }
      return last;
    };
    return withRetry(attempt, {
      ...role.retryPolicy,
      signal,
      retryableCheck: isTransientTaskError,
      onRetry: (err, retry, delayMs) => {
        recordTaskRetry(request.taskType);
        log.info("retrying agent task", {
          idempotency_key: request.idempotencyKey,
          task_type: request.taskType,
          retry,
          delay_ms: delayMs,
          error: toErrorString(err),
        });
      },
    }).catch((e: unknown) => {
      if (last) return last;
      throw e;
    });
  }

  /** Drop the local handle unless a newer run has taken the key over. */
  private forget(task: LocalTask): void {
    if (this.local.get(task.entry.idempotencyKey) === task) this.local.delete(task.entry.idempotencyKey);
  }

  private finish(task: LocalTask, status: "succeeded" | "failed"): void {
    const { entry } = task;
    this.forget(task);
    if (this.deps.ledger.isCancelled(entry.idempotencyKey)) return;
    this.deps.ledger.markCompleted(entry.idempotencyKey, {
      sessionId: entry.sessionId,
      taskType: entry.taskType,
      lane: entry.lane,
      status,
    });
  }

  private async notify(kind: TaskNoticeKind, entry: InFlightEntry, reason: string): Promise<void> {
    try {
      const session = await this.deps.store.get(entry.sessionId);
      await this.deps.publisher.publish({
        channel: "state",
        kind,
        sessionId: entry.sessionId,
        version: session?.version ?? entry.baseVersion,
        taskType: entry.taskType,
        idempotencyKey: entry.idempotencyKey,
        reason,
      });
    } catch (e) {
      log.error("task notice publish failed", { idempotency_key: entry.idempotencyKey, kind, error: toErrorString(e) });
    }
  }
}
