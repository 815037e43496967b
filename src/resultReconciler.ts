import type { AgentTaskResult } from "./agentRunner.js";
import {
  snapshotMessage,
  type DeliveryMessage,
  type DeliveryPublisher,
  type TaskNoticeKind,
} from "./deliveryRouter.js";
import {
  StaleResultError,
  UnknownRequestError,
  VersionConflictError,
  isWorkflowError,
  toErrorString,
  type TaskFailureKind,
} from "./errors.js";
import type { InFlightEntry } from "./inFlightIndex.js";
import { childLogger } from "./logger.js";
import {
  applyMutation,
  incompatibleChange,
  isCommutative,
  type SessionMutation,
  type SessionState,
} from "./sessionState.js";
import type { SessionStore } from "./sessionStore.js";
import type { TaskLedger } from "./taskLedger.js";
import { isKnownTaskType, taskOutputToMutation } from "./taskOutputs.js";
import type { WorkflowDefinition } from "./workflowDefinition.js";

export type ReconcileOutcome =
  | { applied: true; changed: boolean; snapshot: SessionState }
  | { applied: false; discarded: true }
  | { applied: false; discarded: false; failure: { kind: TaskFailureKind; message: string } };

export interface ResultReconcilerDeps {
  store: SessionStore;
  ledger: TaskLedger;
  publisher: DeliveryPublisher;
  workflow: WorkflowDefinition;
  /** CAS attempts before giving up on a contended session. */
  maxCasAttempts?: number;
  now?: () => Date;
}

const log = childLogger({ component: "result_reconciler" });

/**
 * Applies each task result to the session exactly once. Commutative results
 * are re-based onto the newest snapshot; non-commutative ones are rejected as
 * stale when the fields they were computed from have changed since dispatch.
 */
export class ResultReconciler {
  private readonly maxCasAttempts: number;
  private readonly now: () => Date;

  constructor(private readonly deps: ResultReconcilerDeps) {
    this.maxCasAttempts = deps.maxCasAttempts ?? 5;
    this.now = deps.now ?? (() => new Date());
  }

  async reconcile(result: AgentTaskResult): Promise<ReconcileOutcome> {
    const key = result.idempotencyKey;
    if (this.deps.ledger.isCancelled(key)) return this.discard(key);
    const entry = await this.deps.ledger.lookup(key);
    if (!entry) throw new UnknownRequestError(key);

    if (result.outcome === "failure") {
      return this.fail(entry, result.error.kind, result.error.message);
    }

    let mutation: SessionMutation;
    try {
      if (!isKnownTaskType(entry.taskType)) throw new Error(`no output contract for task type ${entry.taskType}`);
      mutation = taskOutputToMutation(entry.taskType, result.payload);
    } catch (e) {
      return this.fail(entry, "permanent", toErrorString(e));
    }

    let applied: { changed: boolean; snapshot: SessionState } | null;
    try {
      applied = await this.apply(entry, mutation);
    } catch (e) {
      if (e instanceof StaleResultError) {
        await this.deps.ledger.release(key);
        log.warn("stale result rejected", {
          session_id: entry.sessionId,
          task_type: entry.taskType,
          idempotency_key: key,
          base_version: entry.baseVersion,
          reason: e.reason,
        });
        await this.notice("task_stale", entry, e.reason);
        throw e;
      }
      if (isWorkflowError(e) && e.code === "invalid_mutation") {
        return this.fail(entry, "permanent", e.message);
      }
      // The marker went away between our read and the write: cancelled mid-apply.
      if (e instanceof UnknownRequestError && this.deps.ledger.isCancelled(key)) return this.discard(key);
      throw e;
    }
    if (!applied) return this.discard(key);

    await this.deps.ledger.release(key);
    log.info("task result applied", {
      session_id: entry.sessionId,
      task_type: entry.taskType,
      idempotency_key: key,
      version: applied.snapshot.version,
      changed: applied.changed,
    });
    if (applied.changed) await this.publishSafely(snapshotMessage(applied.snapshot), key);
    return { applied: true, ...applied };
  }

  private discard(idempotencyKey: string): ReconcileOutcome {
    log.debug("discarding result of cancelled task", { idempotency_key: idempotencyKey });
    return { applied: false, discarded: true };
  }

  /** Null when the task was cancelled before the write. */
  private async apply(
    entry: InFlightEntry,
    mutation: SessionMutation,
  ): Promise<{ changed: boolean; snapshot: SessionState } | null> {
    const stale = (reason: string) => new StaleResultError(entry.sessionId, entry.idempotencyKey, reason);
    let lastConflict: VersionConflictError | null = null;

    for (let attempt = 0; attempt < this.maxCasAttempts; attempt++) {
      const current = await this.deps.store.get(entry.sessionId);
      if (!current) throw stale("session no longer exists");
      if (current.phase === this.deps.workflow.terminalPhase) throw stale("session is closed");

      if (!isCommutative(mutation)) {
        if (current.version !== entry.baseVersion) {
          const base = await this.deps.store.getAtVersion(entry.sessionId, entry.baseVersion);
          const reason = base ? incompatibleChange(base, current, mutation) : "dispatch-time snapshot unavailable";
          if (reason) throw stale(reason);
        }
        if (mutation.kind === "set_question_text" && current.question.status === "Locked") {
          throw stale("research question is locked");
        }
      }

      const out = applyMutation(current, mutation, {
        now: this.now(),
        initialPhase: this.deps.workflow.initialPhase,
        terminalPhase: this.deps.workflow.terminalPhase,
      });
      if (this.deps.ledger.isCancelled(entry.idempotencyKey)) return null;
      if (!out.changed) return { changed: false, snapshot: current };
      try {
        return { changed: true, snapshot: await this.deps.store.commit(out.state, current.version, entry) };
      } catch (e) {
        if (!(e instanceof VersionConflictError)) throw e;
        lastConflict = e;
        log.debug("version conflict while applying result, re-reading", {
          session_id: entry.sessionId,
          idempotency_key: entry.idempotencyKey,
          attempt,
        });
      }
    }
    throw lastConflict ?? new Error(`could not apply result ${entry.idempotencyKey}`);
  }

  private async fail(entry: InFlightEntry, kind: TaskFailureKind, message: string): Promise<ReconcileOutcome> {
    await this.deps.ledger.release(entry.idempotencyKey);
    log.warn("agent task failed", {
      session_id: entry.sessionId,
      task_type: entry.taskType,
      idempotency_key: entry.idempotencyKey,
      kind,
      error: message,
    });
    await this.notice("task_failed", entry, message);
    return { applied: false, discarded: false, failure: { kind, message } };
  }

  private async notice(kind: TaskNoticeKind, entry: InFlightEntry, reason: string): Promise<void> {
    const session = await this.deps.store.get(entry.sessionId).catch((e: unknown) => {
      log.warn("session read for notice failed", { session_id: entry.sessionId, error: toErrorString(e) });
      return null;
    });
    await this.publishSafely(
      {
        channel: "state",
        kind,
        sessionId: entry.sessionId,
        version: session?.version ?? entry.baseVersion,
        taskType: entry.taskType,
        idempotencyKey: entry.idempotencyKey,
        reason,
      },
      entry.idempotencyKey,
    );
  }

  private async publishSafely(message: DeliveryMessage, idempotencyKey: string): Promise<void> {
    try {
      await this.deps.publisher.publish(message);
    } catch (e) {
      log.error("delivery publish failed", { idempotency_key: idempotencyKey, error: toErrorString(e) });
    }
  }
}
