import { AgentTaskRunner } from "./agentRunner.js";
import type { RoleConfigSource } from "./agentRoles.js";
import {
  DeliveryRouter,
  snapshotMessage,
  type DeliveryPublisher,
  type Subscription,
} from "./deliveryRouter.js";
import { SessionNotFoundError } from "./errors.js";
import type { InFlightIndex, Lane } from "./inFlightIndex.js";
import { PhaseStateMachine } from "./phaseStateMachine.js";
import { ResultReconciler } from "./resultReconciler.js";
import type { SessionState } from "./sessionState.js";
import type { SessionStore } from "./sessionStore.js";
import { TaskDispatcher, type SubmitAccepted } from "./taskDispatcher.js";
import { TaskLedger, type TaskStatus } from "./taskLedger.js";
import type { WorkflowDefinition } from "./workflowDefinition.js";

export interface ResearchWorkflowDeps {
  store: SessionStore;
  inFlight: InFlightIndex;
  roles: RoleConfigSource;
  workflow: WorkflowDefinition;
  /** Local fan-out to this replica's subscribers. */
  router: DeliveryRouter;
  /** Where pushes go; the NATS relay publisher across replicas, the router otherwise. */
  publisher?: DeliveryPublisher;
  runner?: AgentTaskRunner;
  laneConcurrency?: { default: number; stream: number };
  idempotencyCache?: { ttlMs: number; maxEntries: number };
  now?: () => Date;
}

/** What an agent sees of the session next to the caller's payload. */
export function taskInput(session: SessionState, payload: Record<string, unknown>): Record<string, unknown> {
  return {
    ...payload,
    session: {
      phase: session.phase,
      question: session.question.text,
      keywords: session.keywords,
      scopeElements: session.scopeElements,
    },
  };
}

/**
 * Inbound surface of the research workflow: session reads, transitions,
 * edits, agent task submission and live subscriptions.
 */
export class ResearchWorkflow {
  readonly stateMachine: PhaseStateMachine;
  readonly dispatcher: TaskDispatcher;
  readonly reconciler: ResultReconciler;
  readonly ledger: TaskLedger;
  private readonly router: DeliveryRouter;
  private readonly store: SessionStore;

  constructor(deps: ResearchWorkflowDeps) {
    const publisher = deps.publisher ?? deps.router;
    this.router = deps.router;
    this.store = deps.store;
    const cache = deps.idempotencyCache ?? { ttlMs: 15 * 60 * 1000, maxEntries: 10_000 };
    const now = deps.now;
    this.ledger = new TaskLedger(deps.inFlight, { ...cache, now: now ? () => now().getTime() : undefined });
    this.reconciler = new ResultReconciler({
      store: deps.store,
      ledger: this.ledger,
      publisher,
      workflow: deps.workflow,
      now: deps.now,
    });
    this.dispatcher = new TaskDispatcher({
      roles: deps.roles,
      ledger: this.ledger,
      runner: deps.runner ?? new AgentTaskRunner(),
      store: deps.store,
      publisher,
      results: this.reconciler,
      terminalPhase: deps.workflow.terminalPhase,
      laneConcurrency: deps.laneConcurrency ?? { default: 8, stream: 4 },
    });
    this.stateMachine = new PhaseStateMachine({
      store: deps.store,
      workflow: deps.workflow,
      publisher,
      onClosed: (sessionId) => this.dispatcher.cancelSession(sessionId, "session closed"),
      now: deps.now,
    });
  }

  startSession(opts?: { sessionId?: string; questionText?: string }): Promise<SessionState> {
    return this.stateMachine.startSession(opts);
  }

  getSession(sessionId: string): Promise<SessionState> {
    return this.stateMachine.getSession(sessionId);
  }

  requestTransition(sessionId: string, targetPhase: string, expectedVersion: number): Promise<SessionState> {
    return this.stateMachine.requestTransition(sessionId, targetPhase, expectedVersion);
  }

  applyEdit(sessionId: string, expectedVersion: number, mutation: unknown): Promise<SessionState> {
    return this.stateMachine.applyEdit(sessionId, expectedVersion, mutation);
  }

  async submitAgentTask(
    sessionId: string,
    taskType: string,
    payload: Record<string, unknown>,
    opts: { idempotencyKey?: string; lane?: Lane } = {},
  ): Promise<SubmitAccepted> {
    const session = await this.getSession(sessionId);
    return this.dispatcher.submit({
      sessionId,
      taskType,
      payload: taskInput(session, payload),
      idempotencyKey: opts.idempotencyKey,
      lane: opts.lane,
    });
  }

  cancelTask(idempotencyKey: string): Promise<void> {
    return this.dispatcher.cancel(idempotencyKey);
  }

  getTaskStatus(idempotencyKey: string): Promise<TaskStatus> {
    return this.dispatcher.getTaskStatus(idempotencyKey);
  }

  /** Live handle for one session, primed with the current snapshot. */
  async subscribe(sessionId: string): Promise<Subscription> {
    const sub = this.router.subscribe(sessionId);
    const state = await this.store.get(sessionId).catch((e: unknown) => {
      sub.close();
      throw e;
    });
    if (!state) {
      sub.close();
      throw new SessionNotFoundError(sessionId);
    }
    this.router.deliver(snapshotMessage(state));
    return sub;
  }

  async shutdown(graceMs?: number): Promise<void> {
    await this.dispatcher.shutdown(graceMs);
    this.router.closeAll();
  }
}
