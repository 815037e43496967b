import { randomUUID } from "crypto";
import { snapshotMessage, type DeliveryPublisher } from "./deliveryRouter.js";
import {
  GateDeniedError,
  InvalidMutationError,
  SessionNotFoundError,
  VersionConflictError,
  toErrorString,
} from "./errors.js";
import { evaluateGate } from "./gateEvaluator.js";
import { childLogger } from "./logger.js";
import { recordGateDenied, recordTransition } from "./metrics.js";
import {
  applyMutation,
  createSessionState,
  sessionMutationSchema,
  withPhase,
  type SessionMutation,
  type SessionState,
} from "./sessionState.js";
import type { SessionStore } from "./sessionStore.js";
import type { WorkflowDefinition } from "./workflowDefinition.js";

export interface PhaseStateMachineDeps {
  store: SessionStore;
  workflow: WorkflowDefinition;
  publisher: DeliveryPublisher;
  /** Called after a session enters the terminal phase (cancels its in-flight tasks). */
  onClosed?: (sessionId: string) => Promise<unknown>;
  now?: () => Date;
}

const log = childLogger({ component: "phase_state_machine" });

export function parseMutation(raw: unknown): SessionMutation {
  const res = sessionMutationSchema.safeParse(raw);
  if (!res.success) {
    const issue = res.error.issues[0];
    throw new InvalidMutationError(
      issue ? `invalid mutation: ${issue.path.join(".") || "(root)"} ${issue.message}` : "invalid mutation",
    );
  }
  return res.data;
}

/** Assessments and agent-authored reflections only ever arrive as agent task results. */
export function agentOnlyReason(mutation: SessionMutation): string | null {
  if (mutation.kind === "set_assessment") return "feasibility assessments are produced by the scoring agent";
  if (mutation.kind === "append_reflection" && mutation.author === "agent") {
    return "reflections authored by the agent are produced by agent tasks";
  }
  return null;
}

/**
 * Owns phase changes and user edits. Every write is one CAS against the
 * version the caller read; nothing is merged on conflict.
 */
export class PhaseStateMachine {
  private readonly now: () => Date;

  constructor(private readonly deps: PhaseStateMachineDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async startSession(opts: { sessionId?: string; questionText?: string } = {}): Promise<SessionState> {
    const sessionId = opts.sessionId?.trim() || randomUUID();
    const initial = createSessionState(sessionId, this.deps.workflow.initialPhase, this.now(), opts.questionText);
    const state = await this.deps.store.init(initial);
    if (state === initial) {
      log.info("session started", { session_id: sessionId });
      await this.publish(state);
    }
    return state;
  }

  async getSession(sessionId: string): Promise<SessionState> {
    const state = await this.deps.store.get(sessionId);
    if (!state) throw new SessionNotFoundError(sessionId);
    return state;
  }

  async requestTransition(sessionId: string, targetPhase: string, expectedVersion: number): Promise<SessionState> {
    const current = await this.getSession(sessionId);
    if (current.version !== expectedVersion) {
      throw new VersionConflictError(sessionId, expectedVersion, current.version);
    }
    const decision = evaluateGate(current, targetPhase, this.deps.workflow);
    if (!decision.allowed) {
      recordGateDenied(current.phase, targetPhase);
      log.info("transition denied", {
        session_id: sessionId,
        from: current.phase,
        to: targetPhase,
        reasons: decision.reasons,
      });
      throw new GateDeniedError(sessionId, current.phase, targetPhase, decision.reasons);
    }

    const saved = await this.deps.store.commit(withPhase(current, targetPhase, this.now()), expectedVersion);
    recordTransition(current.phase, targetPhase);
    log.info("phase transition", { session_id: sessionId, from: current.phase, to: targetPhase, version: saved.version });
    await this.publish(saved);

    if (targetPhase === this.deps.workflow.terminalPhase && this.deps.onClosed) {
      await this.deps.onClosed(sessionId).catch((e: unknown) => {
        log.error("cleanup after close failed", { session_id: sessionId, error: toErrorString(e) });
      });
    }
    return saved;
  }

  /** User edit through the same CAS path. A no-op edit returns the current snapshot unchanged. */
  async applyEdit(sessionId: string, expectedVersion: number, rawMutation: unknown): Promise<SessionState> {
    const mutation = parseMutation(rawMutation);
    const refused = agentOnlyReason(mutation);
    if (refused) throw new InvalidMutationError(refused);
    const current = await this.getSession(sessionId);
    if (current.version !== expectedVersion) {
      throw new VersionConflictError(sessionId, expectedVersion, current.version);
    }
    const out = applyMutation(current, mutation, {
      now: this.now(),
      initialPhase: this.deps.workflow.initialPhase,
      terminalPhase: this.deps.workflow.terminalPhase,
    });
    if (!out.changed) return current;
    const saved = await this.deps.store.commit(out.state, expectedVersion);
    log.info("session edited", { session_id: sessionId, kind: mutation.kind, version: saved.version });
    await this.publish(saved);
    return saved;
  }

  private async publish(state: SessionState): Promise<void> {
    try {
      await this.deps.publisher.publish(snapshotMessage(state));
    } catch (e) {
      log.error("snapshot publish failed", { session_id: state.sessionId, version: state.version, error: toErrorString(e) });
    }
  }
}
