/**
 * Safe error serialization plus the workflow error taxonomy.
 *
 * Every error a caller can act on carries a stable `code`; the HTTP adapter
 * maps codes to status codes and the delivery channel carries them verbatim.
 */

export function toErrorString(e: unknown): string {
  if (e === null) return "null";
  if (e === undefined) return "undefined";
  if (e instanceof Error) {
    const code = "code" in e ? String(e.code) : "";
    return e.message + (code ? ` [${code}]` : "");
  }
  if (typeof e === "object") {
    const msg = "message" in e ? e.message : undefined;
    const code = "code" in e ? e.code : undefined;
    if (typeof msg === "string") return typeof code === "string" ? `${msg} [${code}]` : msg;
    if (typeof code === "string") return code;
  }
  try {
    return String(e);
  } catch {
    return typeof e === "object" && e !== null ? Object.prototype.toString.call(e) : "[unknown]";
  }
}

export type WorkflowErrorCode =
  | "version_conflict"
  | "gate_denied"
  | "duplicate_in_flight"
  | "task_type_unknown"
  | "stale_result"
  | "unknown_request"
  | "not_found"
  | "question_locked"
  | "session_closed"
  | "invalid_mutation"
  | "unavailable";

export class WorkflowError extends Error {
  constructor(
    readonly code: WorkflowErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Optimistic-concurrency loss. Re-read the session and retry. */
export class VersionConflictError extends WorkflowError {
  constructor(
    readonly sessionId: string,
    readonly expectedVersion: number,
    readonly currentVersion: number | null,
  ) {
    super(
      "version_conflict",
      `session ${sessionId}: expected version ${expectedVersion}, current is ${currentVersion ?? "unknown"}`,
    );
  }
}

/** Phase gate refused the transition; `reasons` lists every unmet condition. */
export class GateDeniedError extends WorkflowError {
  constructor(
    readonly sessionId: string,
    readonly from: string,
    readonly to: string,
    readonly reasons: string[],
  ) {
    super("gate_denied", `transition ${from} -> ${to} denied: ${reasons.join("; ")}`);
  }
}

export class DuplicateInFlightError extends WorkflowError {
  constructor(
    readonly sessionId: string,
    readonly taskType: string,
    readonly inFlightKey: string | null,
  ) {
    super("duplicate_in_flight", `task ${taskType} is already running for session ${sessionId}`);
  }
}

export class TaskTypeUnknownError extends WorkflowError {
  constructor(readonly taskType: string) {
    super("task_type_unknown", `no agent role configured for task type ${taskType}`);
  }
}

/** A non-commutative result no longer fits the session it was computed for. */
export class StaleResultError extends WorkflowError {
  constructor(
    readonly sessionId: string,
    readonly idempotencyKey: string,
    readonly reason: string,
  ) {
    super("stale_result", `result ${idempotencyKey} is stale for session ${sessionId}: ${reason}`);
  }
}

export class UnknownRequestError extends WorkflowError {
  constructor(readonly idempotencyKey: string) {
    super("unknown_request", `no in-flight task for idempotency key ${idempotencyKey}`);
  }
}

export class SessionNotFoundError extends WorkflowError {
  constructor(readonly sessionId: string) {
    super("not_found", `session ${sessionId} not found`);
  }
}

export class QuestionLockedError extends WorkflowError {
  constructor(readonly sessionId: string) {
    super("question_locked", `research question of session ${sessionId} is locked`);
  }
}

export class SessionClosedError extends WorkflowError {
  constructor(readonly sessionId: string) {
    super("session_closed", `session ${sessionId} is closed`);
  }
}

export class InvalidMutationError extends WorkflowError {
  constructor(message: string) {
    super("invalid_mutation", message);
  }
}

/** The dispatcher is shutting down and takes no new work. */
export class ServiceUnavailableError extends WorkflowError {
  constructor(message: string) {
    super("unavailable", message);
  }
}

export function isWorkflowError(e: unknown): e is WorkflowError {
  return e instanceof WorkflowError;
}

// ── Agent task failures ──────────────────────────────────────────────────────

export type TaskFailureKind = "transient" | "permanent";

/** Timeout, rate limit, provider hiccup: retried with backoff up to the role's bound. */
export class TransientTaskError extends Error {
  readonly kind = "transient" as const;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransientTaskError";
  }
}

/** Invalid input, policy refusal, malformed model output: never retried. */
export class PermanentTaskError extends Error {
  readonly kind = "permanent" as const;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PermanentTaskError";
  }
}

export type TaskError = TransientTaskError | PermanentTaskError;

export function isTransientTaskError(e: unknown): e is TransientTaskError {
  return e instanceof TransientTaskError;
}
