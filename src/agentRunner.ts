import { ZodError } from "zod";
import type { AgentRoleConfig } from "./agentRoles.js";
import {
  PermanentTaskError,
  TransientTaskError,
  toErrorString,
  type TaskFailureKind,
} from "./errors.js";
import { getGenerationService, type GenerationService } from "./generation.js";
import type { Lane } from "./inFlightIndex.js";
import { childLogger } from "./logger.js";
import { CircuitBreaker, CircuitOpenError } from "./resilience.js";
import { isKnownTaskType, parseTaskOutput } from "./taskOutputs.js";

export interface AgentTaskRequest {
  taskType: string;
  sessionId: string;
  idempotencyKey: string;
  payload: Record<string, unknown>;
  lane: Lane;
}

interface ResultBase {
  idempotencyKey: string;
  sessionId: string;
  taskType: string;
  producedAt: string;
  attempts: number;
}

export type AgentTaskResult =
  | (ResultBase & { outcome: "success"; payload: Record<string, unknown> })
  | (ResultBase & { outcome: "failure"; error: { kind: TaskFailureKind; message: string } });

export interface RunOptions {
  /** Caller-side cancellation. */
  signal: AbortSignal;
  onChunk?: (chunk: string) => void;
}

const log = childLogger({ component: "agent_runner" });

const TRANSIENT_MESSAGE =
  /timeout|timed out|ECONNRESET|ECONNREFUSED|ETIMEDOUT|EAI_AGAIN|socket hang up|fetch failed|rate limit|overloaded/i;
const PERMANENT_MESSAGE = /content policy|content_filter|refus|invalid api key|unsupported/i;

function numericStatus(e: object): number | null {
  for (const field of ["status", "statusCode"]) {
    const v: unknown = Reflect.get(e, field);
    if (typeof v === "number") return v;
  }
  return null;
}

/**
 * Transient: timeouts, network errors, HTTP 429/5xx, an open circuit.
 * Permanent: bad input, schema violations, policy refusals, other HTTP 4xx.
 * Anything unrecognised counts as transient and is bounded by the role's retry policy.
 */
export function classifyTaskFailure(e: unknown): TaskFailureKind {
  if (e instanceof TransientTaskError || e instanceof PermanentTaskError) return e.kind;
  if (e instanceof CircuitOpenError) return "transient";
  if (e instanceof ZodError) return "permanent";
  if (typeof e === "object" && e !== null) {
    const status = numericStatus(e);
    if (status !== null) {
      if (status === 408 || status === 429 || status >= 500) return "transient";
      if (status >= 400) return "permanent";
    }
    if (e instanceof Error && (e.name === "AbortError" || e.name === "TimeoutError")) return "transient";
  }
  const msg = toErrorString(e);
  if (PERMANENT_MESSAGE.test(msg)) return "permanent";
  if (TRANSIENT_MESSAGE.test(msg)) return "transient";
  return "transient";
}

/** Rejects as soon as `signal` aborts, even if `work` ignores the signal. */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(signal.reason instanceof Error ? signal.reason : new TransientTaskError("aborted"));
    };
    if (signal.aborted) return onAbort();
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (v) => {
        signal.removeEventListener("abort", onAbort);
        resolve(v);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Runs one attempt of one agent task. Never touches session state: the
 * outcome is a validated payload for the reconciler, or a classified failure.
 */
export class AgentTaskRunner {
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(
    private readonly generation: () => GenerationService = getGenerationService,
    private readonly breakerThreshold = 5,
    private readonly breakerCooldownMs = 30_000,
  ) {}

  private breakerFor(taskType: string): CircuitBreaker {
    let b = this.breakers.get(taskType);
    if (!b) {
      b = new CircuitBreaker(
        `generation:${taskType}`,
        this.breakerThreshold,
        this.breakerCooldownMs,
        (err) => classifyTaskFailure(err) === "transient",
      );
      this.breakers.set(taskType, b);
    }
    return b;
  }

  async run(request: AgentTaskRequest, role: AgentRoleConfig, opts: RunOptions): Promise<AgentTaskResult> {
    const base = {
      idempotencyKey: request.idempotencyKey,
      sessionId: request.sessionId,
      taskType: request.taskType,
      attempts: 1,
    };
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new TransientTaskError(`${request.taskType} timed out after ${role.timeoutMs}ms`)),
      role.timeoutMs,
    );
    const forwardAbort = (): void => controller.abort(new TransientTaskError("cancelled"));
    if (opts.signal.aborted) forwardAbort();
    else opts.signal.addEventListener("abort", forwardAbort, { once: true });

    try {
      const taskType = request.taskType;
      if (!isKnownTaskType(taskType)) {
        throw new PermanentTaskError(`no output contract for task type ${taskType}`);
      }
      const { text } = await this.breakerFor(taskType).call(() =>
        raceAbort(
          this.generation().generate(taskType, request.payload, role, {
            signal: controller.signal,
            onChunk: request.lane === "stream" ? opts.onChunk : undefined,
          }),
          controller.signal,
        ),
      );
      const payload = parseTaskOutput(taskType, text);
      return { ...base, outcome: "success", payload, producedAt: new Date().toISOString() };
    } catch (e) {
      const kind = classifyTaskFailure(e);
      const message = toErrorString(e);
      log.warn("agent task attempt failed", {
        task_type: request.taskType,
        session_id: request.sessionId,
        idempotency_key: request.idempotencyKey,
        kind,
        error: message,
      });
      return { ...base, outcome: "failure", error: { kind, message }, producedAt: new Date().toISOString() };
    } finally {
      clearTimeout(timer);
      opts.signal.removeEventListener("abort", forwardAbort);
    }
  }
}
