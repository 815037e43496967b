import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { TaskDispatcher, deriveIdempotencyKey } from "../../src/taskDispatcher.js";
import { AgentTaskRunner, type AgentTaskResult } from "../../src/agentRunner.js";
import { StaticRoleConfigSource, type AgentRoleConfig } from "../../src/agentRoles.js";
import { ResultReconciler, type ReconcileOutcome } from "../../src/resultReconciler.js";
import { TaskLedger } from "../../src/taskLedger.js";
import { createSessionState, withPhase } from "../../src/sessionState.js";
import { DEFAULT_WORKFLOW } from "../../src/workflowDefinition.js";
import {
  DuplicateInFlightError,
  PermanentTaskError,
  ServiceUnavailableError,
  SessionClosedError,
  SessionNotFoundError,
  TaskTypeUnknownError,
  TransientTaskError,
  UnknownRequestError,
} from "../../src/errors.js";
import {
  MemoryInFlightIndex,
  MemorySessionStore,
  RecordingPublisher,
  ScriptedGenerationService,
  deferred,
  flush,
  role,
  waitFor,
} from "../helpers/fakes.js";

const NOW = new Date("2026-03-01T10:00:00.000Z");
const KEYWORDS = '{"keywords": ["rail", "Lyon"]}';

function roleMap(...roles: AgentRoleConfig[]): Map<string, AgentRoleConfig> {
  return new Map(roles.map((r) => [r.taskType, r]));
}

describe("deriveIdempotencyKey", () => {
  it("ignores payload key order but not the session version", () => {
    const a = deriveIdempotencyKey("s-1", "extract_keywords", { a: 1, b: [1, 2] }, 3);
    const b = deriveIdempotencyKey("s-1", "extract_keywords", { b: [1, 2], a: 1 }, 3);
    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{64}$/);
    expect(deriveIdempotencyKey("s-1", "extract_keywords", { a: 1, b: [1, 2] }, 4)).not.toBe(a);
    expect(deriveIdempotencyKey("s-1", "suggest_scope", { a: 1, b: [1, 2] }, 3)).not.toBe(a);
  });
});

describe("TaskDispatcher", () => {
  let store: MemorySessionStore;
  let index: MemoryInFlightIndex;
  let ledger: TaskLedger;
  let publisher: RecordingPublisher;
  let gen: ScriptedGenerationService;
  let reconcile: Mock<(r: AgentTaskResult) => Promise<ReconcileOutcome>>;
  let dispatcher: TaskDispatcher;

  function build(laneConcurrency = { default: 2, stream: 2 }): TaskDispatcher {
    const reconciler = new ResultReconciler({ store, ledger, publisher, workflow: DEFAULT_WORKFLOW });
    reconcile = vi.fn((r: AgentTaskResult) => reconciler.reconcile(r));
    return new TaskDispatcher({
      roles: new StaticRoleConfigSource(
        roleMap(
          role("extract_keywords"),
          role("suggest_scope"),
          role("score_feasibility"),
          role("draft_reflection", { lane: "stream" }),
          role("translate"),
        ),
      ),
      ledger,
      runner: new AgentTaskRunner(() => gen),
      store,
      publisher,
      results: { reconcile },
      terminalPhase: DEFAULT_WORKFLOW.terminalPhase,
      laneConcurrency,
    });
  }

  beforeEach(async () => {
    store = new MemorySessionStore();
    index = new MemoryInFlightIndex();
    ledger = new TaskLedger(index, { ttlMs: 60_000, maxEntries: 100 });
    publisher = new RecordingPublisher();
    gen = new ScriptedGenerationService();
    dispatcher = build();
    await store.init(createSessionState("s-1", "Initiation", NOW, "How did rail reshape Lyon?"));
  });

  const submit = (taskType: string, payload: Record<string, unknown> = {}, idempotencyKey?: string) =>
    dispatcher.submit({ sessionId: "s-1", taskType, payload, idempotencyKey });

  it("accepts a task without waiting for it and applies the result later", async () => {
    const gate = deferred<string>();
    gen.script("extract_keywords", { gate });

    const accepted = await submit("extract_keywords", { hint: "transport" });
    expect(accepted).toEqual({
      accepted: true,
      idempotencyKey: deriveIdempotencyKey("s-1", "extract_keywords", { hint: "transport" }, 1),
      lane: "default",
      deduplicated: false,
    });
    expect(await dispatcher.getTaskStatus(accepted.idempotencyKey)).not.toBe("succeeded");

    gate.resolve(KEYWORDS);
    await waitFor(async () => (await dispatcher.getTaskStatus(accepted.idempotencyKey)) === "succeeded");
    expect((await store.get("s-1"))?.keywords).toEqual(["rail", "Lyon"]);
    expect(index.entries.size).toBe(0);
  });

  it("rejects a second submission for the same session and task type while one is in flight", async () => {
    const gate = deferred<string>();
    gen.script("extract_keywords", { gate });

    const first = await submit("extract_keywords");
    const again = await submit("extract_keywords").catch((e: unknown) => e);
    const other = await submit("extract_keywords", { hint: "different" }).catch((e: unknown) => e);

    expect(again).toBeInstanceOf(DuplicateInFlightError);
    expect(other).toBeInstanceOf(DuplicateInFlightError);
    expect(other).toMatchObject({ inFlightKey: first.idempotencyKey });

    gate.resolve(KEYWORDS);
    await waitFor(() => reconcile.mock.calls.length === 1);
    await waitFor(() => index.entries.size === 0);
    expect(gen.callCount("extract_keywords")).toBe(1);
    expect(store.commits).toBe(1);
  });

  it("runs different task types of one session concurrently", async () => {
    gen.script("extract_keywords", { text: KEYWORDS });
    gen.script("suggest_scope", { text: '{"scopeElements": [{"name": "Period", "description": "1850-1900"}]}' });
    await submit("extract_keywords");
    await submit("suggest_scope");
    await waitFor(() => store.commits === 2);
    const head = await store.get("s-1");
    expect(head?.keywords).toEqual(["rail", "Lyon"]);
    expect(head?.scopeElements).toEqual([{ name: "Period", description: "1850-1900" }]);
  });

  it("answers a resubmitted completed key from the cache", async () => {
    gen.script("extract_keywords", { text: KEYWORDS });
    const first = await submit("extract_keywords", {}, "client-key-1");
    await waitFor(async () => (await dispatcher.getTaskStatus("client-key-1")) === "succeeded");

    const again = await submit("extract_keywords", {}, "client-key-1");
    expect(again).toEqual({ ...first, deduplicated: true });
    expect(gen.callCount("extract_keywords")).toBe(1);
  });

  it("does not retry permanent failures", async () => {
    gen.script("extract_keywords", { error: new PermanentTaskError("request refused by policy") });
    const { idempotencyKey } = await submit("extract_keywords");
    await waitFor(async () => (await dispatcher.getTaskStatus(idempotencyKey)) === "failed");

    expect(gen.callCount("extract_keywords")).toBe(1);
    expect(publisher.state.map((m) => m.kind)).toEqual(["task_failed"]);
    expect(publisher.state[0]).toMatchObject({ reason: "request refused by policy", version: 1 });
  });

  it("retries transient failures up to the role's bound, then reports the failure", async () => {
    gen.script("extract_keywords", { error: new TransientTaskError("upstream overloaded") });
    const { idempotencyKey } = await submit("extract_keywords");
    await waitFor(async () => (await dispatcher.getTaskStatus(idempotencyKey)) === "failed");

    expect(gen.callCount("extract_keywords")).toBe(3);
    expect(reconcile).toHaveBeenCalledTimes(1);
    expect(reconcile.mock.calls[0][0]).toMatchObject({
      outcome: "failure",
      attempts: 3,
      error: { kind: "transient", message: "upstream overloaded" },
    });
    expect(index.entries.size).toBe(0);
  });

  it("recovers when a retry succeeds", async () => {
    gen.script("extract_keywords", { error: new TransientTaskError("timed out") }, { text: KEYWORDS });
    const { idempotencyKey } = await submit("extract_keywords");
    await waitFor(async () => (await dispatcher.getTaskStatus(idempotencyKey)) === "succeeded");

    expect(gen.callCount("extract_keywords")).toBe(2);
    expect(reconcile.mock.calls[0][0]).toMatchObject({ outcome: "success", attempts: 2 });
  });

  it("rejects task types without a role or without an output contract", async () => {
    await expect(submit("summarise")).rejects.toBeInstanceOf(TaskTypeUnknownError);
    await expect(submit("translate")).rejects.toBeInstanceOf(TaskTypeUnknownError);
  });

  it("rejects unknown and closed sessions", async () => {
    await expect(dispatcher.submit({ sessionId: "nope", taskType: "extract_keywords", payload: {} })).rejects.toBeInstanceOf(
      SessionNotFoundError,
    );
    await store.init(withPhase(createSessionState("s-closed", "Presentation", NOW, "Q?"), "Closed", NOW));
    await expect(
      dispatcher.submit({ sessionId: "s-closed", taskType: "extract_keywords", payload: {} }),
    ).rejects.toBeInstanceOf(SessionClosedError);
  });

  it("cancel frees the slot, notifies subscribers and never reconciles the aborted run", async () => {
    const gate = deferred<string>();
    gen.script("extract_keywords", { gate });
    const { idempotencyKey } = await submit("extract_keywords");
    await waitFor(() => gen.callCount("extract_keywords") === 1);

    await dispatcher.cancel(idempotencyKey, "user changed their mind");
    expect(await dispatcher.getTaskStatus(idempotencyKey)).toBe("cancelled");
    expect(index.entries.size).toBe(0);
    expect(gen.calls[0].signal.aborted).toBe(true);
    expect(publisher.state).toEqual([
      {
        channel: "state",
        kind: "task_cancelled",
        sessionId: "s-1",
        version: 1,
        taskType: "extract_keywords",
        idempotencyKey,
        reason: "user changed their mind",
      },
    ]);

    gate.resolve(KEYWORDS);
    await flush();
    expect(reconcile).not.toHaveBeenCalled();
    expect(store.commits).toBe(0);
    expect(await dispatcher.getTaskStatus(idempotencyKey)).toBe("cancelled");
  });

  it("runs a resubmission of a cancelled key and frees its slot afterwards", async () => {
    const gate = deferred<string>();
    gen.script("extract_keywords", { gate }, { text: KEYWORDS });
    const first = await submit("extract_keywords");
    await waitFor(() => gen.callCount("extract_keywords") === 1);
    await dispatcher.cancel(first.idempotencyKey);

    const again = await submit("extract_keywords");
    expect(again).toEqual({ accepted: true, idempotencyKey: first.idempotencyKey, lane: "default", deduplicated: false });
    await waitFor(async () => (await dispatcher.getTaskStatus(again.idempotencyKey)) === "succeeded");
    expect((await store.get("s-1"))?.keywords).toEqual(["rail", "Lyon"]);
    expect(index.entries.size).toBe(0);

    // The aborted first run finishing late must not disturb anything.
    gate.resolve('{"keywords": ["silk"]}');
    await flush();
    expect((await store.get("s-1"))?.keywords).toEqual(["rail", "Lyon"]);

    const next = await submit("extract_keywords", { hint: "industry" });
    expect(next.deduplicated).toBe(false);
    await waitFor(async () => (await dispatcher.getTaskStatus(next.idempotencyKey)) === "succeeded");
    expect(index.entries.size).toBe(0);
  });

  it("accepts the same task type again right after a cancel", async () => {
    gen.script("extract_keywords", { gate: deferred<string>() }, { text: KEYWORDS });
    const first = await submit("extract_keywords");
    await dispatcher.cancel(first.idempotencyKey);
    const second = await submit("extract_keywords", { retry: true });
    expect(second.deduplicated).toBe(false);
  });

  it("cancel of an unknown key throws UnknownRequestError", async () => {
    await expect(dispatcher.cancel("ghost")).rejects.toBeInstanceOf(UnknownRequestError);
  });

  it("cancelSession cancels every in-flight task of the session", async () => {
    gen.script("extract_keywords", { gate: deferred<string>() });
    gen.script("suggest_scope", { gate: deferred<string>() });
    await submit("extract_keywords");
    await submit("suggest_scope");
    expect(await dispatcher.cancelSession("s-1")).toBe(2);
    expect(index.entries.size).toBe(0);
    expect(await dispatcher.cancelSession("s-1")).toBe(0);
  });

  it("publishes stream chunks in order before the snapshot", async () => {
    gen.script("draft_reflection", {
      text: "Archives first. Then interviews.",
      chunks: ["Archives first.", " Then interviews."],
    });
    const { idempotencyKey, lane } = await submit("draft_reflection");
    expect(lane).toBe("stream");
    await waitFor(async () => (await dispatcher.getTaskStatus(idempotencyKey)) === "succeeded");

    expect(
      publisher.messages.map((m) => (m.channel === "stream" ? `chunk:${m.seq}:${m.chunk}` : `${m.kind}@${m.version}`)),
    ).toEqual(["chunk:0:Archives first.", "chunk:1: Then interviews.", "snapshot@2"]);
  });

  it("keeps the stream lane moving while the default lane is saturated", async () => {
    dispatcher = build({ default: 1, stream: 1 });
    const gate = deferred<string>();
    gen.script("extract_keywords", { gate });
    gen.script("score_feasibility", { text: '{"score": 7}' });
    gen.script("draft_reflection", { text: "Next: archives." });

    await submit("extract_keywords");
    await submit("score_feasibility");
    const reflection = await submit("draft_reflection");
    await waitFor(async () => (await dispatcher.getTaskStatus(reflection.idempotencyKey)) === "succeeded");

    expect(dispatcher.laneStats()).toEqual([
      { lane: "default", concurrency: 1, running: 1, queued: 1 },
      { lane: "stream", concurrency: 1, running: 0, queued: 0 },
    ]);
    gate.resolve(KEYWORDS);
    await waitFor(() => store.commits === 3);
  });

  it("reports keys held by another replica as queued", async () => {
    await index.tryAcquire({
      idempotencyKey: "remote-key",
      sessionId: "s-1",
      taskType: "suggest_scope",
      lane: "default",
      baseVersion: 1,
      acquiredAt: NOW.toISOString(),
    });
    expect(await dispatcher.getTaskStatus("remote-key")).toBe("queued");
    expect(await dispatcher.getTaskStatus("never-seen")).toBe("unknown");
  });

  it("shutdown cancels running work and refuses new submissions", async () => {
    gen.script("extract_keywords", { gate: deferred<string>() });
    const { idempotencyKey } = await submit("extract_keywords");
    await waitFor(() => gen.callCount("extract_keywords") === 1);

    await dispatcher.shutdown(1000);
    expect(await dispatcher.getTaskStatus(idempotencyKey)).toBe("cancelled");
    await expect(submit("suggest_scope")).rejects.toBeInstanceOf(ServiceUnavailableError);
  });
});
