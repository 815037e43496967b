import { describe, it, expect } from "vitest";
import {
  applyMutation,
  createSessionState,
  determineFeasibility,
  incompatibleChange,
  isCommutative,
  resourceSuggestion,
  withPhase,
  type SessionState,
} from "../../src/sessionState.js";
import { InvalidMutationError, QuestionLockedError, SessionClosedError } from "../../src/errors.js";

const T0 = new Date("2026-03-01T10:00:00.000Z");
const T1 = new Date("2026-03-01T10:05:00.000Z");
const ctx = { now: T1, initialPhase: "Initiation", terminalPhase: "Closed" };

function fresh(question = "How did rail expansion shape 19th century Lyon?"): SessionState {
  return createSessionState("s-1", "Initiation", T0, question);
}

describe("createSessionState", () => {
  it("starts at version 1 in the initial phase with a draft question", () => {
    const s = createSessionState("s-1", "Initiation", T0, "  Why do bees dance?  ");
    expect(s).toEqual({
      sessionId: "s-1",
      phase: "Initiation",
      question: { text: "Why do bees dance?", status: "Draft" },
      keywords: [],
      scopeElements: [],
      reflectionLog: [],
      assessment: null,
      version: 1,
      createdAt: "2026-03-01T10:00:00.000Z",
      updatedAt: "2026-03-01T10:00:00.000Z",
    });
  });
});

describe("applyMutation", () => {
  it("bumps the version and updatedAt on every change", () => {
    const { changed, state } = applyMutation(fresh(), { kind: "add_keywords", keywords: ["rail"] }, ctx);
    expect(changed).toBe(true);
    expect(state.version).toBe(2);
    expect(state.updatedAt).toBe("2026-03-01T10:05:00.000Z");
    expect(state.createdAt).toBe("2026-03-01T10:00:00.000Z");
  });

  it("dedupes keywords case-insensitively and collapses whitespace", () => {
    const s1 = applyMutation(fresh(), { kind: "add_keywords", keywords: ["Rail  Network", "Lyon"] }, ctx).state;
    const s2 = applyMutation(s1, { kind: "add_keywords", keywords: ["rail network", "silk", "SILK"] }, ctx).state;
    expect(s2.keywords).toEqual(["Rail Network", "Lyon", "silk"]);
    expect(s2.version).toBe(3);
  });

  it("returns the same snapshot when every keyword is already present", () => {
    const s1 = applyMutation(fresh(), { kind: "add_keywords", keywords: ["Lyon"] }, ctx).state;
    const outcome = applyMutation(s1, { kind: "add_keywords", keywords: ["lyon"] }, ctx);
    expect(outcome.changed).toBe(false);
    expect(outcome.state).toBe(s1);
  });

  it("rejects empty and overlong keywords", () => {
    expect(() => applyMutation(fresh(), { kind: "add_keywords", keywords: ["   "] }, ctx)).toThrow(
      InvalidMutationError,
    );
    expect(() => applyMutation(fresh(), { kind: "add_keywords", keywords: ["x".repeat(101)] }, ctx)).toThrow(
      "keyword longer than 100 characters",
    );
  });

  it("removes a keyword regardless of case and rejects unknown ones", () => {
    const s1 = applyMutation(fresh(), { kind: "add_keywords", keywords: ["Lyon", "silk"] }, ctx).state;
    expect(applyMutation(s1, { kind: "remove_keyword", keyword: "LYON" }, ctx).state.keywords).toEqual(["silk"]);
    expect(() => applyMutation(s1, { kind: "remove_keyword", keyword: "wool" }, ctx)).toThrow(
      'keyword "wool" is not in the session',
    );
  });

  it("locks and edits the question under the lock rules", () => {
    const locked = applyMutation(fresh(), { kind: "lock_question" }, ctx).state;
    expect(locked.question.status).toBe("Locked");
    expect(() => applyMutation(locked, { kind: "set_question_text", text: "New?" }, ctx)).toThrow(
      QuestionLockedError,
    );
    expect(() => applyMutation(locked, { kind: "lock_question" }, ctx)).toThrow("question is already locked");

    const unlocked = applyMutation(locked, { kind: "unlock_question" }, ctx).state;
    expect(unlocked.question).toEqual({ text: fresh().question.text, status: "Draft" });
  });

  it("refuses to lock an empty question", () => {
    expect(() => applyMutation(fresh(""), { kind: "lock_question" }, ctx)).toThrow("cannot lock an empty question");
  });

  it("only unlocks in the initial phase", () => {
    const locked = applyMutation(fresh(), { kind: "lock_question" }, ctx).state;
    const exploring = withPhase(locked, "Exploration", T1);
    expect(() => applyMutation(exploring, { kind: "unlock_question" }, ctx)).toThrow(
      "question can only be unlocked in phase Initiation",
    );
  });

  it("treats setting the same question text as a no-op", () => {
    const s = fresh();
    const outcome = applyMutation(s, { kind: "set_question_text", text: `  ${s.question.text} ` }, ctx);
    expect(outcome.changed).toBe(false);
  });

  it("skips scope elements whose name is already present", () => {
    const s1 = applyMutation(
      fresh(),
      { kind: "add_scope_elements", elements: [{ name: "Geography", description: " Lyon region " }] },
      ctx,
    ).state;
    const s2 = applyMutation(
      s1,
      {
        kind: "add_scope_elements",
        elements: [
          { name: "geography", description: "dup" },
          { name: "Period", description: "1830-1900" },
        ],
      },
      ctx,
    ).state;
    expect(s2.scopeElements).toEqual([
      { name: "Geography", description: "Lyon region" },
      { name: "Period", description: "1830-1900" },
    ]);
  });

  it("appends reflections stamped with the mutation time", () => {
    const s = applyMutation(fresh(), { kind: "append_reflection", author: "user", text: " First notes " }, ctx).state;
    expect(s.reflectionLog).toEqual([{ timestamp: "2026-03-01T10:05:00.000Z", author: "user", text: "First notes" }]);
  });

  it("derives feasibility and a resource suggestion from the score", () => {
    const s = applyMutation(fresh(), { kind: "set_assessment", score: 8.5, isNiche: false }, ctx).state;
    expect(s.assessment).toEqual({
      score: 8.5,
      isNiche: false,
      feasibility: "HIGH",
      resourceSuggestion: resourceSuggestion("HIGH"),
      questionText: fresh().question.text,
    });
  });

  it("rejects every mutation once the session is closed", () => {
    const closed = withPhase(fresh(), "Closed", T1);
    expect(() => applyMutation(closed, { kind: "append_reflection", author: "user", text: "late" }, ctx)).toThrow(
      SessionClosedError,
    );
  });
});

describe("determineFeasibility", () => {
  it("maps score and niche flag to a level", () => {
    expect(determineFeasibility(3.9, false)).toBe("LOW");
    expect(determineFeasibility(4, false)).toBe("MEDIUM");
    expect(determineFeasibility(7.9, false)).toBe("MEDIUM");
    expect(determineFeasibility(8, false)).toBe("HIGH");
    expect(determineFeasibility(10, true)).toBe("LOW");
  });
});

describe("incompatibleChange", () => {
  it("ignores commutative mutations", () => {
    const base = fresh();
    const current = applyMutation(base, { kind: "set_question_text", text: "Other?" }, ctx).state;
    const mutation = { kind: "add_keywords" as const, keywords: ["x"] };
    expect(isCommutative(mutation)).toBe(true);
    expect(incompatibleChange(base, current, mutation)).toBeNull();
  });

  it("flags an assessment computed for an older question", () => {
    const base = fresh();
    const current = applyMutation(base, { kind: "set_question_text", text: "Other?" }, ctx).state;
    expect(incompatibleChange(base, current, { kind: "set_assessment", score: 5, isNiche: false })).toBe(
      "question text changed",
    );
  });

  it("flags question edits after the lock status moved", () => {
    const base = fresh();
    const current = applyMutation(base, { kind: "lock_question" }, ctx).state;
    expect(incompatibleChange(base, current, { kind: "set_question_text", text: "Refined?" })).toBe(
      "question status changed",
    );
  });

  it("accepts a non-commutative mutation when its inputs did not change", () => {
    const base = fresh();
    const current = applyMutation(base, { kind: "add_keywords", keywords: ["rail"] }, ctx).state;
    expect(incompatibleChange(base, current, { kind: "set_assessment", score: 5, isNiche: false })).toBeNull();
  });
});
