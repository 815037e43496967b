import { describe, it, expect } from "vitest";
import { checkRule, evaluateGate } from "../../src/gateEvaluator.js";
import { applyMutation, createSessionState, withPhase, type SessionState } from "../../src/sessionState.js";
import { DEFAULT_WORKFLOW } from "../../src/workflowDefinition.js";

const NOW = new Date("2026-03-01T10:00:00.000Z");
const ctx = { now: NOW, initialPhase: "Initiation", terminalPhase: "Closed" };

function session(question = "How did rail expansion shape Lyon?"): SessionState {
  return createSessionState("s-1", "Initiation", NOW, question);
}

describe("evaluateGate", () => {
  it("lists every unmet condition of Initiation -> Exploration in declaration order", () => {
    const s = applyMutation(session(), { kind: "add_keywords", keywords: ["rail"] }, ctx).state;
    expect(evaluateGate(s, "Exploration", DEFAULT_WORKFLOW)).toEqual({
      allowed: false,
      reasons: ["research question must be locked", "at least 3 keywords required (have 1)"],
    });
  });

  it("allows Initiation -> Exploration once the question is locked with three keywords", () => {
    let s = applyMutation(session(), { kind: "lock_question" }, ctx).state;
    s = applyMutation(s, { kind: "add_keywords", keywords: ["rail", "Lyon", "industry"] }, ctx).state;
    expect(evaluateGate(s, "Exploration", DEFAULT_WORKFLOW)).toEqual({ allowed: true, reasons: [] });
  });

  it("denies skipping a phase", () => {
    expect(evaluateGate(session(), "Formulation", DEFAULT_WORKFLOW)).toEqual({
      allowed: false,
      reasons: ["no transition declared from Initiation to Formulation"],
    });
  });

  it("denies unknown phases and self transitions", () => {
    expect(evaluateGate(session(), "Nowhere", DEFAULT_WORKFLOW).reasons).toEqual(["unknown phase Nowhere"]);
    expect(evaluateGate(session(), "Initiation", DEFAULT_WORKFLOW).reasons).toEqual([
      "session is already in phase Initiation",
    ]);
  });

  it("allows the declared rollback from Exploration without conditions", () => {
    const s = withPhase(session(), "Exploration", NOW);
    expect(evaluateGate(s, "Initiation", DEFAULT_WORKFLOW).allowed).toBe(true);
  });

  it("denies rollbacks that are not declared", () => {
    const s = withPhase(session(), "Collection", NOW);
    expect(evaluateGate(s, "Formulation", DEFAULT_WORKFLOW).allowed).toBe(false);
  });

  it("does not mutate the snapshot", () => {
    const s = session();
    const before = JSON.stringify(s);
    evaluateGate(s, "Exploration", DEFAULT_WORKFLOW);
    expect(JSON.stringify(s)).toBe(before);
  });
});

describe("checkRule", () => {
  it("treats an assessment of an older question as outdated", () => {
    let s = applyMutation(session(), { kind: "set_assessment", score: 9, isNiche: false }, ctx).state;
    expect(checkRule(s, { kind: "assessment_present" })).toBeNull();
    s = applyMutation(s, { kind: "set_question_text", text: "A different question?" }, ctx).state;
    expect(checkRule(s, { kind: "assessment_present" })).toBe(
      "feasibility assessment is outdated for the current question",
    );
  });

  it("compares feasibility levels by rank", () => {
    const low = applyMutation(session(), { kind: "set_assessment", score: 2, isNiche: false }, ctx).state;
    expect(checkRule(low, { kind: "min_feasibility", level: "MEDIUM" })).toBe(
      "feasibility of at least MEDIUM required (have LOW)",
    );
    const high = applyMutation(session(), { kind: "set_assessment", score: 9, isNiche: false }, ctx).state;
    expect(checkRule(high, { kind: "min_feasibility", level: "MEDIUM" })).toBeNull();
    expect(checkRule(session(), { kind: "min_feasibility", level: "LOW" })).toBe(
      "feasibility of at least LOW required (not assessed)",
    );
  });

  it("counts scope elements and reflections", () => {
    const s = session();
    expect(checkRule(s, { kind: "min_scope_elements", count: 1 })).toBe(
      "at least 1 scope elements required (have 0)",
    );
    expect(checkRule(s, { kind: "min_reflections", count: 0 })).toBeNull();
  });
});
