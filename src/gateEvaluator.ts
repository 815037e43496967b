import type { SessionState } from "./sessionState.js";
import { FEASIBILITY_RANK } from "./sessionState.js";
import { findEdge, phaseIndex, type GateRule, type WorkflowDefinition } from "./workflowDefinition.js";

export interface GateDecision {
  allowed: boolean;
  reasons: string[];
}

/** Reason for one rule, or null when the snapshot satisfies it. */
export function checkRule(snapshot: SessionState, rule: GateRule): string | null {
  switch (rule.kind) {
    case "question_locked":
      return snapshot.question.status === "Locked" ? null : "research question must be locked";
    case "min_keywords":
      return snapshot.keywords.length >= rule.count
        ? null
        : `at least ${rule.count} keywords required (have ${snapshot.keywords.length})`;
    case "min_scope_elements":
      return snapshot.scopeElements.length >= rule.count
        ? null
        : `at least ${rule.count} scope elements required (have ${snapshot.scopeElements.length})`;
    case "assessment_present":
      if (!snapshot.assessment) return "feasibility assessment required";
      return snapshot.assessment.questionText === snapshot.question.text
        ? null
        : "feasibility assessment is outdated for the current question";
    case "min_feasibility":
      if (!snapshot.assessment) return `feasibility of at least ${rule.level} required (not assessed)`;
      return FEASIBILITY_RANK[snapshot.assessment.feasibility] >= FEASIBILITY_RANK[rule.level]
        ? null
        : `feasibility of at least ${rule.level} required (have ${snapshot.assessment.feasibility})`;
    case "min_reflections":
      return snapshot.reflectionLog.length >= rule.count
        ? null
        : `at least ${rule.count} reflection log entries required (have ${snapshot.reflectionLog.length})`;
  }
}

/**
 * Decide whether `snapshot` may move to `target`. Pure and total: every rule
 * of the declared edge is checked and each failure contributes a reason, in
 * declaration order. Undeclared edges are denied outright.
 */
export function evaluateGate(
  snapshot: SessionState,
  target: string,
  def: WorkflowDefinition,
): GateDecision {
  const from = snapshot.phase;
  if (phaseIndex(def, target) < 0) {
    return { allowed: false, reasons: [`unknown phase ${target}`] };
  }
  if (from === target) {
    return { allowed: false, reasons: [`session is already in phase ${target}`] };
  }
  const edge = findEdge(def, from, target);
  if (!edge) {
    return { allowed: false, reasons: [`no transition declared from ${from} to ${target}`] };
  }
  const reasons: string[] = [];
  for (const rule of edge.requires) {
    const reason = checkRule(snapshot, rule);
    if (reason) reasons.push(reason);
  }
  return { allowed: reasons.length === 0, reasons };
}
