import { describe, it, expect } from "vitest";
import { join } from "path";
import {
  DEFAULT_WORKFLOW,
  findEdge,
  loadWorkflowDefinition,
  parseWorkflowDefinition,
  phaseIndex,
} from "../../src/workflowDefinition.js";

describe("workflowDefinition", () => {
  it("the shipped workflow.yaml matches the built-in default", () => {
    const loaded = loadWorkflowDefinition(join(process.cwd(), "workflow.yaml"));
    expect(loaded).toEqual(DEFAULT_WORKFLOW);
  });

  it("derives initial and terminal phases from the phase list", () => {
    expect(DEFAULT_WORKFLOW.initialPhase).toBe("Initiation");
    expect(DEFAULT_WORKFLOW.terminalPhase).toBe("Closed");
    expect(phaseIndex(DEFAULT_WORKFLOW, "Collection")).toBe(3);
    expect(phaseIndex(DEFAULT_WORKFLOW, "Nowhere")).toBe(-1);
  });

  it("fills edge defaults", () => {
    expect(findEdge(DEFAULT_WORKFLOW, "Presentation", "Closed")).toEqual({
      from: "Presentation",
      to: "Closed",
      rollback: false,
      requires: [],
    });
    expect(findEdge(DEFAULT_WORKFLOW, "Exploration", "Initiation")?.rollback).toBe(true);
    expect(findEdge(DEFAULT_WORKFLOW, "Initiation", "Collection")).toBeUndefined();
  });

  it("rejects forward edges that skip a phase", () => {
    expect(() =>
      parseWorkflowDefinition({ phases: ["A", "B", "C"], transitions: [{ from: "A", to: "C" }] }),
    ).toThrow("forward edge A -> C must target the next phase");
  });

  it("rejects rollback edges that point forward", () => {
    expect(() =>
      parseWorkflowDefinition({ phases: ["A", "B"], transitions: [{ from: "A", to: "B", rollback: true }] }),
    ).toThrow("rollback edge A -> B must point backwards");
  });

  it("rejects edges out of the terminal phase and unknown phases", () => {
    expect(() =>
      parseWorkflowDefinition({ phases: ["A", "B"], transitions: [{ from: "B", to: "A", rollback: true }] }),
    ).toThrow("terminal phase B cannot have outgoing edges");
    expect(() =>
      parseWorkflowDefinition({ phases: ["A", "B"], transitions: [{ from: "A", to: "Z" }] }),
    ).toThrow("edge A -> Z names an unknown phase");
  });

  it("rejects duplicate phases and unknown gate rules", () => {
    expect(() => parseWorkflowDefinition({ phases: ["A", "A"], transitions: [] })).toThrow("phases must be unique");
    expect(() =>
      parseWorkflowDefinition({
        phases: ["A", "B"],
        transitions: [{ from: "A", to: "B", requires: [{ kind: "min_votes", count: 2 }] }],
      }),
    ).toThrow();
  });
});
