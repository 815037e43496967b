import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { feasibilitySchema } from "./sessionState.js";

/**
 * Phase list, declared transition edges and the gate rules attached to each
 * edge. Loaded from workflow.yaml; DEFAULT_WORKFLOW mirrors the shipped file.
 */

export const gateRuleSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("question_locked") }),
  z.object({ kind: z.literal("min_keywords"), count: z.number().int().nonnegative() }),
  z.object({ kind: z.literal("min_scope_elements"), count: z.number().int().nonnegative() }),
  z.object({ kind: z.literal("assessment_present") }),
  z.object({ kind: z.literal("min_feasibility"), level: feasibilitySchema }),
  z.object({ kind: z.literal("min_reflections"), count: z.number().int().nonnegative() }),
]);

export type GateRule = z.infer<typeof gateRuleSchema>;

export const transitionEdgeSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  /** Backward edge; only declared rollback edges may move against phase order. */
  rollback: z.boolean().default(false),
  requires: z.array(gateRuleSchema).default([]),
});

export type TransitionEdge = z.infer<typeof transitionEdgeSchema>;

const workflowFileSchema = z
  .object({
    phases: z.array(z.string().min(1)).min(2),
    transitions: z.array(transitionEdgeSchema),
  })
  .superRefine((wf, ctx) => {
    const index = new Map(wf.phases.map((p, i) => [p, i]));
    if (index.size !== wf.phases.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "phases must be unique" });
    }
    const terminal = wf.phases[wf.phases.length - 1];
    const seen = new Set<string>();
    for (const edge of wf.transitions) {
      const from = index.get(edge.from);
      const to = index.get(edge.to);
      if (from === undefined || to === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `edge ${edge.from} -> ${edge.to} names an unknown phase` });
        continue;
      }
      if (edge.from === terminal) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `terminal phase ${terminal} cannot have outgoing edges` });
      }
      if (edge.rollback ? to >= from : to !== from + 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: edge.rollback
            ? `rollback edge ${edge.from} -> ${edge.to} must point backwards`
            : `forward edge ${edge.from} -> ${edge.to} must target the next phase`,
        });
      }
      const key = `${edge.from}->${edge.to}`;
      if (seen.has(key)) ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate edge ${key}` });
      seen.add(key);
    }
  });

export interface WorkflowDefinition {
  phases: string[];
  initialPhase: string;
  terminalPhase: string;
  transitions: TransitionEdge[];
}

function toDefinition(parsed: z.infer<typeof workflowFileSchema>): WorkflowDefinition {
  return {
    phases: parsed.phases,
    initialPhase: parsed.phases[0],
    terminalPhase: parsed.phases[parsed.phases.length - 1],
    transitions: parsed.transitions,
  };
}

export function parseWorkflowDefinition(raw: unknown): WorkflowDefinition {
  return toDefinition(workflowFileSchema.parse(raw));
}

export function loadWorkflowDefinition(path: string): WorkflowDefinition {
  const raw = readFileSync(path, "utf-8");
  return parseWorkflowDefinition(parseYaml(raw));
}

export function findEdge(def: WorkflowDefinition, from: string, to: string): TransitionEdge | undefined {
  return def.transitions.find((t) => t.from === from && t.to === to);
}

export function phaseIndex(def: WorkflowDefinition, phase: string): number {
  return def.phases.indexOf(phase);
}

export const DEFAULT_WORKFLOW: WorkflowDefinition = parseWorkflowDefinition({
  phases: ["Initiation", "Exploration", "Formulation", "Collection", "Presentation", "Closed"],
  transitions: [
    {
      from: "Initiation",
      to: "Exploration",
      requires: [{ kind: "question_locked" }, { kind: "min_keywords", count: 3 }],
    },
    {
      from: "Exploration",
      to: "Formulation",
      requires: [
        { kind: "min_keywords", count: 5 },
        { kind: "min_scope_elements", count: 1 },
      ],
    },
    {
      from: "Formulation",
      to: "Collection",
      requires: [{ kind: "assessment_present" }, { kind: "min_feasibility", level: "MEDIUM" }],
    },
    { from: "Collection", to: "Presentation", requires: [{ kind: "min_reflections", count: 1 }] },
    { from: "Presentation", to: "Closed" },
    { from: "Exploration", to: "Initiation", rollback: true },
  ],
});
