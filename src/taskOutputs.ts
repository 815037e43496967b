import { z } from "zod";
import { PermanentTaskError } from "./errors.js";
import { scopeElementSchema, type SessionMutation } from "./sessionState.js";

/**
 * What each agent task type produces and how that output becomes a session
 * mutation. The runner calls `parse` on raw model text (malformed output is a
 * permanent failure); the reconciler calls `toMutation` on the stored payload.
 */
export interface TaskOutputSpec<T extends Record<string, unknown>> {
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  parse(text: string): T;
  toMutation(payload: T): SessionMutation;
}

/** Strip markdown code fences models like to wrap JSON in, then parse. */
export function parseJsonOutput(text: string): unknown {
  const cleaned = text
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "")
    .trim();
  try {
    return JSON.parse(cleaned) as unknown;
  } catch (e) {
    throw new PermanentTaskError(`model output is not valid JSON: ${cleaned.slice(0, 120)}`, { cause: e });
  }
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, taskType: string): T {
  const res = schema.safeParse(value);
  if (!res.success) {
    const issue = res.error.issues[0];
    throw new PermanentTaskError(
      `${taskType} output failed validation: ${issue ? `${issue.path.join(".") || "(root)"} ${issue.message}` : "invalid"}`,
    );
  }
  return res.data;
}

function cleanText(text: string): string {
  return text.trim().replace(/^["']|["']$/g, "").trim();
}

const textSchema = z.object({ text: z.string().trim().min(1) });
const keywordsSchema = z.object({ keywords: z.array(z.string().trim().min(1)).min(1) });
const scopeSchema = z.object({ scopeElements: z.array(scopeElementSchema).min(1) });
const feasibilitySchema = z.object({
  score: z.number().min(0).max(10),
  isNiche: z.boolean().default(false),
});

const refineQuestion: TaskOutputSpec<z.infer<typeof textSchema>> = {
  schema: textSchema,
  parse: (text) => validate(textSchema, { text: cleanText(text) }, "refine_question"),
  toMutation: (p) => ({ kind: "set_question_text", text: p.text }),
};

const extractKeywords: TaskOutputSpec<z.infer<typeof keywordsSchema>> = {
  schema: keywordsSchema,
  parse: (text) => validate(keywordsSchema, parseJsonOutput(text), "extract_keywords"),
  toMutation: (p) => ({ kind: "add_keywords", keywords: p.keywords }),
};

const suggestScope: TaskOutputSpec<z.infer<typeof scopeSchema>> = {
  schema: scopeSchema,
  parse: (text) => validate(scopeSchema, parseJsonOutput(text), "suggest_scope"),
  toMutation: (p) => ({ kind: "add_scope_elements", elements: p.scopeElements }),
};

const scoreFeasibility: TaskOutputSpec<z.infer<typeof feasibilitySchema>> = {
  schema: feasibilitySchema,
  parse: (text) => validate(feasibilitySchema, parseJsonOutput(text), "score_feasibility"),
  toMutation: (p) => ({ kind: "set_assessment", score: p.score, isNiche: p.isNiche }),
};

const draftReflection: TaskOutputSpec<z.infer<typeof textSchema>> = {
  schema: textSchema,
  parse: (text) => validate(textSchema, { text: text.trim() }, "draft_reflection"),
  toMutation: (p) => ({ kind: "append_reflection", author: "agent", text: p.text }),
};

const TASK_OUTPUTS = {
  refine_question: refineQuestion,
  extract_keywords: extractKeywords,
  suggest_scope: suggestScope,
  score_feasibility: scoreFeasibility,
  draft_reflection: draftReflection,
} as const;

export type TaskType = keyof typeof TASK_OUTPUTS;

export function isKnownTaskType(taskType: string): taskType is TaskType {
  return Object.prototype.hasOwnProperty.call(TASK_OUTPUTS, taskType);
}

/** Raw model text -> validated payload. Throws PermanentTaskError. */
export function parseTaskOutput(taskType: TaskType, text: string): Record<string, unknown> {
  return TASK_OUTPUTS[taskType].parse(text);
}

/** Stored payload -> the session mutation it stands for. Throws PermanentTaskError. */
export function taskOutputToMutation(taskType: TaskType, payload: Record<string, unknown>): SessionMutation {
  switch (taskType) {
    case "refine_question":
      return refineQuestion.toMutation(validate(refineQuestion.schema, payload, taskType));
    case "extract_keywords":
      return extractKeywords.toMutation(validate(extractKeywords.schema, payload, taskType));
    case "suggest_scope":
      return suggestScope.toMutation(validate(suggestScope.schema, payload, taskType));
    case "score_feasibility":
      return scoreFeasibility.toMutation(validate(scoreFeasibility.schema, payload, taskType));
    case "draft_reflection":
      return draftReflection.toMutation(validate(draftReflection.schema, payload, taskType));
  }
}
