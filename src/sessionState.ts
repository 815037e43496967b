import { z } from "zod";
import { InvalidMutationError, QuestionLockedError, SessionClosedError } from "./errors.js";

/* ---- Snapshot shape ---- */

export const questionStatusSchema = z.enum(["Draft", "Locked"]);
export const feasibilitySchema = z.enum(["HIGH", "MEDIUM", "LOW"]);
export const reflectionAuthorSchema = z.enum(["agent", "user"]);

export const scopeElementSchema = z.object({
  name: z.string().trim().min(1).max(255),
  description: z.string().trim().max(2000).default(""),
});

export const reflectionEntrySchema = z.object({
  timestamp: z.string(),
  author: reflectionAuthorSchema,
  text: z.string(),
});

export const assessmentSchema = z.object({
  score: z.number().min(0).max(10),
  isNiche: z.boolean(),
  feasibility: feasibilitySchema,
  resourceSuggestion: z.string(),
  /** Question text the assessment was computed for. */
  questionText: z.string(),
});

export const sessionStateSchema = z.object({
  sessionId: z.string().min(1),
  phase: z.string().min(1),
  question: z.object({ text: z.string(), status: questionStatusSchema }),
  keywords: z.array(z.string()),
  scopeElements: z.array(scopeElementSchema),
  reflectionLog: z.array(reflectionEntrySchema),
  assessment: assessmentSchema.nullable(),
  version: z.number().int().positive(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type QuestionStatus = z.infer<typeof questionStatusSchema>;
export type Feasibility = z.infer<typeof feasibilitySchema>;
export type ReflectionAuthor = z.infer<typeof reflectionAuthorSchema>;
export type ScopeElement = z.infer<typeof scopeElementSchema>;
export type ReflectionEntry = z.infer<typeof reflectionEntrySchema>;
export type FeasibilityAssessment = z.infer<typeof assessmentSchema>;
export type SessionState = z.infer<typeof sessionStateSchema>;

/* ---- Mutations ---- */

export const MAX_KEYWORD_LENGTH = 100;

export const sessionMutationSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("set_question_text"), text: z.string() }),
  z.object({ kind: z.literal("lock_question") }),
  z.object({ kind: z.literal("unlock_question") }),
  z.object({ kind: z.literal("add_keywords"), keywords: z.array(z.string()).min(1) }),
  z.object({ kind: z.literal("remove_keyword"), keyword: z.string() }),
  z.object({ kind: z.literal("add_scope_elements"), elements: z.array(scopeElementSchema).min(1) }),
  z.object({ kind: z.literal("append_reflection"), author: reflectionAuthorSchema, text: z.string() }),
  z.object({ kind: z.literal("set_assessment"), score: z.number().min(0).max(10), isNiche: z.boolean() }),
]);

export type SessionMutation = z.infer<typeof sessionMutationSchema>;
export type MutationKind = SessionMutation["kind"];

/**
 * Mutations whose effect does not depend on the snapshot they were computed
 * against. A late agent result of one of these kinds is re-applied onto the
 * latest version.
 */
const COMMUTATIVE_KINDS: ReadonlySet<MutationKind> = new Set<MutationKind>([
  "add_keywords",
  "add_scope_elements",
  "append_reflection",
]);

export function isCommutative(mutation: SessionMutation): boolean {
  return COMMUTATIVE_KINDS.has(mutation.kind);
}

export interface MutationContext {
  now: Date;
  initialPhase: string;
  terminalPhase: string;
}

export interface MutationOutcome {
  /** False when the mutation was a no-op (e.g. every keyword already present). */
  changed: boolean;
  state: SessionState;
}

export function createSessionState(
  sessionId: string,
  initialPhase: string,
  now: Date,
  questionText = "",
): SessionState {
  const ts = now.toISOString();
  return {
    sessionId,
    phase: initialPhase,
    question: { text: questionText.trim(), status: "Draft" },
    keywords: [],
    scopeElements: [],
    reflectionLog: [],
    assessment: null,
    version: 1,
    createdAt: ts,
    updatedAt: ts,
  };
}

function bump(state: SessionState, patch: Partial<SessionState>, now: Date): MutationOutcome {
  return {
    changed: true,
    state: { ...state, ...patch, version: state.version + 1, updatedAt: now.toISOString() },
  };
}

function unchanged(state: SessionState): MutationOutcome {
  return { changed: false, state };
}

function normalizeKeyword(raw: string): string {
  const kw = raw.trim().replace(/\s+/g, " ");
  if (!kw) throw new InvalidMutationError("keyword must not be empty");
  if (kw.length > MAX_KEYWORD_LENGTH) {
    throw new InvalidMutationError(`keyword longer than ${MAX_KEYWORD_LENGTH} characters`);
  }
  return kw;
}

/**
 * Pure state transition for one mutation. Returns a new snapshot with
 * version + 1, or the input snapshot untouched when nothing changes.
 */
export function applyMutation(
  state: SessionState,
  mutation: SessionMutation,
  ctx: MutationContext,
): MutationOutcome {
  if (state.phase === ctx.terminalPhase) throw new SessionClosedError(state.sessionId);
  const { now } = ctx;

  switch (mutation.kind) {
    case "set_question_text": {
      if (state.question.status === "Locked") throw new QuestionLockedError(state.sessionId);
      const text = mutation.text.trim();
      if (!text) throw new InvalidMutationError("question text must not be empty");
      if (text === state.question.text) return unchanged(state);
      return bump(state, { question: { text, status: "Draft" } }, now);
    }
    case "lock_question": {
      if (state.question.status === "Locked") throw new InvalidMutationError("question is already locked");
      if (!state.question.text) throw new InvalidMutationError("cannot lock an empty question");
      return bump(state, { question: { ...state.question, status: "Locked" } }, now);
    }
    case "unlock_question": {
      if (state.question.status !== "Locked") throw new InvalidMutationError("question is not locked");
      if (state.phase !== ctx.initialPhase) {
        throw new InvalidMutationError(`question can only be unlocked in phase ${ctx.initialPhase}`);
      }
      return bump(state, { question: { ...state.question, status: "Draft" } }, now);
    }
    case "add_keywords": {
      const seen = new Set(state.keywords.map((k) => k.toLowerCase()));
      const added: string[] = [];
      for (const raw of mutation.keywords) {
        const kw = normalizeKeyword(raw);
        const key = kw.toLowerCase();
        if (seen.has(key)) continue;
        seen.add(key);
        added.push(kw);
      }
      if (added.length === 0) return unchanged(state);
      return bump(state, { keywords: [...state.keywords, ...added] }, now);
    }
    case "remove_keyword": {
      const key = mutation.keyword.trim().toLowerCase();
      const keywords = state.keywords.filter((k) => k.toLowerCase() !== key);
      if (keywords.length === state.keywords.length) {
        throw new InvalidMutationError(`keyword "${mutation.keyword}" is not in the session`);
      }
      return bump(state, { keywords }, now);
    }
    case "add_scope_elements": {
      const seen = new Set(state.scopeElements.map((e) => e.name.toLowerCase()));
      const added: ScopeElement[] = [];
      for (const el of mutation.elements) {
        const name = el.name.trim();
        if (!name) throw new InvalidMutationError("scope element name must not be empty");
        if (seen.has(name.toLowerCase())) continue;
        seen.add(name.toLowerCase());
        added.push({ name, description: el.description.trim() });
      }
      if (added.length === 0) return unchanged(state);
      return bump(state, { scopeElements: [...state.scopeElements, ...added] }, now);
    }
    case "append_reflection": {
      const text = mutation.text.trim();
      if (!text) throw new InvalidMutationError("reflection text must not be empty");
      const entry: ReflectionEntry = { timestamp: now.toISOString(), author: mutation.author, text };
      return bump(state, { reflectionLog: [...state.reflectionLog, entry] }, now);
    }
    case "set_assessment": {
      if (!state.question.text) throw new InvalidMutationError("cannot assess an empty question");
      const feasibility = determineFeasibility(mutation.score, mutation.isNiche);
      const assessment: FeasibilityAssessment = {
        score: mutation.score,
        isNiche: mutation.isNiche,
        feasibility,
        resourceSuggestion: resourceSuggestion(feasibility),
        questionText: state.question.text,
      };
      return bump(state, { assessment }, now);
    }
  }
}

/** Phase change as a snapshot transition (gate evaluation happens before this). */
export function withPhase(state: SessionState, phase: string, now: Date): SessionState {
  return { ...state, phase, version: state.version + 1, updatedAt: now.toISOString() };
}

/**
 * For a non-commutative mutation computed against `base`, return why it no
 * longer fits `current`, or null when the fields it depends on are unchanged.
 */
export function incompatibleChange(
  base: SessionState,
  current: SessionState,
  mutation: SessionMutation,
): string | null {
  if (isCommutative(mutation)) return null;
  switch (mutation.kind) {
    case "set_question_text":
    case "lock_question":
    case "unlock_question":
      if (current.question.status !== base.question.status) return "question status changed";
      if (current.question.text !== base.question.text) return "question text changed";
      return null;
    case "set_assessment":
      if (current.question.text !== base.question.text) return "question text changed";
      return null;
    case "remove_keyword": {
      const a = [...base.keywords].map((k) => k.toLowerCase()).sort().join("\n");
      const b = [...current.keywords].map((k) => k.toLowerCase()).sort().join("\n");
      return a === b ? null : "keywords changed";
    }
    default:
      return null;
  }
}

/* ---- Feasibility ---- */

export function determineFeasibility(score: number, isNiche: boolean): Feasibility {
  if (isNiche || score < 4) return "LOW";
  if (score >= 8) return "HIGH";
  return "MEDIUM";
}

const RESOURCE_SUGGESTIONS: Record<Feasibility, string> = {
  HIGH: "Focus the next search on specialised academic databases targeting the specific geographical and time scope.",
  MEDIUM: "Combine general search engines with credible institutional reports to solidify the topic.",
  LOW: "The topic is niche or information-scarce. Start with broad keyword searches and general reference works before narrowing down.",
};

export function resourceSuggestion(feasibility: Feasibility): string {
  return RESOURCE_SUGGESTIONS[feasibility];
}

export const FEASIBILITY_RANK: Record<Feasibility, number> = { LOW: 0, MEDIUM: 1, HIGH: 2 };
