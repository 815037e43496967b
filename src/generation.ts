import { setMaxListeners } from "events";
import { Agent } from "@mastra/core/agent";
import type { AgentRoleConfig } from "./agentRoles.js";
import { PermanentTaskError } from "./errors.js";
import { logger } from "./logger.js";
import { getChatModelConfig } from "./modelConfig.js";

export interface GenerateOptions {
  signal: AbortSignal;
  /** Stream-lane roles get text deltas here, in emission order. */
  onChunk?: (chunk: string) => void;
}

export interface GenerationResult {
  text: string;
}

/** The single boundary to the model provider. Implementations never touch session state. */
export interface GenerationService {
  generate(
    taskType: string,
    payload: Record<string, unknown>,
    role: AgentRoleConfig,
    opts: GenerateOptions,
  ): Promise<GenerationResult>;
  close(): Promise<void>;
}

export function buildPrompt(taskType: string, payload: Record<string, unknown>): string {
  return `Task: ${taskType}\nInput (JSON):\n${JSON.stringify(payload, null, 2)}`;
}

/** Mastra agents built from role config; one cached agent per task type until its config changes. */
export class MastraGenerationService implements GenerationService {
  private readonly agents = new Map<string, { fingerprint: string; agent: Agent }>();

  private agentFor(role: AgentRoleConfig): Agent {
    const model = getChatModelConfig(role.modelParams.model);
    if (!model) {
      throw new PermanentTaskError("no chat model configured (set OPENAI_API_KEY or OLLAMA_BASE_URL)");
    }
    const fingerprint = JSON.stringify([role.instructions, model.id, model.url]);
    const cached = this.agents.get(role.taskType);
    if (cached && cached.fingerprint === fingerprint) return cached.agent;
    const agent = new Agent({
      id: `${role.taskType}-agent`,
      name: role.promptRef,
      instructions: role.instructions,
      model,
    });
    this.agents.set(role.taskType, { fingerprint, agent });
    return agent;
  }

  async generate(
    taskType: string,
    payload: Record<string, unknown>,
    role: AgentRoleConfig,
    opts: GenerateOptions,
  ): Promise<GenerationResult> {
    const agent = this.agentFor(role);
    const prompt = buildPrompt(taskType, payload);
    setMaxListeners(64, opts.signal);
    const modelSettings = {
      temperature: role.modelParams.temperature,
      maxOutputTokens: role.modelParams.maxTokens,
    };

    if (!opts.onChunk) {
      const result = await agent.generate(prompt, { maxSteps: 1, abortSignal: opts.signal, modelSettings });
      return { text: result.text ?? "" };
    }

    const output = await agent.stream(prompt, { maxSteps: 1, abortSignal: opts.signal, modelSettings });
    const reader = output.textStream.getReader();
    let text = "";
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        if (!value) continue;
        text += value;
        opts.onChunk(value);
      }
    } finally {
      reader.releaseLock();
    }
    return { text };
  }

  async close(): Promise<void> {
    this.agents.clear();
  }
}

let service: GenerationService | null = null;

/** Process-wide generation handle, created on first use. */
export function getGenerationService(): GenerationService {
  if (!service) {
    service = new MastraGenerationService();
    logger.debug("generation service initialised");
  }
  return service;
}

export async function closeGenerationService(): Promise<void> {
  const s = service;
  service = null;
  if (s) await s.close();
}

/** Swap the process-wide handle (tests). Pass null to go back to lazy creation. */
export function _setGenerationServiceForTest(s: GenerationService | null): void {
  service = s;
}
