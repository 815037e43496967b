/**
 * OpenAI-compatible model config for the agent roles (OpenAI, or Ollama when OLLAMA_BASE_URL is set).
 *
 * Mastra appends "/chat/completions" to the base URL. OpenAI uses base "https://api.openai.com/v1";
 * Ollama's OpenAI-compatible API lives under "/v1", so the Ollama base is normalized to end with it.
 */

const DEFAULT_OPENAI_BASE = "https://api.openai.com/v1";
const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";
const DEFAULT_OLLAMA_MODEL = "qwen3:8b";

export type ModelId = `${string}/${string}`;

export type ChatModelConfig = {
  id: ModelId;
  url: string;
  apiKey: string;
};

function isModelId(raw: string): raw is ModelId {
  return raw.includes("/");
}

/** "gpt-4o-mini" -> "openai/gpt-4o-mini"; ids that already name a provider pass through. */
export function toModelId(raw: string): ModelId {
  return isModelId(raw) ? raw : `openai/${raw}`;
}

function openAICompatibleBaseUrl(rawBase: string, isOllama: boolean): string {
  const base = rawBase.trim().replace(/\/+$/, "");
  if (isOllama && !base.endsWith("/v1")) return `${base}/v1`;
  return base;
}

export function getOllamaBaseUrl(): string | null {
  const u = process.env.OLLAMA_BASE_URL?.trim();
  return u || null;
}

/**
 * Chat model config for one agent role. `model` (from the role's modelParams) wins over
 * RESEARCH_MODEL / OPENAI_MODEL. Returns null when neither Ollama nor an OpenAI key is configured.
 */
export function getChatModelConfig(model?: string): ChatModelConfig | null {
  const ollamaBase = getOllamaBaseUrl();
  if (ollamaBase) {
    return {
      id: toModelId(model || process.env.RESEARCH_MODEL?.trim() || DEFAULT_OLLAMA_MODEL),
      url: openAICompatibleBaseUrl(ollamaBase, true),
      apiKey: "ollama",
    };
  }
  const apiKey = process.env.OPENAI_API_KEY?.trim();
  if (!apiKey) return null;
  return {
    id: toModelId(model || process.env.OPENAI_MODEL?.trim() || DEFAULT_OPENAI_MODEL),
    url: openAICompatibleBaseUrl(process.env.OPENAI_BASE_URL?.trim() || DEFAULT_OPENAI_BASE, false),
    apiKey,
  };
}
