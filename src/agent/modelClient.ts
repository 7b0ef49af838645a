import { Env } from "../env.js";
import { AnthropicModelClient } from "./anthropicClient.js";
import type { ModelClient } from "./model.js";
import { OllamaModelClient } from "./ollamaClient.js";

export type ModelProvider = "anthropic" | "ollama";

export function createModelClient(provider: ModelProvider = Env.MODEL_PROVIDER): ModelClient {
  if (provider === "ollama") {
    return new OllamaModelClient({ baseUrl: Env.OLLAMA_URL });
  }
  return new AnthropicModelClient();
}

export function getDefaultModel(provider: ModelProvider = Env.MODEL_PROVIDER): string {
  return provider === "ollama" ? Env.OLLAMA_MODEL : Env.ANTHROPIC_MODEL;
}
