import type { AppConfig, Credentials } from "../config.js";
import type { LLMProvider } from "./LLMProvider.js";
import { MockProvider } from "./MockProvider.js";
import { OpenAIProvider } from "./OpenAIProvider.js";

export function createProvider(config: AppConfig, credentials: Credentials): LLMProvider {
  if (config.llmProvider === "mock") {
    return new MockProvider();
  }
  return new OpenAIProvider(credentials.openaiApiKey, config.model, config.temperature);
}
