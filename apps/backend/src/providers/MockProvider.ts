import type { ChatMessage, LLMProvider, OracleReply } from "./LLMProvider.js";

// Echoes the question instead of calling a model. Search tools still hit
// Tavily and arXiv, so both API keys stay required.
export class MockProvider implements LLMProvider {
  readonly name = "mock";

  async invoke(messages: readonly ChatMessage[]): Promise<OracleReply> {
    const lastHuman = [...messages].reverse().find((message) => message.role === "human");
    const compact = (lastHuman?.content ?? "").replace(/\s+/g, " ").trim();
    const content = compact.length > 240 ? `${compact.slice(0, 237)}...` : compact;
    return { content };
  }
}
