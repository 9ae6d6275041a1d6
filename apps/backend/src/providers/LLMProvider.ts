export type ChatRole = "system" | "human" | "assistant" | "tool";

export interface ToolCall {
  id: string;
  name: string;
  arguments: string;
}

export interface ChatMessage {
  role: ChatRole;
  content: string;
  toolCalls?: ToolCall[];
  toolCallId?: string;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface OracleReply {
  content: string;
}

export interface ToolCallingReply extends OracleReply {
  toolCalls: ToolCall[];
}

export interface LLMProvider {
  readonly name: string;
  invoke(messages: readonly ChatMessage[]): Promise<OracleReply>;
}

export interface ToolCallingProvider extends LLMProvider {
  invokeWithTools(messages: readonly ChatMessage[], tools: readonly ToolDefinition[]): Promise<ToolCallingReply>;
}

export function supportsToolCalling(provider: LLMProvider): provider is ToolCallingProvider {
  return "invokeWithTools" in provider && typeof provider.invokeWithTools === "function";
}

export const system = (content: string): ChatMessage => ({ role: "system", content });
export const human = (content: string): ChatMessage => ({ role: "human", content });
