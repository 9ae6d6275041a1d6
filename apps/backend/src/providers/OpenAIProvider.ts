import { z } from "zod";
import { ProviderError } from "../errors.js";
import type {
  ChatMessage,
  OracleReply,
  ToolCallingProvider,
  ToolCallingReply,
  ToolDefinition
} from "./LLMProvider.js";

const OPENAI_URL = "https://api.openai.com/v1/chat/completions";

type OpenAIMessage =
  | { role: "system" | "user"; content: string }
  | {
      role: "assistant";
      content: string | null;
      tool_calls?: Array<{ id: string; type: "function"; function: { name: string; arguments: string } }>;
    }
  | { role: "tool"; content: string; tool_call_id: string };

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({ name: z.string(), arguments: z.string() })
              })
            )
            .nullish()
        })
      })
    )
    .min(1)
});

export function toOpenAIMessage(message: ChatMessage): OpenAIMessage {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "human":
      return { role: "user", content: message.content };
    case "assistant":
      return message.toolCalls?.length
        ? {
            role: "assistant",
            content: message.content || null,
            tool_calls: message.toolCalls.map((call) => ({
              id: call.id,
              type: "function" as const,
              function: { name: call.name, arguments: call.arguments }
            }))
          }
        : { role: "assistant", content: message.content };
    case "tool":
      return { role: "tool", content: message.content, tool_call_id: message.toolCallId ?? "" };
  }
}

export class OpenAIProvider implements ToolCallingProvider {
  readonly name = "openai";

  constructor(
    private readonly apiKey: string,
    private readonly model: string,
    private readonly temperature: number
  ) {}

  private async call(messages: readonly ChatMessage[], tools?: readonly ToolDefinition[]): Promise<ToolCallingReply> {
    let response: Response;
    try {
      response = await fetch(OPENAI_URL, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`
        },
        body: JSON.stringify({
          model: this.model,
          temperature: this.temperature,
          messages: messages.map(toOpenAIMessage),
          ...(tools?.length
            ? {
                tools: tools.map((tool) => ({
                  type: "function",
                  function: { name: tool.name, description: tool.description, parameters: tool.parameters }
                }))
              }
            : {})
        })
      });
    } catch (error) {
      throw new ProviderError(this.name, `OpenAI request failed: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error
      });
    }

    if (!response.ok) {
      throw new ProviderError(this.name, `OpenAI request failed (${response.status})`);
    }

    const payload = CompletionSchema.safeParse(await response.json());
    if (!payload.success) {
      throw new ProviderError(this.name, "OpenAI returned an unexpected payload");
    }

    const message = payload.data.choices[0].message;
    return {
      content: message.content?.trim() || "",
      toolCalls: (message.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: call.function.arguments
      }))
    };
  }

  async invoke(messages: readonly ChatMessage[]): Promise<OracleReply> {
    const { content } = await this.call(messages);
    return { content };
  }

  async invokeWithTools(messages: readonly ChatMessage[], tools: readonly ToolDefinition[]): Promise<ToolCallingReply> {
    return this.call(messages, tools);
  }
}
