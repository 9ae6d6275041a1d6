import { z } from "zod";
import {
  TOOL_NAMES,
  capabilityForTool,
  formatOutcome,
  type CapabilityRegistry
} from "../capabilities/CapabilityProvider.js";
import {
  system,
  type ChatMessage,
  type ToolCall,
  type ToolCallingProvider,
  type ToolDefinition
} from "../providers/LLMProvider.js";

export interface AgentStep {
  messages: ChatMessage[];
}

// A planning loop whose internals are opaque to the caller. Each yielded
// step is the full message state after one model reply or tool result.
export interface AgentRuntime {
  stream(input: { messages: ChatMessage[] }): AsyncIterable<AgentStep>;
}

const ToolArgumentsSchema = z.object({ query: z.string().min(1) });

const QUERY_PARAMETERS = {
  type: "object",
  properties: { query: { type: "string", description: "The search query or description of the patient's needs." } },
  required: ["query"]
};

export const AGENT_TOOLS: readonly ToolDefinition[] = [
  {
    name: TOOL_NAMES.web_search,
    description: "Search the web for general or up-to-date information on healthcare topics.",
    parameters: QUERY_PARAMETERS
  },
  {
    name: TOOL_NAMES.literature_search,
    description: "Search arXiv for relevant scientific research papers and articles.",
    parameters: QUERY_PARAMETERS
  },
  {
    name: TOOL_NAMES.doctor_recommendation,
    description: "Recommend the most suitable doctor from the directory for the patient's symptoms or healthcare needs.",
    parameters: QUERY_PARAMETERS
  }
];

export function buildAgentPrompt(now: Date): string {
  return `You are an agent designed to act as an expert in researching medical symptoms
and recommending relevant doctors for booking appointments.
The current year is ${now.getFullYear()}; use it for search queries when no specific dates are mentioned.

Given a user query, call the relevant tools and give the most appropriate response:
  - If the query only asks for a doctor, recommend an appropriate doctor.
  - If the user is researching specific aspects of symptoms, treatments or other healthcare topics,
    use both ${TOOL_NAMES.web_search} and ${TOOL_NAMES.literature_search} and give a well-structured response.
  - If the user is looking for general healthcare information, web search is enough.
  - Use ${TOOL_NAMES.literature_search} only for information likely to be found in research papers.
  - Cite source links and arXiv article titles and publication dates when available.
  - When recommending a doctor, use ${TOOL_NAMES.doctor_recommendation}, present the details in a structured way
    and suggest booking an appointment by email.
  - Politely decline queries unrelated to medical or healthcare information.`;
}

export class ToolCallingAgent implements AgentRuntime {
  constructor(
    private readonly oracle: ToolCallingProvider,
    private readonly capabilities: CapabilityRegistry,
    private readonly maxSteps: number,
    private readonly clock: () => Date = () => new Date()
  ) {}

  private async runTool(call: ToolCall): Promise<string> {
    const kind = capabilityForTool(call.name);
    if (!kind) return `Unknown tool: ${call.name}`;

    let args: unknown;
    try {
      args = JSON.parse(call.arguments);
    } catch {
      return `Invalid arguments for ${call.name}: expected JSON with a "query" string.`;
    }
    const parsed = ToolArgumentsSchema.safeParse(args);
    if (!parsed.success) return `Invalid arguments for ${call.name}: expected JSON with a "query" string.`;

    const outcome = await this.capabilities[kind].invoke(parsed.data.query);
    return formatOutcome(outcome);
  }

  async *stream(input: { messages: ChatMessage[] }): AsyncIterable<AgentStep> {
    const messages: ChatMessage[] = [system(buildAgentPrompt(this.clock())), ...input.messages];

    for (let turn = 0; turn < this.maxSteps; turn++) {
      const reply = await this.oracle.invokeWithTools(messages, AGENT_TOOLS);
      messages.push({ role: "assistant", content: reply.content, toolCalls: reply.toolCalls });
      yield { messages: [...messages] };

      if (reply.toolCalls.length === 0) return;

      for (const call of reply.toolCalls) {
        const content = await this.runTool(call);
        messages.push({ role: "tool", content, toolCallId: call.id });
        yield { messages: [...messages] };
      }
    }

    throw new Error(`Agent did not produce a final answer within ${this.maxSteps} steps`);
  }
}
