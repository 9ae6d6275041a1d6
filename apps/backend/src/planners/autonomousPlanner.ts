import type { AnswerResult, ExecutionRecord } from "@healthdesk/shared";
import { TOOL_NAMES, capabilityForTool } from "../capabilities/CapabilityProvider.js";
import { human, type ChatMessage } from "../providers/LLMProvider.js";
import type { AgentRuntime, AgentStep } from "../runtime/toolCallingAgent.js";

function describeMessage(message: ChatMessage): string {
  if (message.toolCalls?.length) {
    return `${message.role} requested ${message.toolCalls.map((call) => call.name).join(", ")}`;
  }
  const preview = message.content.replace(/\s+/g, " ").trim();
  return `${message.role}: ${preview.length > 120 ? `${preview.slice(0, 117)}...` : preview}`;
}

export class AutonomousPlanner {
  readonly variant = "autonomous" as const;

  constructor(private readonly runtime: AgentRuntime) {}

  async answer(question: string): Promise<AnswerResult> {
    const record: ExecutionRecord = { reasoningText: "", toolsSelected: [], executionLog: [] };
    let finalStep: AgentStep | undefined;

    for await (const step of this.runtime.stream({ messages: [human(question)] })) {
      const latest = step.messages.at(-1);
      if (latest) {
        console.log(`[AutonomousPlanner] Agent step: ${describeMessage(latest)}`);
        record.executionLog.push(describeMessage(latest));

        for (const call of latest.toolCalls ?? []) {
          const kind = capabilityForTool(call.name);
          if (kind && !record.toolsSelected.includes(kind)) record.toolsSelected.push(kind);
        }
        if (latest.role === "assistant" && latest.toolCalls?.length && latest.content) {
          record.reasoningText = record.reasoningText ? `${record.reasoningText}\n${latest.content}` : latest.content;
        }
      }
      finalStep = step;
    }

    if (!finalStep) {
      throw new Error("Agent stream returned no events");
    }

    const last = finalStep.messages.at(-1);
    if (!last || last.role !== "assistant" || !last.content.trim()) {
      throw new Error("Agent stream ended without a final answer");
    }

    console.log(
      `[AutonomousPlanner] Final answer generated after ${record.toolsSelected.map((kind) => TOOL_NAMES[kind]).join(", ") || "no tools"}`
    );
    return { answerText: last.content.trim(), record, planner: "autonomous" };
  }
}
