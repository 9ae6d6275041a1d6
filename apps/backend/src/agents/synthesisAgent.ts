import type { ExecutionRecord } from "@healthdesk/shared";
import { TOOL_NAMES, formatOutcome, type CapabilityOutcome } from "../capabilities/CapabilityProvider.js";
import { SynthesisError, describeError } from "../errors.js";
import { human, system, type LLMProvider } from "../providers/LLMProvider.js";

export const SYNTHESIS_SYSTEM_PROMPT =
  "You are a helpful healthcare assistant. Combine all tool results into a single comprehensive answer.";

export function buildSynthesisRequest(question: string, outputs: readonly CapabilityOutcome[]): string {
  const results = outputs.map((outcome) => `### ${TOOL_NAMES[outcome.kind]}\n\n${formatOutcome(outcome)}`).join("\n\n");
  const instruction = outputs.some((outcome) => outcome.kind === "doctor_recommendation")
    ? "Write a clear, structured answer. You must include the recommended doctor's details and suggest booking an appointment by email."
    : "Write a clear, structured answer and cite the sources you used.";
  return `Question: ${question}\n\nTool Results:\n\n${results}\n\n${instruction}`;
}

export class SynthesisAgent {
  constructor(private readonly oracle: LLMProvider) {}

  async synthesize(question: string, outputs: readonly CapabilityOutcome[], record: ExecutionRecord): Promise<string> {
    try {
      const reply = await this.oracle.invoke([system(SYNTHESIS_SYSTEM_PROMPT), human(buildSynthesisRequest(question, outputs))]);
      return reply.content.trim();
    } catch (error) {
      throw new SynthesisError(`Final answer synthesis failed: ${describeError(error)}`, record, { cause: error });
    }
  }
}
