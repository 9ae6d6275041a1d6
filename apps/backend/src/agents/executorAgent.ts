import type { PlanStep } from "@healthdesk/shared";
import {
  TOOL_NAMES,
  sentinelDocument,
  type CapabilityOutcome,
  type CapabilityRegistry
} from "../capabilities/CapabilityProvider.js";
import { toProviderError } from "../errors.js";

export class ExecutorAgent {
  constructor(private readonly capabilities: CapabilityRegistry) {}

  async execute(step: PlanStep, question: string): Promise<CapabilityOutcome> {
    const toolName = TOOL_NAMES[step.kind];
    console.log(`[Executor] Executing: ${toolName}`);
    try {
      return await this.capabilities[step.kind].invoke(question);
    } catch (error) {
      const failure = toProviderError(toolName, error);
      return {
        kind: step.kind,
        documents: [sentinelDocument(`Error running ${toolName}: ${failure.message}`, toolName)],
        error: failure
      };
    }
  }
}
