import type { AnswerResult, CapabilityKind, ExecutionRecord } from "@healthdesk/shared";
import type { InvocationPlan } from "./agents/directivePlanner.js";
import type { ExecutorAgent } from "./agents/executorAgent.js";
import type { SynthesisAgent } from "./agents/synthesisAgent.js";
import { TOOL_NAMES, type CapabilityOutcome } from "./capabilities/CapabilityProvider.js";

export function summarizeOutcome(outcome: CapabilityOutcome): string {
  const toolName = TOOL_NAMES[outcome.kind];
  if (outcome.error) {
    return `${toolName} failed: ${outcome.error.message}`;
  }
  switch (outcome.kind) {
    case "web_search":
      return `${toolName} returned ${outcome.documents.length} results`;
    case "literature_search":
      return `${toolName} returned ${outcome.documents.length} papers`;
    case "doctor_recommendation":
      return `${toolName} returned: ${outcome.documents[0]?.title ?? outcome.documents[0]?.body ?? "nothing"}`;
  }
}

export class Orchestrator {
  constructor(private readonly executor: ExecutorAgent, private readonly synthesizer: SynthesisAgent) {}

  async run(question: string, plan: InvocationPlan, reasoningText: string): Promise<AnswerResult> {
    const record: ExecutionRecord = {
      reasoningText,
      toolsSelected: [],
      executionLog: [...plan.notes]
    };
    const outputs = new Map<CapabilityKind, CapabilityOutcome>();

    for (const step of plan.steps) {
      if (outputs.has(step.kind)) continue;
      const outcome = await this.executor.execute(step, question);
      record.toolsSelected.push(step.kind);
      record.executionLog.push(summarizeOutcome(outcome));
      outputs.set(step.kind, outcome);
    }

    if (outputs.size === 0) {
      record.executionLog.push("Model did not specify tools clearly; falling back to its direct response.");
      console.warn("[Orchestrator] No tool output collected; returning the directive text");
      return { answerText: reasoningText, record, planner: "deterministic" };
    }

    const answerText = await this.synthesizer.synthesize(question, [...outputs.values()], record);
    console.log("[Orchestrator] Final answer synthesized");
    return { answerText, record, planner: "deterministic" };
  }
}
