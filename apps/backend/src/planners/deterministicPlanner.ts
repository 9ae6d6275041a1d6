import type { AnswerResult } from "@healthdesk/shared";
import { directiveMarker, type DirectivePlanner } from "../agents/directivePlanner.js";
import { describeError } from "../errors.js";
import type { Orchestrator } from "../orchestrator.js";
import { human, system, type LLMProvider } from "../providers/LLMProvider.js";

export const DIRECTIVE_SYSTEM_PROMPT = `You are a healthcare assistant that decides which tools to use before answering.

Rules:
- You MUST call at least one tool before answering a question. Never answer directly without tool use.
- If the query is about general health info (symptoms, causes, treatments, advice), use ${directiveMarker("web_search")}.
- If the query mentions research, studies, or papers, use ${directiveMarker("literature_search")}.
- If the query asks about a doctor, specialist, or consultation, you MUST use ${directiveMarker("doctor_recommendation")}.
- If the query mixes research and a doctor request, you MUST call both tools.
- NEVER invent doctors. Only use doctors provided by the recommend_doctor tool.

When you need to use tools, respond with one line per tool:
- "${directiveMarker("web_search")}" for web search
- "${directiveMarker("literature_search")}" for research papers
- "${directiveMarker("doctor_recommendation")}" for doctor recommendations

There is no "TOOL: none" option. Always select at least one tool.`;

export class DeterministicPlanner {
  readonly variant = "deterministic" as const;

  constructor(
    private readonly oracle: LLMProvider,
    private readonly planner: DirectivePlanner,
    private readonly orchestrator: Orchestrator
  ) {}

  async answer(question: string): Promise<AnswerResult> {
    let directiveText = "";
    const notes: string[] = [];
    try {
      const reply = await this.oracle.invoke([system(DIRECTIVE_SYSTEM_PROMPT), human(question)]);
      directiveText = reply.content;
      console.log(`[DeterministicPlanner] Model directive: ${directiveText}`);
    } catch (error) {
      console.warn(`[DeterministicPlanner] Directive call failed: ${describeError(error)}`);
      notes.push(`Model directive unavailable (${describeError(error)}); planning from keyword rules only.`);
    }

    const plan = this.planner.plan(question, directiveText);
    return this.orchestrator.run(question, { steps: plan.steps, notes: [...notes, ...plan.notes] }, directiveText);
  }
}
