import type {
  AnswerResult,
  AssistantState,
  CredentialsStatus,
  DoctorRecord,
  ExecutionRecord
} from "@healthdesk/shared";
import { checkCredentials, type AppConfig } from "./config.js";
import type { DoctorDirectory } from "./directory/DoctorDirectory.js";
import { CredentialError, SynthesisError, describeError } from "./errors.js";
import { EXAMPLE_QUESTIONS } from "./examples.js";
import type { AutonomousPlanner } from "./planners/autonomousPlanner.js";
import type { DeterministicPlanner } from "./planners/deterministicPlanner.js";
import { createAssistantContext, type AssistantContext, type ContextFactory } from "./setup.js";
import { WORKFLOW_DESCRIPTION } from "./workflow.js";

export type Planner = AutonomousPlanner | DeterministicPlanner;

export interface AgentFacadeOptions {
  config: AppConfig;
  directory: DoctorDirectory;
  setup?: ContextFactory;
}

const emptyRecord = (reasoningText = ""): ExecutionRecord => ({ reasoningText, toolsSelected: [], executionLog: [] });

/**
 * Entry point for every question. Sets itself up on first use, prefers the
 * autonomous agent when one was attached, and always answers with a string:
 * setup, planning and synthesis failures come back as user-facing messages.
 */
export class AgentFacade {
  private context: AssistantContext | undefined;
  private pendingSetup: Promise<AssistantContext> | undefined;
  private readonly setup: ContextFactory;

  constructor(private readonly options: AgentFacadeOptions) {
    this.setup = options.setup ?? createAssistantContext;
  }

  get state(): AssistantState {
    return this.context ? "ready" : "uninitialized";
  }

  get providerName(): string {
    return this.context?.provider ?? "none";
  }

  private ensureReady(): Promise<AssistantContext> {
    if (this.context) return Promise.resolve(this.context);
    if (!this.pendingSetup) {
      console.log("[AgentFacade] Setting up the assistant...");
      this.pendingSetup = Promise.resolve()
        .then(() => this.setup(this.options.config, this.options.directory))
        .then((context) => {
          this.context = context;
          console.log("[AgentFacade] Assistant is ready");
          return context;
        })
        .finally(() => {
          this.pendingSetup = undefined;
        });
    }
    return this.pendingSetup;
  }

  private async run(planner: Planner, context: AssistantContext, question: string): Promise<AnswerResult> {
    switch (planner.variant) {
      case "autonomous":
        try {
          return await planner.answer(question);
        } catch (error) {
          console.warn(`[AgentFacade] Autonomous agent failed (${describeError(error)}); using the deterministic planner`);
          const fallback = await context.deterministic.answer(question);
          fallback.record.executionLog.unshift(
            `Autonomous agent failed (${describeError(error)}); answered with the deterministic planner.`
          );
          return fallback;
        }
      case "deterministic":
        return planner.answer(question);
    }
  }

  private async respond(question: string, choose: (context: AssistantContext) => Planner): Promise<AnswerResult> {
    if (!question.trim()) {
      return { answerText: "Please enter a question first.", record: emptyRecord() };
    }

    let context: AssistantContext;
    try {
      context = await this.ensureReady();
    } catch (error) {
      const message =
        error instanceof CredentialError
          ? `Setup failed: ${error.message}. Add OPENAI_API_KEY and TAVILY_API_KEY to the environment or the .env file.`
          : `Setup failed: ${describeError(error)}`;
      console.error(`[AgentFacade] ${message}`);
      return { answerText: message, record: emptyRecord(message) };
    }

    console.log(`[AgentFacade] Thinking about: ${question}`);
    try {
      return await this.run(choose(context), context, question);
    } catch (error) {
      console.error(`[AgentFacade] Error: ${describeError(error)}`);
      return {
        answerText: `Sorry, I encountered an error: ${describeError(error)}`,
        record: error instanceof SynthesisError ? error.record : emptyRecord()
      };
    }
  }

  async answer(question: string): Promise<AnswerResult> {
    return this.respond(question, (context) => context.autonomous ?? context.deterministic);
  }

  /** Always takes the deterministic path, so its directive, plan and log are visible. */
  async trace(question: string): Promise<AnswerResult> {
    return this.respond(question, (context) => context.deterministic);
  }

  listDoctors(): DoctorRecord[] {
    return this.options.directory.list();
  }

  addDoctor(record: DoctorRecord): DoctorRecord {
    return this.options.directory.add(record);
  }

  credentialsStatus(): CredentialsStatus {
    return checkCredentials(this.options.config);
  }

  workflowDescription(): string {
    return WORKFLOW_DESCRIPTION;
  }

  exampleQuestions(): readonly string[] {
    return EXAMPLE_QUESTIONS;
  }
}
