import sinon from "sinon";
import type { CapabilityKind, Document } from "@healthdesk/shared";
import { DirectivePlanner } from "../src/agents/directivePlanner.js";
import { ExecutorAgent } from "../src/agents/executorAgent.js";
import { SynthesisAgent } from "../src/agents/synthesisAgent.js";
import type {
  CapabilityOutcome,
  CapabilityProvider,
  CapabilityRegistry
} from "../src/capabilities/CapabilityProvider.js";
import { createCapabilities } from "../src/capabilities/index.js";
import { loadConfig, type AppConfig } from "../src/config.js";
import type { DoctorDirectory } from "../src/directory/DoctorDirectory.js";
import { InMemoryDoctorDirectory } from "../src/directory/InMemoryDoctorDirectory.js";
import { SEED_DOCTORS } from "../src/directory/seedDoctors.js";
import { Orchestrator } from "../src/orchestrator.js";
import { AutonomousPlanner } from "../src/planners/autonomousPlanner.js";
import { DeterministicPlanner } from "../src/planners/deterministicPlanner.js";
import type {
  ChatMessage,
  LLMProvider,
  OracleReply,
  ToolCallingProvider,
  ToolCallingReply,
  ToolDefinition
} from "../src/providers/LLMProvider.js";
import type { AgentRuntime, AgentStep } from "../src/runtime/toolCallingAgent.js";
import type { LiteratureClient, LiteratureQuery, Paper } from "../src/search/ArxivClient.js";
import type { WebSearchClient, WebSearchHit, WebSearchRequest } from "../src/search/TavilyClient.js";
import type { AssistantContext } from "../src/setup.js";

export function quietConsole() {
  return {
    log: sinon.stub(console, "log"),
    warn: sinon.stub(console, "warn"),
    error: sinon.stub(console, "error")
  };
}

export function testConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({ OPENAI_API_KEY: "test-openai-key", TAVILY_API_KEY: "test-tavily-key", ...env });
}

export type Responder = (messages: readonly ChatMessage[]) => string | Promise<string>;

export class ScriptedProvider implements LLMProvider {
  readonly name: string = "scripted";
  readonly calls: ChatMessage[][] = [];

  constructor(private readonly respond: Responder) {}

  async invoke(messages: readonly ChatMessage[]): Promise<OracleReply> {
    this.calls.push([...messages]);
    return { content: await this.respond(messages) };
  }
}

export class ScriptedToolProvider extends ScriptedProvider implements ToolCallingProvider {
  readonly toolCalls: Array<{ messages: ChatMessage[]; tools: ToolDefinition[] }> = [];
  private turn = 0;

  constructor(private readonly turns: ToolCallingReply[], respond: Responder = () => "") {
    super(respond);
  }

  async invokeWithTools(messages: readonly ChatMessage[], tools: readonly ToolDefinition[]): Promise<ToolCallingReply> {
    this.toolCalls.push({ messages: [...messages], tools: [...tools] });
    const reply = this.turns[Math.min(this.turn, this.turns.length - 1)];
    this.turn += 1;
    if (!reply) throw new Error("No scripted tool-calling reply");
    return reply;
  }
}

export function systemPromptOf(messages: readonly ChatMessage[]): string {
  return messages.find((message) => message.role === "system")?.content ?? "";
}

export function humanContentOf(messages: readonly ChatMessage[]): string {
  return messages.find((message) => message.role === "human")?.content ?? "";
}

export class FakeWebSearchClient implements WebSearchClient {
  readonly requests: WebSearchRequest[] = [];

  constructor(private readonly results: WebSearchHit[] | Error) {}

  async rawSearch(request: WebSearchRequest): Promise<{ results: WebSearchHit[] }> {
    this.requests.push(request);
    if (this.results instanceof Error) throw this.results;
    return { results: this.results };
  }
}

export class FakeLiteratureClient implements LiteratureClient {
  readonly queries: LiteratureQuery[] = [];

  constructor(private readonly papers: Paper[] | Error) {}

  async retrieve(query: LiteratureQuery): Promise<Paper[]> {
    this.queries.push(query);
    if (this.papers instanceof Error) throw this.papers;
    return this.papers;
  }
}

export class FakeCapability implements CapabilityProvider {
  readonly queries: string[] = [];

  constructor(readonly kind: CapabilityKind, private readonly documents: Document[] | Error) {}

  async invoke(query: string): Promise<CapabilityOutcome> {
    this.queries.push(query);
    if (this.documents instanceof Error) throw this.documents;
    return { kind: this.kind, documents: this.documents };
  }
}

export function fakeRegistry(overrides: Partial<Record<CapabilityKind, CapabilityProvider>> = {}): CapabilityRegistry {
  return {
    web_search:
      overrides.web_search ??
      new FakeCapability("web_search", [{ title: "Web", body: "web body", sourceRef: "https://web.example" }]),
    literature_search:
      overrides.literature_search ??
      new FakeCapability("literature_search", [{ title: "Paper", body: "paper body", sourceRef: "arxiv-1" }]),
    doctor_recommendation:
      overrides.doctor_recommendation ??
      new FakeCapability("doctor_recommendation", [
        { title: "Recommended doctor: Dr. Grace Lin", body: "Name: Dr. Grace Lin", sourceRef: "doctor-directory" }
      ])
  };
}

export class FakeRuntime implements AgentRuntime {
  constructor(private readonly steps: AgentStep[], private readonly failure?: Error) {}

  async *stream(_input: { messages: ChatMessage[] }): AsyncIterable<AgentStep> {
    for (const step of this.steps) yield step;
    if (this.failure) throw this.failure;
  }
}

export function buildContext(options: {
  oracle: LLMProvider;
  web?: WebSearchClient;
  literature?: LiteratureClient;
  directory?: DoctorDirectory;
  runtime?: AgentRuntime;
  config?: AppConfig;
}): AssistantContext {
  const config = options.config ?? testConfig();
  const capabilities = createCapabilities({
    config,
    oracle: options.oracle,
    webSearch: options.web ?? new FakeWebSearchClient([]),
    literature: options.literature ?? new FakeLiteratureClient([]),
    directory: options.directory ?? new InMemoryDoctorDirectory(SEED_DOCTORS)
  });
  const orchestrator = new Orchestrator(new ExecutorAgent(capabilities), new SynthesisAgent(options.oracle));
  return {
    provider: options.oracle.name,
    deterministic: new DeterministicPlanner(options.oracle, new DirectivePlanner(), orchestrator),
    autonomous: options.runtime ? new AutonomousPlanner(options.runtime) : undefined
  };
}
