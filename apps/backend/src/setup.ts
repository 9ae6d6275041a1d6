import { DirectivePlanner } from "./agents/directivePlanner.js";
import { ExecutorAgent } from "./agents/executorAgent.js";
import { SynthesisAgent } from "./agents/synthesisAgent.js";
import type { CapabilityRegistry } from "./capabilities/CapabilityProvider.js";
import { createCapabilities } from "./capabilities/index.js";
import { resolveCredentials, type AppConfig } from "./config.js";
import type { DoctorDirectory } from "./directory/DoctorDirectory.js";
import { Orchestrator } from "./orchestrator.js";
import { AutonomousPlanner } from "./planners/autonomousPlanner.js";
import { DeterministicPlanner } from "./planners/deterministicPlanner.js";
import { createProvider } from "./providers/index.js";
import { supportsToolCalling, type LLMProvider } from "./providers/LLMProvider.js";
import { ToolCallingAgent } from "./runtime/toolCallingAgent.js";
import { ArxivClient } from "./search/ArxivClient.js";
import { TavilyClient } from "./search/TavilyClient.js";

export interface AssistantContext {
  provider: string;
  deterministic: DeterministicPlanner;
  autonomous?: AutonomousPlanner;
}

export type ContextFactory = (
  config: AppConfig,
  directory: DoctorDirectory
) => AssistantContext | Promise<AssistantContext>;

function attachAutonomousPlanner(
  config: AppConfig,
  oracle: LLMProvider,
  capabilities: CapabilityRegistry
): AutonomousPlanner | undefined {
  if (!config.autonomousAgent) {
    console.log("[Setup] Autonomous agent disabled; using the deterministic planner");
    return undefined;
  }
  if (!supportsToolCalling(oracle)) {
    console.log(`[Setup] Provider '${oracle.name}' has no tool calling; using the deterministic planner`);
    return undefined;
  }
  console.log("[Setup] Autonomous tool-calling agent attached");
  return new AutonomousPlanner(new ToolCallingAgent(oracle, capabilities, config.agentMaxSteps));
}

export function createAssistantContext(config: AppConfig, directory: DoctorDirectory): AssistantContext {
  const credentials = resolveCredentials(config);
  const oracle = createProvider(config, credentials);
  const capabilities = createCapabilities({
    config,
    oracle,
    webSearch: new TavilyClient(credentials.tavilyApiKey),
    literature: new ArxivClient(),
    directory
  });

  const orchestrator = new Orchestrator(new ExecutorAgent(capabilities), new SynthesisAgent(oracle));
  return {
    provider: oracle.name,
    deterministic: new DeterministicPlanner(oracle, new DirectivePlanner(), orchestrator),
    autonomous: attachAutonomousPlanner(config, oracle, capabilities)
  };
}
