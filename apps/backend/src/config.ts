import { z } from "zod";
import type { CredentialsStatus } from "@healthdesk/shared";
import { CredentialError } from "./errors.js";

export const OPENAI_KEY_PLACEHOLDER = "your_openai_api_key_here";
export const TAVILY_KEY_PLACEHOLDER = "your_tavily_api_key_here";

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().trim().optional(),
  TAVILY_API_KEY: z.string().trim().optional(),
  LLM_PROVIDER: z.enum(["openai", "mock"]).default("openai"),
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  WEB_SEARCH_MAX_RESULTS: z.coerce.number().int().positive().default(3),
  WEB_CONTENT_MAX_CHARS: z.coerce.number().int().min(0).default(500),
  LITERATURE_TOP_K: z.coerce.number().int().positive().default(3),
  LITERATURE_MAX_CHARS: z.coerce.number().int().positive().default(20000),
  AUTONOMOUS_AGENT: z.enum(["on", "off"]).default("on"),
  AGENT_MAX_STEPS: z.coerce.number().int().positive().default(6),
  PORT: z.coerce.number().int().positive().default(4000)
});

export interface AppConfig {
  openaiApiKey?: string;
  tavilyApiKey?: string;
  llmProvider: "openai" | "mock";
  model: string;
  temperature: number;
  webSearch: { maxResults: number; maxContentChars: number };
  literature: { topK: number; maxCharsPerDoc: number };
  autonomousAgent: boolean;
  agentMaxSteps: number;
  port: number;
}

export interface Credentials {
  openaiApiKey: string;
  tavilyApiKey: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue ? issue.path.join(".") : "environment";
    throw new Error(`Invalid configuration for ${path}: ${issue?.message ?? "unknown issue"}`);
  }

  const vars = parsed.data;
  return {
    openaiApiKey: vars.OPENAI_API_KEY || undefined,
    tavilyApiKey: vars.TAVILY_API_KEY || undefined,
    llmProvider: vars.LLM_PROVIDER,
    model: vars.OPENAI_MODEL,
    temperature: vars.OPENAI_TEMPERATURE,
    webSearch: { maxResults: vars.WEB_SEARCH_MAX_RESULTS, maxContentChars: vars.WEB_CONTENT_MAX_CHARS },
    literature: { topK: vars.LITERATURE_TOP_K, maxCharsPerDoc: vars.LITERATURE_MAX_CHARS },
    autonomousAgent: vars.AUTONOMOUS_AGENT === "on",
    agentMaxSteps: vars.AGENT_MAX_STEPS,
    port: vars.PORT
  };
}

function requireKey(value: string | undefined, envName: string, label: string, placeholder: string): string {
  if (!value) {
    throw new CredentialError(envName, `${label} API key not configured (${envName} is missing)`);
  }
  if (value === placeholder) {
    throw new CredentialError(envName, `${label} API key not configured (${envName} still holds the placeholder value)`);
  }
  return value;
}

export function resolveCredentials(config: AppConfig): Credentials {
  return {
    openaiApiKey: requireKey(config.openaiApiKey, "OPENAI_API_KEY", "OpenAI", OPENAI_KEY_PLACEHOLDER),
    tavilyApiKey: requireKey(config.tavilyApiKey, "TAVILY_API_KEY", "Tavily", TAVILY_KEY_PLACEHOLDER)
  };
}

export function checkCredentials(config: AppConfig): CredentialsStatus {
  try {
    resolveCredentials(config);
    return { configured: true, message: "API keys configured" };
  } catch (error) {
    if (error instanceof CredentialError) return { configured: false, message: error.message };
    throw error;
  }
}
