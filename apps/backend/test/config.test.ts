import { describe, it } from "mocha";
import { expect } from "chai";

import {
  OPENAI_KEY_PLACEHOLDER,
  TAVILY_KEY_PLACEHOLDER,
  checkCredentials,
  loadConfig,
  resolveCredentials
} from "../src/config.js";
import { CredentialError } from "../src/errors.js";

describe("config", () => {
  it("fills in defaults for an empty environment", () => {
    expect(loadConfig({})).to.deep.equal({
      openaiApiKey: undefined,
      tavilyApiKey: undefined,
      llmProvider: "openai",
      model: "gpt-4o-mini",
      temperature: 0.1,
      webSearch: { maxResults: 3, maxContentChars: 500 },
      literature: { topK: 3, maxCharsPerDoc: 20000 },
      autonomousAgent: true,
      agentMaxSteps: 6,
      port: 4000
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      LLM_PROVIDER: "mock",
      OPENAI_MODEL: "gpt-4o",
      OPENAI_TEMPERATURE: "0.5",
      WEB_CONTENT_MAX_CHARS: "0",
      LITERATURE_TOP_K: "5",
      AUTONOMOUS_AGENT: "off",
      PORT: "8080"
    });

    expect(config.llmProvider).to.equal("mock");
    expect(config.model).to.equal("gpt-4o");
    expect(config.temperature).to.equal(0.5);
    expect(config.webSearch.maxContentChars).to.equal(0);
    expect(config.literature.topK).to.equal(5);
    expect(config.autonomousAgent).to.equal(false);
    expect(config.port).to.equal(8080);
  });

  it("treats blank keys as missing", () => {
    const config = loadConfig({ OPENAI_API_KEY: "   ", TAVILY_API_KEY: "" });

    expect(config.openaiApiKey).to.equal(undefined);
    expect(config.tavilyApiKey).to.equal(undefined);
  });

  it("names the offending variable when a value is invalid", () => {
    expect(() => loadConfig({ PORT: "not-a-port" })).to.throw("Invalid configuration for PORT");
    expect(() => loadConfig({ LLM_PROVIDER: "local" })).to.throw("Invalid configuration for LLM_PROVIDER");
  });

  it("resolves both keys when they are set", () => {
    const config = loadConfig({ OPENAI_API_KEY: "test-openai-key", TAVILY_API_KEY: "test-tavily-key" });

    expect(resolveCredentials(config)).to.deep.equal({
      openaiApiKey: "test-openai-key",
      tavilyApiKey: "test-tavily-key"
    });
    expect(checkCredentials(config)).to.deep.equal({ configured: true, message: "API keys configured" });
  });

  it("distinguishes a missing key from a placeholder", () => {
    const missing = loadConfig({ TAVILY_API_KEY: "test-tavily-key" });
    const placeholder = loadConfig({ OPENAI_API_KEY: OPENAI_KEY_PLACEHOLDER, TAVILY_API_KEY: TAVILY_KEY_PLACEHOLDER });

    expect(() => resolveCredentials(missing)).to.throw(
      CredentialError,
      "OpenAI API key not configured (OPENAI_API_KEY is missing)"
    );
    expect(checkCredentials(placeholder)).to.deep.equal({
      configured: false,
      message: "OpenAI API key not configured (OPENAI_API_KEY still holds the placeholder value)"
    });
  });

  it("checks the search key after the model key", () => {
    const config = loadConfig({ OPENAI_API_KEY: "test-openai-key" });

    expect(checkCredentials(config)).to.deep.equal({
      configured: false,
      message: "Tavily API key not configured (TAVILY_API_KEY is missing)"
    });
  });
});
