import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { loadConfig } from "../src/config.js";
import { InMemoryDoctorDirectory } from "../src/directory/InMemoryDoctorDirectory.js";
import { CredentialError } from "../src/errors.js";
import { AutonomousPlanner } from "../src/planners/autonomousPlanner.js";
import { createAssistantContext } from "../src/setup.js";
import { quietConsole, testConfig } from "./helpers.js";

describe("createAssistantContext", () => {
  beforeEach(() => quietConsole());
  afterEach(() => sinon.restore());

  it("attaches the autonomous agent when the model can call tools", () => {
    const context = createAssistantContext(testConfig(), new InMemoryDoctorDirectory());

    expect(context.provider).to.equal("openai");
    expect(context.deterministic.variant).to.equal("deterministic");
    expect(context.autonomous).to.be.instanceOf(AutonomousPlanner);
  });

  it("keeps to the deterministic planner for a provider without tool calling", () => {
    const context = createAssistantContext(testConfig({ LLM_PROVIDER: "mock" }), new InMemoryDoctorDirectory());

    expect(context.provider).to.equal("mock");
    expect(context.autonomous).to.equal(undefined);
  });

  it("leaves the autonomous agent out when it is switched off", () => {
    const context = createAssistantContext(testConfig({ AUTONOMOUS_AGENT: "off" }), new InMemoryDoctorDirectory());

    expect(context.provider).to.equal("openai");
    expect(context.autonomous).to.equal(undefined);
  });

  it("still requires both keys with the mock provider", () => {
    expect(() =>
      createAssistantContext(loadConfig({ LLM_PROVIDER: "mock", TAVILY_API_KEY: "test-tavily-key" }), new InMemoryDoctorDirectory())
    ).to.throw(CredentialError, "OPENAI_API_KEY is missing");
  });

  it("refuses to start without credentials", () => {
    expect(() => createAssistantContext(loadConfig({}), new InMemoryDoctorDirectory())).to.throw(CredentialError);
  });
});
