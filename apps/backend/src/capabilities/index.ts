import type { AppConfig } from "../config.js";
import type { DoctorDirectory } from "../directory/DoctorDirectory.js";
import type { LLMProvider } from "../providers/LLMProvider.js";
import type { LiteratureClient } from "../search/ArxivClient.js";
import type { WebSearchClient } from "../search/TavilyClient.js";
import type { CapabilityRegistry } from "./CapabilityProvider.js";
import { DoctorRecommendationCapability } from "./DoctorRecommendationCapability.js";
import { LiteratureSearchCapability } from "./LiteratureSearchCapability.js";
import { WebSearchCapability } from "./WebSearchCapability.js";

export function createCapabilities(deps: {
  config: AppConfig;
  oracle: LLMProvider;
  webSearch: WebSearchClient;
  literature: LiteratureClient;
  directory: DoctorDirectory;
}): CapabilityRegistry {
  return {
    web_search: new WebSearchCapability(deps.webSearch, deps.config.webSearch),
    literature_search: new LiteratureSearchCapability(deps.literature, deps.config.literature),
    doctor_recommendation: new DoctorRecommendationCapability(deps.oracle, deps.directory)
  };
}
