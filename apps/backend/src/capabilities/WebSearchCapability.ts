import type { Document } from "@healthdesk/shared";
import { toProviderError } from "../errors.js";
import type { WebSearchClient } from "../search/TavilyClient.js";
import {
  sentinelDocument,
  truncateBody,
  type CapabilityOutcome,
  type CapabilityProvider
} from "./CapabilityProvider.js";

export interface WebSearchOptions {
  maxResults: number;
  // 0 keeps the page content untruncated.
  maxContentChars: number;
}

export class WebSearchCapability implements CapabilityProvider {
  readonly kind = "web_search" as const;

  constructor(private readonly client: WebSearchClient, private readonly options: WebSearchOptions) {}

  async invoke(query: string): Promise<CapabilityOutcome> {
    console.log(`[search_web] Searching the web for: ${query}`);
    try {
      const { results } = await this.client.rawSearch({
        query,
        maxResults: this.options.maxResults,
        searchDepth: "advanced",
        includeAnswer: false,
        includeRawContent: true
      });

      const documents: Document[] = [];
      for (const hit of results) {
        if (!hit.rawContent) continue;
        documents.push({
          title: hit.title,
          body: truncateBody(hit.rawContent, this.options.maxContentChars),
          sourceRef: hit.url
        });
      }

      console.log(`[search_web] Found ${documents.length} web results`);
      return { kind: this.kind, documents };
    } catch (error) {
      const failure = toProviderError("search_web", error);
      console.error(`[search_web] Web search failed: ${failure.message}`);
      return {
        kind: this.kind,
        documents: [sentinelDocument(`Error searching the web: ${failure.message}`, "search_web")],
        error: failure
      };
    }
  }
}
