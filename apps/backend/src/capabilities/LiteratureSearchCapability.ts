import { toProviderError } from "../errors.js";
import type { LiteratureClient } from "../search/ArxivClient.js";
import { sentinelDocument, type CapabilityOutcome, type CapabilityProvider } from "./CapabilityProvider.js";

export const NO_ARTICLES_FOUND = "No articles found for the given query.";

export interface LiteratureSearchOptions {
  topK: number;
  maxCharsPerDoc: number;
}

export class LiteratureSearchCapability implements CapabilityProvider {
  readonly kind = "literature_search" as const;

  constructor(private readonly client: LiteratureClient, private readonly options: LiteratureSearchOptions) {}

  async invoke(query: string): Promise<CapabilityOutcome> {
    console.log(`[search_arxiv] Searching arXiv for: ${query}`);
    try {
      const papers = await this.client.retrieve({
        query,
        topK: this.options.topK,
        fullDocuments: true,
        maxCharsPerDoc: this.options.maxCharsPerDoc
      });

      if (papers.length === 0) {
        console.warn("[search_arxiv] No research papers found");
        return { kind: this.kind, documents: [sentinelDocument(NO_ARTICLES_FOUND, "arxiv")] };
      }

      console.log(`[search_arxiv] Found ${papers.length} research papers`);
      return {
        kind: this.kind,
        documents: papers.map((paper) => ({
          title: paper.metadata.title,
          summary: paper.metadata.summary,
          body: paper.body,
          sourceRef: paper.metadata.published
            ? `${paper.metadata.entryId} (published ${paper.metadata.published})`
            : paper.metadata.entryId
        }))
      };
    } catch (error) {
      const failure = toProviderError("search_arxiv", error);
      console.error(`[search_arxiv] Research search failed: ${failure.message}`);
      return {
        kind: this.kind,
        documents: [sentinelDocument(`Error fetching arXiv articles: ${failure.message}`, "arxiv")],
        error: failure
      };
    }
  }
}
