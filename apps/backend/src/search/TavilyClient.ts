import { z } from "zod";
import { ProviderError } from "../errors.js";

const TAVILY_URL = "https://api.tavily.com/search";

export type SearchDepth = "basic" | "advanced";

export interface WebSearchRequest {
  query: string;
  maxResults: number;
  searchDepth: SearchDepth;
  includeAnswer: boolean;
  includeRawContent: boolean;
}

export interface WebSearchHit {
  title: string;
  url: string;
  rawContent: string | null;
}

export interface WebSearchClient {
  rawSearch(request: WebSearchRequest): Promise<{ results: WebSearchHit[] }>;
}

const SearchResponseSchema = z.object({
  results: z.array(
    z.object({
      title: z.string().default(""),
      url: z.string(),
      raw_content: z.string().nullish()
    })
  )
});

export class TavilyClient implements WebSearchClient {
  constructor(private readonly apiKey: string) {}

  async rawSearch(request: WebSearchRequest): Promise<{ results: WebSearchHit[] }> {
    let response: Response;
    try {
      response = await fetch(TAVILY_URL, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`
        },
        body: JSON.stringify({
          query: request.query,
          max_results: request.maxResults,
          search_depth: request.searchDepth,
          include_answer: request.includeAnswer,
          include_raw_content: request.includeRawContent
        })
      });
    } catch (error) {
      throw new ProviderError("tavily", `Tavily request failed: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error
      });
    }

    if (!response.ok) {
      throw new ProviderError("tavily", `Tavily request failed (${response.status})`);
    }

    const payload = SearchResponseSchema.safeParse(await response.json());
    if (!payload.success) {
      throw new ProviderError("tavily", "Tavily returned an unexpected payload");
    }

    return {
      results: payload.data.results.map((hit) => ({
        title: hit.title,
        url: hit.url,
        rawContent: hit.raw_content ?? null
      }))
    };
  }
}
