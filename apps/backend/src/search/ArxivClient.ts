import { XMLParser } from "fast-xml-parser";
import { extractText, getDocumentProxy } from "unpdf";
import { z } from "zod";
import { ProviderError, describeError } from "../errors.js";

const ARXIV_URL = "https://export.arxiv.org/api/query";
const MAX_QUERY_LENGTH = 300;

export interface LiteratureQuery {
  query: string;
  topK: number;
  fullDocuments: boolean;
  maxCharsPerDoc: number;
}

export interface Paper {
  metadata: {
    title: string;
    summary: string;
    entryId: string;
    published?: string;
    authors: string[];
    pdfUrl?: string;
  };
  body: string;
}

export interface LiteratureClient {
  retrieve(query: LiteratureQuery): Promise<Paper[]>;
}

export type PdfTextExtractor = (data: Uint8Array) => Promise<string>;

const TextNode = z
  .union([z.string(), z.object({ "#text": z.string() })])
  .transform((node) => (typeof node === "string" ? node : node["#text"]));

const LinkSchema = z.object({
  "@_href": z.string(),
  "@_title": z.string().optional()
});

const EntrySchema = z.object({
  id: z.string(),
  title: TextNode,
  summary: TextNode,
  published: z.string().optional(),
  author: z.array(z.object({ name: z.string() })).optional(),
  link: z.array(LinkSchema).optional()
});

const FeedSchema = z.object({
  feed: z.object({
    entry: z.array(EntrySchema).optional()
  })
});

type FeedEntry = z.infer<typeof EntrySchema>;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  isArray: (tagName) => tagName === "entry" || tagName === "author" || tagName === "link"
});

const collapse = (text: string): string => text.replace(/\s+/g, " ").trim();

// ":" and "-" are query operators to the arXiv API.
export function sanitizeArxivQuery(query: string): string {
  return query.replace(/[:-]/g, "").slice(0, MAX_QUERY_LENGTH);
}

export async function extractPdfText(data: Uint8Array): Promise<string> {
  const pdf = await getDocumentProxy(data);
  const { text } = await extractText(pdf, { mergePages: true });
  return text;
}

function toPaper(entry: FeedEntry, maxChars: number): Paper {
  const summary = collapse(entry.summary);
  return {
    metadata: {
      title: collapse(entry.title),
      summary,
      entryId: entry.id.trim(),
      published: entry.published,
      authors: (entry.author ?? []).map((author) => collapse(author.name)),
      pdfUrl: entry.link?.find((link) => link["@_title"] === "pdf")?.["@_href"]
    },
    body: summary.slice(0, maxChars)
  };
}

/** Papers with the abstract as their body; `retrieve` swaps in the PDF text. */
export function parseArxivFeed(xml: string, maxCharsPerDoc: number): Paper[] {
  const feed = FeedSchema.safeParse(parser.parse(xml));
  if (!feed.success) {
    throw new ProviderError("arxiv", "arXiv returned an unexpected feed");
  }
  return (feed.data.feed.entry ?? []).map((entry) => toPaper(entry, maxCharsPerDoc));
}

export class ArxivClient implements LiteratureClient {
  constructor(private readonly extractor: PdfTextExtractor = extractPdfText) {}

  private async readPdf(url: string): Promise<string> {
    const response = await fetch(url);
    if (!response.ok) {
      throw new Error(`PDF request failed (${response.status})`);
    }
    const text = await this.extractor(new Uint8Array(await response.arrayBuffer()));
    if (!text.trim()) {
      throw new Error("PDF has no extractable text");
    }
    return text.trim();
  }

  private async withFullText(paper: Paper, maxChars: number): Promise<Paper> {
    const { pdfUrl, entryId } = paper.metadata;
    if (!pdfUrl) return paper;
    try {
      return { ...paper, body: (await this.readPdf(pdfUrl)).slice(0, maxChars) };
    } catch (error) {
      console.warn(`[ArxivClient] Falling back to the abstract for ${entryId}: ${describeError(error)}`);
      return paper;
    }
  }

  async retrieve(query: LiteratureQuery): Promise<Paper[]> {
    const params = new URLSearchParams({
      search_query: sanitizeArxivQuery(query.query),
      start: "0",
      max_results: String(query.topK)
    });

    let response: Response;
    try {
      response = await fetch(`${ARXIV_URL}?${params.toString()}`);
    } catch (error) {
      throw new ProviderError("arxiv", `arXiv request failed: ${describeError(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new ProviderError("arxiv", `arXiv request failed (${response.status})`);
    }

    const papers = parseArxivFeed(await response.text(), query.maxCharsPerDoc);
    if (!query.fullDocuments) return papers;

    const full: Paper[] = [];
    for (const paper of papers) {
      full.push(await this.withFullText(paper, query.maxCharsPerDoc));
    }
    return full;
  }
}
