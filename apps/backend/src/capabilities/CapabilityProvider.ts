import type { CapabilityKind, Document } from "@healthdesk/shared";
import type { ProviderError } from "../errors.js";

export interface CapabilityOutcome {
  kind: CapabilityKind;
  documents: Document[];
  error?: ProviderError;
}

// Implementations never reject: failures come back as a single sentinel
// document with `error` set.
export interface CapabilityProvider {
  readonly kind: CapabilityKind;
  invoke(query: string): Promise<CapabilityOutcome>;
}

export type CapabilityRegistry = Readonly<Record<CapabilityKind, CapabilityProvider>>;

// Fixed scan order for directives and keyword rules.
export const CAPABILITY_KINDS: readonly CapabilityKind[] = ["web_search", "literature_search", "doctor_recommendation"];

export const TOOL_NAMES: Readonly<Record<CapabilityKind, string>> = {
  web_search: "search_web",
  literature_search: "search_arxiv",
  doctor_recommendation: "recommend_doctor"
};

export function capabilityForTool(toolName: string): CapabilityKind | undefined {
  return CAPABILITY_KINDS.find((kind) => TOOL_NAMES[kind] === toolName);
}

export function truncateBody(text: string, maxChars: number): string {
  if (maxChars <= 0 || text.length <= maxChars) return text;
  return `${text.slice(0, maxChars)}...`;
}

export function sentinelDocument(body: string, sourceRef: string): Document {
  return { body, sourceRef };
}

export function formatDocument(document: Document): string {
  const sections: string[] = [];
  if (document.title) sections.push(`## Title\n${document.title}`);
  if (document.summary) sections.push(`## Summary\n${document.summary}`);
  sections.push(`## Content\n${document.body}`);
  sections.push(`## Source\n${document.sourceRef}`);
  return sections.join("\n\n");
}

export function formatOutcome(outcome: CapabilityOutcome): string {
  return outcome.documents.map(formatDocument).join("\n\n---\n\n");
}
