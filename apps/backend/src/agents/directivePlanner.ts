import type { CapabilityKind, PlanOrigin, PlanStep } from "@healthdesk/shared";
import { CAPABILITY_KINDS, TOOL_NAMES } from "../capabilities/CapabilityProvider.js";

export const DOCTOR_KEYWORDS: readonly string[] = [
  "doctor",
  "specialist",
  "physician",
  "consult",
  "consultation",
  "appointment",
  "cardiologist",
  "neurologist",
  "oncologist",
  "dermatologist",
  "psychiatrist",
  "pediatrician",
  "endocrinologist",
  "gastroenterologist",
  "surgeon",
  "orthopedist",
  "dentist"
];

export const RESEARCH_KEYWORDS: readonly string[] = [
  "research",
  "study",
  "studies",
  "paper",
  "papers",
  "arxiv",
  "clinical trial",
  "evidence",
  "meta-analysis",
  "systematic review"
];

interface KeywordRule {
  kind: CapabilityKind;
  keywords: readonly string[];
  reason: string;
}

// Evaluated in this order, after the model's directives.
const KEYWORD_RULES: readonly KeywordRule[] = [
  { kind: "literature_search", keywords: RESEARCH_KEYWORDS, reason: "the question references research/studies" },
  { kind: "doctor_recommendation", keywords: DOCTOR_KEYWORDS, reason: "the question requests a doctor" }
];

const DEFAULT_CAPABILITY: CapabilityKind = "web_search";

export interface InvocationPlan {
  steps: PlanStep[];
  notes: string[];
}

export function directiveMarker(kind: CapabilityKind): string {
  return `TOOL: ${TOOL_NAMES[kind]}`;
}

/**
 * Kinds whose marker (`TOOL: <tool name>`, case-insensitive, any spacing after
 * the colon) appears anywhere in the text, in the fixed capability order.
 */
export function parseDirectives(text: string): CapabilityKind[] {
  return CAPABILITY_KINDS.filter((kind) => new RegExp(`TOOL:\\s*${TOOL_NAMES[kind]}\\b`, "i").test(text));
}

export function matchesKeyword(question: string, keywords: readonly string[]): boolean {
  const text = question.toLowerCase();
  return keywords.some((keyword) => text.includes(keyword));
}

export class DirectivePlanner {
  plan(question: string, directiveText: string): InvocationPlan {
    const steps: PlanStep[] = [];
    const notes: string[] = [];

    const add = (kind: CapabilityKind, origin: PlanOrigin): boolean => {
      if (steps.some((step) => step.kind === kind)) return false;
      steps.push({ id: `${kind}-step-${steps.length + 1}`, kind, origin });
      return true;
    };

    for (const kind of parseDirectives(directiveText)) {
      add(kind, "directive");
    }

    for (const rule of KEYWORD_RULES) {
      if (matchesKeyword(question, rule.keywords) && add(rule.kind, "keyword")) {
        notes.push(`Added ${TOOL_NAMES[rule.kind]} because ${rule.reason}.`);
      }
    }

    if (steps.length === 0) {
      add(DEFAULT_CAPABILITY, "default");
      notes.push(`No tool selected by the model; defaulting to ${TOOL_NAMES[DEFAULT_CAPABILITY]}.`);
    }

    return { steps, notes };
  }
}
