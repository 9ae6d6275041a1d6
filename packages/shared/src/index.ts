export type CapabilityKind = "web_search" | "literature_search" | "doctor_recommendation";

export type PlanOrigin = "directive" | "keyword" | "default";

export type PlannerVariant = "autonomous" | "deterministic";

export type AssistantState = "uninitialized" | "ready";

export interface Document {
  readonly title?: string;
  readonly summary?: string;
  readonly body: string;
  readonly sourceRef: string;
}

export interface DoctorRecord {
  name: string;
  specialization: string;
  availableTimings: string;
  location: string;
  contact: string;
}

export interface PlanStep {
  id: string;
  kind: CapabilityKind;
  origin: PlanOrigin;
}

export interface ExecutionRecord {
  reasoningText: string;
  toolsSelected: CapabilityKind[];
  executionLog: string[];
}

export interface AnswerResult {
  answerText: string;
  record: ExecutionRecord;
  planner?: PlannerVariant;
}

export interface AnswerRequest {
  question: string;
}

export interface AnswerResponse extends AnswerResult {
  metadata: {
    provider: string;
    executionTimeMs: number;
    requestId: string;
  };
}

export interface CredentialsStatus {
  configured: boolean;
  message: string;
}
