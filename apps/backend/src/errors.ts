import type { ExecutionRecord } from "@healthdesk/shared";

export class CredentialError extends Error {
  constructor(readonly key: string, message: string) {
    super(message);
    this.name = "CredentialError";
  }
}

export class ProviderError extends Error {
  constructor(readonly provider: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ProviderError";
  }
}

export class SynthesisError extends Error {
  constructor(message: string, readonly record: ExecutionRecord, options?: ErrorOptions) {
    super(message, options);
    this.name = "SynthesisError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toProviderError(provider: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;
  return new ProviderError(provider, describeError(error), { cause: error });
}
