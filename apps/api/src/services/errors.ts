export type ErrorCode =
  | "provider_unavailable"
  | "provider_request"
  | "transient"
  | "extraction_parse"
  | "supersession_conflict"
  | "job_timeout"
  | "claim_not_found"
  | "refresh_in_progress"
  | "validation";

export class ClaimwatchError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ProviderUnavailableError extends ClaimwatchError {
  constructor(message = "No AI provider available. Configure OPENAI_API_KEY, OPENROUTER_API_KEY or OLLAMA_ENABLED.") {
    super("provider_unavailable", message);
  }
}

/**
 * Thrown by providers. 429, 5xx and network failures are transient.
 */
export class ProviderRequestError extends ClaimwatchError {
  readonly status: number;
  readonly transient: boolean;

  constructor(provider: string, status: number, detail: string) {
    super("provider_request", `${provider} request failed (${status || "network"}): ${detail}`);
    this.status = status;
    this.transient = status === 0 || status === 408 || status === 429 || status >= 500;
  }
}

export class TransientProviderError extends ClaimwatchError {
  readonly attempts: number;

  constructor(attempts: number, lastError: string) {
    super("transient", `Gave up after ${attempts} attempts: ${lastError}`);
    this.attempts = attempts;
  }
}

export class ExtractionParseError extends ClaimwatchError {
  readonly rawText: string;

  constructor(message: string, rawText: string) {
    super("extraction_parse", message);
    this.rawText = rawText;
  }
}

export class ConcurrentSupersessionConflictError extends ClaimwatchError {
  readonly expectedActiveId: string | null;
  readonly actualActiveId: string | null;

  constructor(key: string, expectedActiveId: string | null, actualActiveId: string | null) {
    super(
      "supersession_conflict",
      `Active claim for ${key} moved from ${expectedActiveId ?? "none"} to ${actualActiveId ?? "none"}`
    );
    this.expectedActiveId = expectedActiveId;
    this.actualActiveId = actualActiveId;
  }
}

export class JobTimeoutError extends ClaimwatchError {
  constructor(competitorId: string, timeoutMs: number) {
    super("job_timeout", `Refresh job for ${competitorId} exceeded ${timeoutMs}ms`);
  }
}

export class ClaimNotFoundError extends ClaimwatchError {
  constructor(id: string) {
    super("claim_not_found", `Claim ${id} not found`);
  }
}

export class RefreshInProgressError extends ClaimwatchError {
  constructor() {
    super("refresh_in_progress", "A refresh run is already in progress");
  }
}

export class ValidationError extends ClaimwatchError {
  constructor(message: string) {
    super("validation", message);
  }
}
