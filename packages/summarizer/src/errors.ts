export type SummarizerErrorCode = "ModelUnavailable" | "ContentRejected";

export class SummarizerError extends Error {
  readonly code: SummarizerErrorCode;

  constructor(code: SummarizerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ModelUnavailableError extends SummarizerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ModelUnavailable", message, options);
  }
}

export class ContentRejectedError extends SummarizerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ContentRejected", message, options);
  }
}

const REJECTED_STATUSES = new Set([400, 413, 422]);

export function classifyModelError(error: unknown): SummarizerError {
  if (error instanceof SummarizerError) {
    return error;
  }
  const reason = error instanceof Error ? error.message : String(error);
  const status = readStatus(error);
  if (status !== undefined && REJECTED_STATUSES.has(status)) {
    return new ContentRejectedError(`Model rejected the report (status ${status}): ${reason}`, { cause: error });
  }
  const suffix = status !== undefined ? ` (status ${status})` : "";
  return new ModelUnavailableError(`Model invocation failed${suffix}: ${reason}`, { cause: error });
}

function readStatus(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}
