import type { StagingOperation } from "./types";

export class StagingError extends Error {
  readonly code = "StagingError";

  readonly operation: StagingOperation;

  readonly key?: string;

  constructor(operation: StagingOperation, key: string | undefined, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StagingError";
    this.operation = operation;
    this.key = key;
  }
}

export function toStagingError(operation: StagingOperation, key: string | undefined, error: unknown): StagingError {
  if (error instanceof StagingError) {
    return error;
  }
  const reason = error instanceof Error ? error.message : String(error);
  const target = key ? ` ${key}` : "";
  return new StagingError(operation, key, `Staging ${operation}${target} failed: ${reason}`, { cause: error });
}
