import type { FetchErrorCode } from "./types";

export class FetchError extends Error {
  readonly code: FetchErrorCode;

  readonly url: string;

  constructor(code: FetchErrorCode, url: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.url = url;
  }
}

export class SourceUnavailableError extends FetchError {
  readonly status?: number;

  constructor(url: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super("SourceUnavailable", url, message, { cause: options.cause });
    this.status = options.status;
  }
}

// The publisher has not produced the file yet, or the date is wrong.
export class ReportNotFoundError extends FetchError {
  constructor(url: string) {
    super("ReportNotFound", url, `Report not published at ${url}`);
  }
}
