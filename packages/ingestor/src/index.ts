import { createHash } from "node:crypto";
import type {
  DatasetCode,
  FetcherOptions,
  RawReport,
  ReportDate,
  ReportFetcher
} from "./types";
import { buildReportUrl } from "./datasets";
import { formatReportDate } from "./dates";
import { ReportNotFoundError, SourceUnavailableError } from "./errors";

export * from "./types";
export * from "./datasets";
export * from "./dates";
export * from "./errors";

export const DEFAULT_BASE_URL = "https://static.aer.ca";
export const DEFAULT_FETCH_TIMEOUT_MS = 60_000;

export class SourceFetcher implements ReportFetcher {
  private readonly baseUrl: string;

  private readonly timeoutMs: number;

  private readonly fetchImpl: typeof fetch;

  constructor(options: FetcherOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetch(dataset: DatasetCode, date: ReportDate): Promise<RawReport> {
    const url = buildReportUrl(this.baseUrl, dataset, date);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "GET",
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SourceUnavailableError(url, `Failed to download ${url}: ${reason}`, { cause: error });
    }

    if (response.status === 404) {
      throw new ReportNotFoundError(url);
    }
    if (!response.ok) {
      throw new SourceUnavailableError(url, `Failed to download ${url}: status=${response.status}`, {
        status: response.status
      });
    }

    let content: Uint8Array;
    try {
      content = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SourceUnavailableError(url, `Failed to read body of ${url}: ${reason}`, { cause: error });
    }

    if (!content.byteLength) {
      throw new SourceUnavailableError(url, `Empty response body from ${url}`, {
        status: response.status
      });
    }

    return {
      dataset,
      reportDate: date,
      sourceUrl: url,
      content,
      sha256: createHash("sha256").update(content).digest("hex"),
      fetchedAt: new Date().toISOString()
    };
  }
}

export function describeReport(report: RawReport): string {
  return `${report.dataset} ${formatReportDate(report.reportDate)} (${report.content.byteLength} bytes)`;
}
