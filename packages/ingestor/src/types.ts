export const DATASET_CODES = ["ST1", "ST100"] as const;

export type DatasetCode = (typeof DATASET_CODES)[number];

export interface ReportDate {
  year: number;
  month: number;
  day: number;
}

export type DateStrategy = "calendar" | "publication";

export interface RawReport {
  dataset: DatasetCode;
  reportDate: ReportDate;
  sourceUrl: string;
  content: Uint8Array;
  sha256: string;
  fetchedAt: string;
}

export interface ReportFetcher {
  fetch(dataset: DatasetCode, date: ReportDate): Promise<RawReport>;
}

export interface DatasetDefinition {
  code: DatasetCode;
  title: string;
  // Local hour at which the publisher releases the day's file.
  publicationHour: number;
  buildPath(date: ReportDate): string;
}

export interface FetcherOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export type FetchErrorCode = "SourceUnavailable" | "ReportNotFound";
