import { formatReportDate, type DatasetCode, type ReportDate } from "../../ingestor/src/index";

const SEGMENT = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const RESERVED_SUFFIXES = [".meta.json", ".tmp"];

export function stagingKey(dataset: DatasetCode, date: ReportDate): string {
  return `${dataset}/${formatReportDate(date)}`;
}

export function isValidKey(key: string): boolean {
  if (!key || RESERVED_SUFFIXES.some((suffix) => key.endsWith(suffix))) {
    return false;
  }
  return key.split("/").every((segment) => SEGMENT.test(segment));
}
