import { DATASET_CODES, type DatasetCode, type DatasetDefinition, type ReportDate } from "./types";

function monthDay(date: ReportDate): string {
  return `${date.month}`.padStart(2, "0") + `${date.day}`.padStart(2, "0");
}

const DATASETS: Record<DatasetCode, DatasetDefinition> = {
  ST1: {
    code: "ST1",
    title: "well licences issued",
    publicationHour: 10,
    buildPath: (date) => `/data/well-lic/WELLS${monthDay(date)}.txt`
  },
  ST100: {
    code: "ST100",
    title: "pipeline construction notices",
    publicationHour: 21,
    buildPath: (date) => `/prd/data/pipeconst/PIPE${monthDay(date)}.txt`
  }
};

const KNOWN_CODES: ReadonlySet<unknown> = new Set(DATASET_CODES);

export function isDatasetCode(value: unknown): value is DatasetCode {
  return KNOWN_CODES.has(value);
}

export function getDataset(code: DatasetCode): DatasetDefinition {
  return DATASETS[code];
}

export function buildReportUrl(baseUrl: string, dataset: DatasetCode, date: ReportDate): string {
  const trimmed = baseUrl.replace(/\/+$/, "");
  return `${trimmed}${getDataset(dataset).buildPath(date)}`;
}
