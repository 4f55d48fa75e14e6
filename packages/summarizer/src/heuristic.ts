import { formatReportDate, getDataset, type DatasetCode, type ReportDate } from "../../ingestor/src/index";

const SAMPLE_LINES = 5;

// Offline summary used when no model is configured.
export function summariseHeuristically(dataset: DatasetCode, reportDate: ReportDate, text: string): string {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);

  const definition = getDataset(dataset);
  const sample = lines.slice(0, SAMPLE_LINES).map((line) => `• ${line}`);

  return [
    `${dataset} ${definition.title} for ${formatReportDate(reportDate)}: ${lines.length} non-empty lines.`,
    ...(sample.length ? ["First entries:", ...sample] : [])
  ].join("\n");
}
