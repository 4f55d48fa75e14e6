import {
  formatReportDate,
  getDataset,
  type DatasetCode,
  type ReportDate
} from "../../ingestor/src/index";

export const DEFAULT_MAX_PREVIEW_CHARS = 8_000;

export interface ReportPreview {
  text: string;
  truncated: boolean;
}

export function decodeReport(content: Uint8Array): string {
  return new TextDecoder("utf-8").decode(content);
}

export function previewReport(text: string, maxChars = DEFAULT_MAX_PREVIEW_CHARS): ReportPreview {
  if (text.length <= maxChars) {
    return { text, truncated: false };
  }
  return { text: text.slice(0, maxChars), truncated: true };
}

export function buildPrompt(dataset: DatasetCode, reportDate: ReportDate, preview: ReportPreview): string {
  const definition = getDataset(dataset);
  const header = `Dataset ${dataset} (${formatReportDate(reportDate)}):`;
  const note = preview.truncated ? "\n[report truncated]" : "";

  return [
    "You are an oil & gas analyst.",
    `Summarize today's AER release: ${dataset} ${definition.title}.`,
    "Provide:",
    "- Key totals and notable entries",
    "- Any unusual spikes vs typical days",
    "- Operator or region callouts",
    "- Short, actionable insights",
    "",
    "Text:",
    "",
    `${header}\n${preview.text}${note}`
  ].join("\n");
}
