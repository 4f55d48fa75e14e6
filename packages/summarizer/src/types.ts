import type { DatasetCode, ReportDate } from "../../ingestor/src/index";

export interface CompletionOptions {
  model: string;
  maxTokens: number;
  temperature: number;
}

export interface LLMClient {
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

export interface SummarizeRequest {
  dataset: DatasetCode;
  reportDate: ReportDate;
  content: Uint8Array;
}

export interface Summary {
  text: string;
  model: string;
  generatedAt: string;
  truncated: boolean;
}

export interface Summarizer {
  summarize(request: SummarizeRequest, modelId: string): Promise<Summary>;
}

export interface SummarizerOptions {
  llmClient?: LLMClient;
  maxTokens?: number;
  temperature?: number;
  maxPreviewChars?: number;
  maxInputBytes?: number;
}
