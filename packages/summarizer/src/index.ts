import { ContentRejectedError, ModelUnavailableError, classifyModelError } from "./errors";
import { summariseHeuristically } from "./heuristic";
import { DEFAULT_MAX_PREVIEW_CHARS, buildPrompt, decodeReport, previewReport } from "./prompt";
import type { LLMClient, SummarizeRequest, Summarizer, SummarizerOptions, Summary } from "./types";

export * from "./types";
export * from "./errors";
export { AnthropicClient, extractText } from "./anthropic";
export type { AnthropicClientOptions } from "./anthropic";
export { buildPrompt, decodeReport, previewReport } from "./prompt";
export type { ReportPreview } from "./prompt";
export { summariseHeuristically } from "./heuristic";

export const HEURISTIC_MODEL = "heuristic";

const DEFAULT_MAX_TOKENS = 700;
const DEFAULT_TEMPERATURE = 0.2;
const DEFAULT_MAX_INPUT_BYTES = 2_000_000;

export class ReportSummarizer implements Summarizer {
  private readonly llmClient?: LLMClient;

  private readonly maxTokens: number;

  private readonly temperature: number;

  private readonly maxPreviewChars: number;

  private readonly maxInputBytes: number;

  constructor(options: SummarizerOptions = {}) {
    this.llmClient = options.llmClient;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    this.maxPreviewChars = options.maxPreviewChars ?? DEFAULT_MAX_PREVIEW_CHARS;
    this.maxInputBytes = options.maxInputBytes ?? DEFAULT_MAX_INPUT_BYTES;
  }

  async summarize(request: SummarizeRequest, modelId: string): Promise<Summary> {
    if (request.content.byteLength > this.maxInputBytes) {
      throw new ContentRejectedError(
        `Report is ${request.content.byteLength} bytes, above the ${this.maxInputBytes} byte limit`
      );
    }

    const text = decodeReport(request.content);
    if (!text.trim()) {
      throw new ContentRejectedError("Report has no text content");
    }

    const preview = previewReport(text, this.maxPreviewChars);

    if (modelId === HEURISTIC_MODEL) {
      return {
        text: summariseHeuristically(request.dataset, request.reportDate, text),
        model: HEURISTIC_MODEL,
        generatedAt: new Date().toISOString(),
        truncated: false
      };
    }

    if (!this.llmClient) {
      throw new ModelUnavailableError(`No model client configured for ${modelId}`);
    }

    const prompt = buildPrompt(request.dataset, request.reportDate, preview);
    let completion: string;
    try {
      completion = await this.llmClient.complete(prompt, {
        model: modelId,
        maxTokens: this.maxTokens,
        temperature: this.temperature
      });
    } catch (error: unknown) {
      throw classifyModelError(error);
    }

    const summary = completion.trim();
    if (!summary) {
      throw new ModelUnavailableError(`Model ${modelId} returned an empty summary`);
    }

    return {
      text: summary,
      model: modelId,
      generatedAt: new Date().toISOString(),
      truncated: preview.truncated
    };
  }
}
