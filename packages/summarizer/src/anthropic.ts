import Anthropic from "@anthropic-ai/sdk";

import { ModelUnavailableError, classifyModelError } from "./errors";
import type { CompletionOptions, LLMClient } from "./types";

const DEFAULT_TIMEOUT_MS = 120_000;

export interface AnthropicClientOptions {
  apiKey?: string;
  timeoutMs?: number;
  client?: Anthropic;
}

export class AnthropicClient implements LLMClient {
  private readonly client: Anthropic;

  constructor(options: AnthropicClientOptions = {}) {
    this.client =
      options.client ??
      new Anthropic({
        apiKey: options.apiKey,
        timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        maxRetries: 0
      });
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    try {
      const response = await this.client.messages.create({
        model: options.model,
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        messages: [{ role: "user", content: prompt }]
      });
      return extractText(response.content);
    } catch (error: unknown) {
      throw classifyModelError(error);
    }
  }
}

export function extractText(blocks: ReadonlyArray<{ type: string; text?: unknown }>): string {
  const text = blocks
    .filter((block) => block.type === "text" && typeof block.text === "string")
    .map((block) => String(block.text))
    .join("\n")
    .trim();

  if (!text) {
    throw new ModelUnavailableError("No text content in model response");
  }
  return text;
}
