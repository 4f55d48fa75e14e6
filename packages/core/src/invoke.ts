import {
  SourceFetcher,
  isDatasetCode,
  type DatasetCode,
  type ReportFetcher
} from "../../ingestor/src/index";
import { FileSystemStagingStore, type Logger, type StagingStore } from "../../staging/src/index";
import { AnthropicClient, ReportSummarizer, type Summarizer } from "../../summarizer/src/index";
import { ConsoleNotifier, SlackNotifier, type Notifier } from "../../notifier/src/index";
import type { PipelineConfig } from "./config";
import { ConfigurationError } from "./errors";
import { ReportPipeline, configurationError, type PipelineResult } from "./pipeline";

export interface InvocationPayload {
  dataset: DatasetCode;
}

export function parseInvocation(payload: unknown): InvocationPayload {
  if (typeof payload !== "object" || payload === null || !("dataset" in payload)) {
    throw new ConfigurationError(["Invocation payload must be an object with a dataset field"]);
  }
  const raw = payload.dataset;
  const dataset = typeof raw === "string" ? raw.trim().toUpperCase() : raw;
  if (!isDatasetCode(dataset)) {
    throw new ConfigurationError([`Unknown dataset ${JSON.stringify(raw)}; expected ST1 or ST100`]);
  }
  return { dataset };
}

export interface PipelineOverrides {
  fetcher?: ReportFetcher;
  store?: StagingStore;
  summarizer?: Summarizer;
  notifier?: Notifier;
  fetchImpl?: typeof fetch;
  logger?: Logger;
  now?: () => Date;
}

export function createPipeline(config: PipelineConfig, overrides: PipelineOverrides = {}): ReportPipeline {
  const fetcher =
    overrides.fetcher ??
    new SourceFetcher({
      baseUrl: config.sourceBaseUrl,
      timeoutMs: config.fetchTimeoutMs,
      fetchImpl: overrides.fetchImpl
    });

  const store =
    overrides.store ??
    new FileSystemStagingStore({ directory: config.stagingDirectory, logger: overrides.logger });

  const summarizer =
    overrides.summarizer ??
    new ReportSummarizer({
      llmClient: config.anthropicApiKey ? new AnthropicClient({ apiKey: config.anthropicApiKey }) : undefined
    });

  const notifier = overrides.notifier ?? createNotifier(config, overrides);

  return new ReportPipeline({
    fetcher,
    store,
    summarizer,
    notifier,
    settings: {
      modelId: config.modelId,
      timeZone: config.timeZone,
      dateStrategy: config.dateStrategy,
      notifyOnFailure: config.notifyOnFailure
    },
    logger: overrides.logger,
    now: overrides.now
  });
}

function createNotifier(config: PipelineConfig, overrides: PipelineOverrides): Notifier {
  if (config.notifier.mode === "console") {
    return new ConsoleNotifier(overrides.logger);
  }
  return new SlackNotifier({
    slackToken: config.notifier.slackToken,
    channel: config.notifier.channel,
    fetchImpl: overrides.fetchImpl
  });
}

export interface InvocationContext {
  config: PipelineConfig;
  pipeline?: ReportPipeline;
}

export async function handleInvocation(payload: unknown, context: InvocationContext): Promise<PipelineResult> {
  let invocation: InvocationPayload;
  try {
    invocation = parseInvocation(payload);
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      return configurationError(describeDataset(payload), error.message);
    }
    throw error;
  }

  const pipeline = context.pipeline ?? createPipeline(context.config);
  return pipeline.run(invocation.dataset, context.config.reportDateOverride);
}

function describeDataset(payload: unknown): string {
  if (typeof payload === "object" && payload !== null && "dataset" in payload) {
    return String(payload.dataset);
  }
  return "unknown";
}
