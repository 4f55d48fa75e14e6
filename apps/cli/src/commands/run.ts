import {
  ConfigurationError,
  configurationError,
  createPipeline,
  handleInvocation,
  loadConfig,
  type PipelineConfig,
  type PipelineResult
} from "../../../../packages/core/src/index";
import { parseReportDate } from "../../../../packages/ingestor/src/index";
import type { Logger } from "../../../../packages/staging/src/index";

export interface CliRunOptions {
  dataset: string;
  date?: string;
  format?: string;
  env?: NodeJS.ProcessEnv;
  fetchImpl?: typeof fetch;
  logger?: Logger;
  print?: (line: string) => void;
}

export async function handleRun(options: CliRunOptions): Promise<PipelineResult> {
  const print = options.print ?? ((line: string) => console.log(line));
  const result = await execute(options);

  if (normalizeFormat(options.format) === "text") {
    renderTextResult(result, print);
  } else {
    print(JSON.stringify(result, null, 2));
  }
  return result;
}

async function execute(options: CliRunOptions): Promise<PipelineResult> {
  let config: PipelineConfig;
  try {
    config = withDateOverride(loadConfig(options.env ?? process.env), options.date);
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      return configurationError(options.dataset, error.message);
    }
    throw error;
  }

  const pipeline = createPipeline(config, { fetchImpl: options.fetchImpl, logger: options.logger });
  return handleInvocation({ dataset: options.dataset }, { config, pipeline });
}

function withDateOverride(config: PipelineConfig, date?: string): PipelineConfig {
  if (date === undefined) {
    return config;
  }
  const reportDateOverride = parseReportDate(date);
  if (!reportDateOverride) {
    throw new ConfigurationError([`--date must be a calendar date in YYYY-MM-DD form, got ${JSON.stringify(date)}`]);
  }
  return { ...config, reportDateOverride };
}

function normalizeFormat(format?: string): "json" | "text" {
  if (!format) {
    return "json";
  }
  return format.toLowerCase() === "text" ? "text" : "json";
}

function renderTextResult(result: PipelineResult, print: (line: string) => void): void {
  print(`# AER ${result.dataset} ${result.reportDate ?? "(no date)"}: ${result.status}`);
  if (result.sourceUrl) {
    print(`Source: ${result.sourceUrl}`);
  }
  if (result.stagingKey) {
    print(`Staging key: ${result.stagingKey} (cleanup ${result.cleanup})`);
  }
  if (result.errorCode) {
    print(`Error: ${result.errorCode}${result.message ? ` - ${result.message}` : ""}`);
  }
}
