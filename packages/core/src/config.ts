import os from "node:os";
import path from "node:path";

import {
  DEFAULT_BASE_URL,
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_TIME_ZONE,
  parseReportDate,
  type DateStrategy,
  type ReportDate
} from "../../ingestor/src/index";
import { HEURISTIC_MODEL } from "../../summarizer/src/index";
import { ConfigurationError } from "./errors";

export type NotifierConfig =
  | { mode: "slack"; slackToken: string; channel: string }
  | { mode: "console" };

export interface PipelineSettings {
  modelId: string;
  timeZone: string;
  dateStrategy: DateStrategy;
  notifyOnFailure: boolean;
}

export interface PipelineConfig extends PipelineSettings {
  stagingDirectory: string;
  notifier: NotifierConfig;
  anthropicApiKey?: string;
  reportDateOverride?: ReportDate;
  sourceBaseUrl: string;
  fetchTimeoutMs: number;
}

export const DEFAULT_STAGING_DIRECTORY = path.join(os.tmpdir(), "aer-digest-staging");

const TRUTHY = new Set(["1", "true", "yes", "on"]);

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const problems: string[] = [];
  const read = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  const modelId = read("MODEL_ID");
  if (!modelId) {
    problems.push("MODEL_ID is required");
  }

  const anthropicApiKey = read("ANTHROPIC_API_KEY");
  if (modelId && modelId !== HEURISTIC_MODEL && !anthropicApiKey) {
    problems.push(`ANTHROPIC_API_KEY is required for model ${modelId}`);
  }

  const notifier = readNotifier(read, problems);

  let reportDateOverride: ReportDate | undefined;
  const rawOverride = read("REPORT_DATE");
  if (rawOverride) {
    reportDateOverride = parseReportDate(rawOverride);
    if (!reportDateOverride) {
      problems.push(`REPORT_DATE must be a calendar date in YYYY-MM-DD form, got ${JSON.stringify(rawOverride)}`);
    }
  }

  const timeZone = read("REPORT_TIME_ZONE") ?? DEFAULT_TIME_ZONE;
  if (!isValidTimeZone(timeZone)) {
    problems.push(`REPORT_TIME_ZONE is not a known time zone: ${timeZone}`);
  }

  const strategy = read("REPORT_DATE_STRATEGY")?.toLowerCase() ?? "calendar";
  if (strategy !== "calendar" && strategy !== "publication") {
    problems.push(`REPORT_DATE_STRATEGY must be calendar or publication, got ${strategy}`);
  }

  const fetchTimeoutMs = parseIntegerEnv(read("FETCH_TIMEOUT_MS"), DEFAULT_FETCH_TIMEOUT_MS);
  if (fetchTimeoutMs === undefined) {
    problems.push("FETCH_TIMEOUT_MS must be a positive integer");
  }

  if (problems.length || !modelId || !notifier || fetchTimeoutMs === undefined) {
    throw new ConfigurationError(problems);
  }

  return {
    stagingDirectory: read("STAGING_DIR") ?? DEFAULT_STAGING_DIRECTORY,
    notifier,
    modelId,
    anthropicApiKey,
    reportDateOverride,
    timeZone,
    dateStrategy: strategy === "publication" ? "publication" : "calendar",
    sourceBaseUrl: read("AER_BASE_URL") ?? DEFAULT_BASE_URL,
    fetchTimeoutMs,
    notifyOnFailure: TRUTHY.has(read("NOTIFY_ON_FAILURE")?.toLowerCase() ?? "")
  };
}

function readNotifier(
  read: (name: string) => string | undefined,
  problems: string[]
): NotifierConfig | undefined {
  const mode = read("NOTIFIER")?.toLowerCase() ?? "slack";
  if (mode === "console") {
    return { mode };
  }
  if (mode !== "slack") {
    problems.push(`NOTIFIER must be slack or console, got ${mode}`);
    return undefined;
  }

  const slackToken = read("SLACK_TOKEN");
  const channel = read("SLACK_CHANNEL");
  if (!slackToken) {
    problems.push("SLACK_TOKEN is required for the slack notifier");
  }
  if (!channel) {
    problems.push("SLACK_CHANNEL is required for the slack notifier");
  }
  return slackToken && channel ? { mode, slackToken, channel } : undefined;
}

function parseIntegerEnv(value: string | undefined, fallback: number): number | undefined {
  if (value === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(value)) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return parsed > 0 ? parsed : undefined;
}

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}
