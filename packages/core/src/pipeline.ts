import {
  FetchError,
  describeReport,
  formatReportDate,
  isDatasetCode,
  resolveReportDate,
  type DatasetCode,
  type FetchErrorCode,
  type RawReport,
  type ReportDate,
  type ReportFetcher
} from "../../ingestor/src/index";
import {
  StagingError,
  createSubsystemLogger,
  stagingKey,
  type Logger,
  type StagingStore,
  type SubsystemLogger
} from "../../staging/src/index";
import {
  classifyModelError,
  type Summarizer,
  type SummarizerErrorCode,
  type Summary
} from "../../summarizer/src/index";
import {
  formatFailureNotice,
  formatSummaryMessage,
  type Notifier
} from "../../notifier/src/index";
import type { PipelineSettings } from "./config";

export type PipelineStatus =
  | "succeeded"
  | "fetch-failed"
  | "summarize-failed"
  | "notify-failed"
  | "configuration-error";

export type PipelineErrorCode =
  | "ConfigurationError"
  | FetchErrorCode
  | "StagingError"
  | SummarizerErrorCode
  | "DeliveryFailed";

export type CleanupOutcome = "deleted" | "failed" | "not-needed";

export interface PipelineResult {
  status: PipelineStatus;
  dataset: string;
  reportDate?: string;
  stagingKey?: string;
  sourceUrl?: string;
  errorCode?: PipelineErrorCode;
  message?: string;
  cleanup: CleanupOutcome;
}

export interface PipelineDependencies {
  fetcher: ReportFetcher;
  store: StagingStore;
  summarizer: Summarizer;
  notifier: Notifier;
  settings: PipelineSettings;
  logger?: Logger;
  now?: () => Date;
}

interface StageFailure {
  status: Exclude<PipelineStatus, "succeeded" | "configuration-error">;
  errorCode: PipelineErrorCode;
  message: string;
}

export class ReportPipeline {
  private readonly deps: PipelineDependencies;

  private readonly log: SubsystemLogger;

  private readonly now: () => Date;

  constructor(deps: PipelineDependencies) {
    this.deps = deps;
    this.log = createSubsystemLogger("pipeline", deps.logger);
    this.now = deps.now ?? (() => new Date());
  }

  async run(dataset: DatasetCode, dateOverride?: ReportDate): Promise<PipelineResult> {
    // Untyped callers can still hand over an arbitrary string.
    if (!isDatasetCode(dataset)) {
      this.log.error(`unknown dataset ${JSON.stringify(dataset)}`);
      return configurationError(String(dataset), `Unknown dataset ${JSON.stringify(dataset)}`);
    }

    const { settings } = this.deps;
    const reportDate =
      dateOverride ??
      resolveReportDate(dataset, {
        now: this.now(),
        timeZone: settings.timeZone,
        strategy: settings.dateStrategy
      });
    const day = formatReportDate(reportDate);
    const key = stagingKey(dataset, reportDate);
    const base = { dataset, reportDate: day, stagingKey: key };

    this.log.info(`starting ${dataset} for ${day}${dateOverride ? " (backfill)" : ""}`);

    let report: RawReport;
    try {
      report = await this.deps.fetcher.fetch(dataset, reportDate);
    } catch (error: unknown) {
      const failure = fetchFailure(error);
      this.log.warn(`fetch failed for ${dataset} ${day}: ${failure.message}`);
      return this.finish({ ...base, ...failure, cleanup: "not-needed" }, reportDate);
    }
    this.log.info(`fetched ${describeReport(report)} from ${report.sourceUrl}`);

    try {
      await this.deps.store.put(key, report.content, {
        dataset,
        reportDate: day,
        sourceUrl: report.sourceUrl,
        sha256: report.sha256
      });
    } catch (error: unknown) {
      const message = errorMessage(error);
      this.log.error(`staging ${key} failed: ${message}`);
      return this.finish(
        {
          ...base,
          sourceUrl: report.sourceUrl,
          status: "fetch-failed",
          errorCode: "StagingError",
          message,
          cleanup: "not-needed"
        },
        reportDate
      );
    }

    const failure = await this.summarizeAndNotify(dataset, reportDate, key);
    const cleanup = await this.cleanup(key);

    const result: PipelineResult = failure
      ? { ...base, sourceUrl: report.sourceUrl, ...failure, cleanup }
      : { ...base, sourceUrl: report.sourceUrl, status: "succeeded", cleanup };

    return this.finish(result, reportDate);
  }

  private async summarizeAndNotify(
    dataset: DatasetCode,
    reportDate: ReportDate,
    key: string
  ): Promise<StageFailure | undefined> {
    let summary: Summary;
    try {
      const content = await this.deps.store.get(key);
      summary = await this.deps.summarizer.summarize(
        { dataset, reportDate, content },
        this.deps.settings.modelId
      );
    } catch (error: unknown) {
      const failure = summarizeFailure(error);
      this.log.warn(`summarize failed for ${key}: ${failure.message}`);
      return failure;
    }
    this.log.info(`summarized ${key} with ${summary.model} (${summary.text.length} chars)`);

    try {
      await this.deps.notifier.publish(formatSummaryMessage({ dataset, reportDate, summary, stagingKey: key }));
    } catch (error: unknown) {
      const message = errorMessage(error);
      this.log.warn(`notify failed for ${key}: ${message}`);
      return { status: "notify-failed", errorCode: "DeliveryFailed", message };
    }
    this.log.info(`published summary for ${key}`);

    return undefined;
  }

  private async cleanup(key: string): Promise<CleanupOutcome> {
    try {
      await this.deps.store.delete(key);
      this.log.info(`deleted staged object ${key}`);
      return "deleted";
    } catch (error: unknown) {
      this.log.warn(`could not delete staged object ${key}: ${errorMessage(error)}`);
      return "failed";
    }
  }

  private async finish(result: PipelineResult, reportDate: ReportDate): Promise<PipelineResult> {
    if (result.status === "succeeded") {
      this.log.info(`${result.dataset} ${formatReportDate(reportDate)} succeeded`);
      return result;
    }

    if (
      this.deps.settings.notifyOnFailure &&
      (result.status === "fetch-failed" || result.status === "summarize-failed")
    ) {
      try {
        await this.deps.notifier.publish(formatFailureNotice(result));
      } catch (error: unknown) {
        this.log.warn(`failure notice for ${result.dataset} not delivered: ${errorMessage(error)}`);
      }
    }

    return result;
  }
}

export function configurationError(dataset: string, message: string): PipelineResult {
  return {
    status: "configuration-error",
    dataset,
    errorCode: "ConfigurationError",
    message,
    cleanup: "not-needed"
  };
}

function fetchFailure(error: unknown): StageFailure {
  const errorCode: PipelineErrorCode = error instanceof FetchError ? error.code : "SourceUnavailable";
  return { status: "fetch-failed", errorCode, message: errorMessage(error) };
}

function summarizeFailure(error: unknown): StageFailure {
  if (error instanceof StagingError) {
    return { status: "summarize-failed", errorCode: "StagingError", message: error.message };
  }
  const classified = classifyModelError(error);
  return { status: "summarize-failed", errorCode: classified.code, message: classified.message };
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
