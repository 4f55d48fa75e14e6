import { describe, expect, it } from "vitest";

import { ReportNotFoundError, SourceUnavailableError } from "../../ingestor/src/index";
import { StagingError, silentLogger } from "../../staging/src/index";
import { ContentRejectedError, ModelUnavailableError } from "../../summarizer/src/index";
import { DeliveryFailedError } from "../../notifier/src/index";
import { ReportPipeline, type PipelineResult, type PipelineSettings } from "../src/index";
import { RecordingStore, fakeFetcher, fakeNotifier, fakeSummarizer } from "./fakes";

// Noon in Edmonton on 2024-06-10.
const NOW = new Date("2024-06-10T18:00:00.000Z");

const settings: PipelineSettings = {
  modelId: "claude-test-model",
  timeZone: "America/Edmonton",
  dateStrategy: "calendar",
  notifyOnFailure: false
};

function buildPipeline(overrides: {
  fetcher?: ReturnType<typeof fakeFetcher>;
  store?: RecordingStore;
  summarizer?: ReturnType<typeof fakeSummarizer>;
  notifier?: ReturnType<typeof fakeNotifier>;
  settings?: Partial<PipelineSettings>;
} = {}) {
  const fetcher = overrides.fetcher ?? fakeFetcher();
  const store = overrides.store ?? new RecordingStore();
  const summarizer = overrides.summarizer ?? fakeSummarizer();
  const notifier = overrides.notifier ?? fakeNotifier();
  const pipeline = new ReportPipeline({
    fetcher,
    store,
    summarizer,
    notifier,
    settings: { ...settings, ...overrides.settings },
    logger: silentLogger,
    now: () => NOW
  });
  return { pipeline, fetcher, store, summarizer, notifier };
}

// What a caller without the dataset union sees, such as a handler fed raw JSON.
interface UntypedRunner {
  run(dataset: string): Promise<PipelineResult>;
}

describe("ReportPipeline", () => {
  it("refuses an unknown dataset before touching any collaborator", async () => {
    const { pipeline, fetcher, store, summarizer, notifier } = buildPipeline({
      settings: { notifyOnFailure: true }
    });
    const untyped: UntypedRunner = pipeline;

    const result = await untyped.run("ST2");

    expect(result).toEqual({
      status: "configuration-error",
      dataset: "ST2",
      errorCode: "ConfigurationError",
      message: 'Unknown dataset "ST2"',
      cleanup: "not-needed"
    });
    expect(fetcher.fetch).not.toHaveBeenCalled();
    expect(store.calls).toEqual([]);
    expect(summarizer.summarize).not.toHaveBeenCalled();
    expect(notifier.publish).not.toHaveBeenCalled();
  });

  it("fetches, stages, summarizes, notifies and cleans up", async () => {
    const { pipeline, fetcher, store, summarizer, notifier } = buildPipeline();

    const result = await pipeline.run("ST1");

    expect(result).toEqual({
      status: "succeeded",
      dataset: "ST1",
      reportDate: "2024-06-10",
      stagingKey: "ST1/2024-06-10",
      sourceUrl: "https://static.aer.ca/data/well-lic/WELLS0610.txt",
      cleanup: "deleted"
    });
    expect(fetcher.fetch).toHaveBeenCalledWith("ST1", { year: 2024, month: 6, day: 10 });
    expect(store.calls).toEqual(["put ST1/2024-06-10", "get ST1/2024-06-10", "delete ST1/2024-06-10"]);
    expect(await store.list()).toEqual([]);

    const [request, modelId] = summarizer.summarize.mock.calls[0];
    expect(modelId).toBe("claude-test-model");
    expect(request.content.byteLength).toBe(500);

    expect(notifier.publish).toHaveBeenCalledTimes(1);
    const [message] = notifier.publish.mock.calls[0];
    expect(message.subject).toBe("AER ST1 summary – 2024-06-10");
    expect(message.body).toContain("S".repeat(120));
  });

  it("stores the source metadata with the staged object", async () => {
    const { pipeline, store } = buildPipeline();

    await pipeline.run("ST100");

    expect(store.metadata.get("ST100/2024-06-10")).toEqual({
      dataset: "ST100",
      reportDate: "2024-06-10",
      sourceUrl: "https://static.aer.ca/prd/data/pipeconst/PIPE0610.txt",
      sha256: "test-sha256"
    });
  });

  it("overwrites the same staging key when re-run for the same day", async () => {
    const { pipeline, fetcher, store } = buildPipeline();
    const date = { year: 2024, month: 3, day: 1 };

    const first = await pipeline.run("ST1", date);
    const second = await pipeline.run("ST1", date);

    expect(first.status).toBe("succeeded");
    expect(second.status).toBe("succeeded");
    expect(fetcher.fetch).toHaveBeenCalledTimes(2);
    expect(store.maxLive).toBe(1);
    expect(await store.list()).toEqual([]);
  });

  it("fetches exactly the backfill date when an override is given", async () => {
    const { pipeline, fetcher } = buildPipeline();

    const result = await pipeline.run("ST100", { year: 2023, month: 12, day: 25 });

    expect(fetcher.fetch).toHaveBeenCalledTimes(1);
    expect(fetcher.fetch).toHaveBeenCalledWith("ST100", { year: 2023, month: 12, day: 25 });
    expect(result.reportDate).toBe("2023-12-25");
    expect(result.stagingKey).toBe("ST100/2023-12-25");
  });

  it("resolves the date by publication time when configured", async () => {
    // 09:00 local on a Monday, before the ST1 release.
    const { pipeline, fetcher } = buildPipeline({ settings: { dateStrategy: "publication" } });
    const early = new ReportPipeline({
      fetcher,
      store: new RecordingStore(),
      summarizer: fakeSummarizer(),
      notifier: fakeNotifier(),
      settings: { ...settings, dateStrategy: "publication" },
      logger: silentLogger,
      now: () => new Date("2024-06-10T15:00:00.000Z")
    });

    await pipeline.run("ST1");
    await early.run("ST1");

    expect(fetcher.fetch.mock.calls.map((call) => call[1])).toEqual([
      { year: 2024, month: 6, day: 10 },
      { year: 2024, month: 6, day: 7 }
    ]);
  });

  it("reports an unpublished report without touching the other collaborators", async () => {
    const fetcher = fakeFetcher(async () => {
      throw new ReportNotFoundError("https://static.aer.ca/prd/data/pipeconst/PIPE0610.txt");
    });
    const { pipeline, store, summarizer, notifier } = buildPipeline({ fetcher });

    const result = await pipeline.run("ST100");

    expect(result).toEqual({
      status: "fetch-failed",
      dataset: "ST100",
      reportDate: "2024-06-10",
      stagingKey: "ST100/2024-06-10",
      errorCode: "ReportNotFound",
      message: "Report not published at https://static.aer.ca/prd/data/pipeconst/PIPE0610.txt",
      cleanup: "not-needed"
    });
    expect(store.calls).toEqual([]);
    expect(summarizer.summarize).not.toHaveBeenCalled();
    expect(notifier.publish).not.toHaveBeenCalled();
  });

  it("classifies unexpected fetch errors as source unavailable", async () => {
    const fetcher = fakeFetcher(async () => {
      throw new Error("socket hang up");
    });
    const { pipeline } = buildPipeline({ fetcher });

    const result = await pipeline.run("ST1");

    expect(result.status).toBe("fetch-failed");
    expect(result.errorCode).toBe("SourceUnavailable");
    expect(result.message).toBe("socket hang up");
  });

  it("stops without cleanup when staging fails", async () => {
    const store = new RecordingStore({ put: new StagingError("put", "ST1/2024-06-10", "disk full") });
    const { pipeline, summarizer, notifier } = buildPipeline({ store });

    const result = await pipeline.run("ST1");

    expect(result).toMatchObject({
      status: "fetch-failed",
      errorCode: "StagingError",
      message: "disk full",
      cleanup: "not-needed"
    });
    expect(store.calls).toEqual(["put ST1/2024-06-10"]);
    expect(summarizer.summarize).not.toHaveBeenCalled();
    expect(notifier.publish).not.toHaveBeenCalled();
  });

  it("still deletes the staged report when summarizing fails", async () => {
    const summarizer = fakeSummarizer(async () => {
      throw new ModelUnavailableError("model overloaded");
    });
    const { pipeline, store, notifier } = buildPipeline({ summarizer });

    const result = await pipeline.run("ST1");

    expect(result).toMatchObject({
      status: "summarize-failed",
      errorCode: "ModelUnavailable",
      message: "model overloaded",
      cleanup: "deleted"
    });
    expect(await store.list()).toEqual([]);
    expect(store.calls).toContain("delete ST1/2024-06-10");
    expect(notifier.publish).not.toHaveBeenCalled();
  });

  it("keeps the rejected-content code from the summarizer", async () => {
    const summarizer = fakeSummarizer(async () => {
      throw new ContentRejectedError("Report has no text content");
    });
    const { pipeline } = buildPipeline({ summarizer });

    const result = await pipeline.run("ST100");

    expect(result.status).toBe("summarize-failed");
    expect(result.errorCode).toBe("ContentRejected");
  });

  it("still deletes the staged report when notifying fails", async () => {
    const notifier = fakeNotifier(async () => {
      throw new DeliveryFailedError("C123", "Slack rejected the message: channel_not_found");
    });
    const { pipeline, store } = buildPipeline({ notifier });

    const result = await pipeline.run("ST1");

    expect(result).toMatchObject({
      status: "notify-failed",
      errorCode: "DeliveryFailed",
      message: "Slack rejected the message: channel_not_found",
      cleanup: "deleted"
    });
    expect(await store.list()).toEqual([]);
  });

  it("does not downgrade a delivered summary when deletion fails", async () => {
    const store = new RecordingStore({ delete: new Error("permission denied") });
    const { pipeline, notifier } = buildPipeline({ store });

    const result = await pipeline.run("ST1");

    expect(result.status).toBe("succeeded");
    expect(result.cleanup).toBe("failed");
    expect(notifier.publish).toHaveBeenCalledTimes(1);
  });

  it("publishes a failure notice only when alerting is enabled", async () => {
    const failingFetcher = () =>
      fakeFetcher(async () => {
        throw new SourceUnavailableError("https://static.aer.ca/data/well-lic/WELLS0610.txt", "status=503", {
          status: 503
        });
      });
    const quiet = buildPipeline({ fetcher: failingFetcher() });
    const alerting = buildPipeline({ fetcher: failingFetcher(), settings: { notifyOnFailure: true } });

    await quiet.pipeline.run("ST1");
    const result = await alerting.pipeline.run("ST1");

    expect(result.status).toBe("fetch-failed");
    expect(quiet.notifier.publish).not.toHaveBeenCalled();
    expect(alerting.notifier.publish).toHaveBeenCalledTimes(1);
    expect(alerting.notifier.publish.mock.calls[0][0]).toEqual({
      subject: "AER ST1 summary failed – 2024-06-10",
      body: "The ST1 run for 2024-06-10 ended with fetch-failed.\nstatus=503"
    });
  });
});
