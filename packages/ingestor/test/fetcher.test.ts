import { createHash } from "node:crypto";
import { describe, expect, it, vi } from "vitest";
import {
  ReportNotFoundError,
  SourceFetcher,
  SourceUnavailableError,
  buildReportUrl,
  isDatasetCode
} from "../src/index";

const JUNE_10 = { year: 2024, month: 6, day: 10 };

function fakeFetch(respond: (url: string) => Response | Promise<Response>) {
  return vi.fn(async (input: string | URL | Request) => respond(String(input)));
}

describe("dataset codes", () => {
  it("accepts only the two report families", () => {
    expect(isDatasetCode("ST1")).toBe(true);
    expect(isDatasetCode("ST100")).toBe(true);
    expect(isDatasetCode("st1")).toBe(false);
    expect(isDatasetCode("ST2")).toBe(false);
    expect(isDatasetCode(1)).toBe(false);
  });

  it("builds publisher URLs from the month and day", () => {
    expect(buildReportUrl("https://static.aer.ca", "ST1", JUNE_10)).toBe(
      "https://static.aer.ca/data/well-lic/WELLS0610.txt"
    );
    expect(buildReportUrl("http://localhost:8080/", "ST100", { year: 2023, month: 12, day: 25 })).toBe(
      "http://localhost:8080/prd/data/pipeconst/PIPE1225.txt"
    );
  });
});

describe("SourceFetcher", () => {
  it("returns the report bytes with a content hash", async () => {
    const body = "WELL LICENCES ISSUED\n0012345 SAMPLE OPERATOR\n";
    const fetchImpl = fakeFetch(() => new Response(body, { status: 200 }));
    const fetcher = new SourceFetcher({ fetchImpl });

    const report = await fetcher.fetch("ST1", JUNE_10);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0][0]).toBe("https://static.aer.ca/data/well-lic/WELLS0610.txt");
    expect(report.dataset).toBe("ST1");
    expect(report.reportDate).toEqual(JUNE_10);
    expect(new TextDecoder().decode(report.content)).toBe(body);
    expect(report.sha256).toBe(createHash("sha256").update(body).digest("hex"));
  });

  it("distinguishes an unpublished report from a transport failure", async () => {
    const notFound = new SourceFetcher({
      fetchImpl: fakeFetch(() => new Response("missing", { status: 404 }))
    });
    const serverError = new SourceFetcher({
      fetchImpl: fakeFetch(() => new Response("boom", { status: 503 }))
    });

    await expect(notFound.fetch("ST100", JUNE_10)).rejects.toBeInstanceOf(ReportNotFoundError);

    const failure = await serverError.fetch("ST100", JUNE_10).catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(SourceUnavailableError);
    expect(failure).toMatchObject({ code: "SourceUnavailable", status: 503 });
  });

  it("treats network errors and empty bodies as source unavailable", async () => {
    const offline = new SourceFetcher({
      fetchImpl: fakeFetch(() => {
        throw new TypeError("fetch failed");
      })
    });
    const empty = new SourceFetcher({
      fetchImpl: fakeFetch(() => new Response("", { status: 200 }))
    });

    await expect(offline.fetch("ST1", JUNE_10)).rejects.toMatchObject({
      code: "SourceUnavailable",
      message: "Failed to download https://static.aer.ca/data/well-lic/WELLS0610.txt: fetch failed"
    });
    await expect(empty.fetch("ST1", JUNE_10)).rejects.toBeInstanceOf(SourceUnavailableError);
  });

  it("gives up on a slow publisher once the timeout elapses", async () => {
    const fetchImpl = vi.fn(
      (_input: string | URL | Request, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (!signal) {
            reject(new Error("request was sent without an abort signal"));
            return;
          }
          signal.addEventListener("abort", () => reject(signal.reason));
        })
    );
    const fetcher = new SourceFetcher({ fetchImpl, timeoutMs: 20 });

    const failure = await fetcher.fetch("ST1", JUNE_10).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(SourceUnavailableError);
    expect(failure).toMatchObject({
      code: "SourceUnavailable",
      url: "https://static.aer.ca/data/well-lic/WELLS0610.txt",
      message: expect.stringMatching(/^Failed to download https:\/\/static\.aer\.ca\/data\/well-lic\/WELLS0610\.txt: /)
    });
  });
});
