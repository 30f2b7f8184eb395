import { gzipSync } from "zlib";
import { acquireReport, downloadReportDocument } from "../../src/application/report-protocol/acquireReport";
import { OperationCancelledError } from "../../src/core/errors";
import { buildReportRequest } from "../../src/core/reports/report.types";
import { monthWindow } from "../../src/core/windows/dateWindows";
import type { ReportsApi, ReportStatus } from "../../src/ports/ReportsApi";

const request = buildReportRequest({
  reportType: "GET_BRAND_ANALYTICS_SEARCH_QUERY_PERFORMANCE_REPORT",
  marketplaceIds: ["A1VC38T7YXB528"],
  window: monthWindow(new Date("2024-08-01T00:00:00.000Z")),
  options: { reportPeriod: "MONTH" }
});

const fakeApi = (statuses: ReportStatus[], body: Uint8Array = new Uint8Array()) => {
  const queue = [...statuses];
  const api = {
    createReport: jest.fn().mockResolvedValue("R1"),
    getReportStatus: jest.fn().mockImplementation(async () => queue.shift() ?? { processingStatus: "IN_PROGRESS" }),
    listReports: jest.fn().mockResolvedValue([]),
    getReportDocument: jest.fn().mockResolvedValue({
      url: "https://example.test/doc?X-Amz-Signature=test-secret",
      compressionAlgorithm: "GZIP"
    }),
    download: jest.fn().mockResolvedValue(body)
  };
  const typed: ReportsApi = api;
  return { api, typed };
};

describe("acquireReport", () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
  });

  it("polls until DONE, then downloads and decodes the document", async () => {
    const { api, typed } = fakeApi(
      [{ processingStatus: "IN_PROGRESS" }, { processingStatus: "IN_QUEUE" }, { processingStatus: "DONE", reportDocumentId: "D1" }],
      new Uint8Array(gzipSync(Buffer.from('{"dataByAsin":[]}', "utf8")))
    );
    const sleep = jest.fn().mockResolvedValue(undefined);

    const outcome = await acquireReport(request, { maxPollAttempts: 5, pollIntervalMs: 250 }, { api: typed, sleep });

    expect(outcome).toEqual({
      status: "done",
      job: { requestId: "R1", state: "done", attempts: 3, processingStatus: "DONE", documentId: "D1" },
      payload: { encoding: "utf-8", compressed: true, text: '{"dataByAsin":[]}' }
    });
    expect(api.createReport).toHaveBeenCalledWith(request, { signal: undefined });
    expect(api.getReportDocument).toHaveBeenCalledWith("D1", { signal: undefined });
    expect(api.download).toHaveBeenCalledWith("https://example.test/doc?X-Amz-Signature=test-secret", { signal: undefined });
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([250, 250, 250]);
  });

  it("returns failed on FATAL after the third poll", async () => {
    const { api, typed } = fakeApi([
      { processingStatus: "IN_PROGRESS" },
      { processingStatus: "IN_PROGRESS" },
      { processingStatus: "FATAL" }
    ]);

    const outcome = await acquireReport(request, { maxPollAttempts: 10, pollIntervalMs: 0 }, {
      api: typed,
      sleep: async () => undefined
    });

    expect(outcome).toEqual({
      status: "failed",
      reason: "FATAL",
      job: { requestId: "R1", state: "failed", attempts: 3, processingStatus: "FATAL" }
    });
    expect(api.getReportStatus).toHaveBeenCalledTimes(3);
    expect(api.getReportDocument).not.toHaveBeenCalled();
  });

  it("treats CANCELLED as a terminal failure", async () => {
    const { typed } = fakeApi([{ processingStatus: "CANCELLED" }]);

    const outcome = await acquireReport(request, { maxPollAttempts: 3, pollIntervalMs: 0 }, {
      api: typed,
      sleep: async () => undefined
    });

    expect(outcome.status).toBe("failed");
    if (outcome.status === "failed") expect(outcome.reason).toBe("CANCELLED");
  });

  it("times out once the poll budget is spent", async () => {
    const { api, typed } = fakeApi([]);

    const outcome = await acquireReport(request, { maxPollAttempts: 2, pollIntervalMs: 0 }, {
      api: typed,
      sleep: async () => undefined
    });

    expect(outcome).toEqual({
      status: "timed_out",
      job: { requestId: "R1", state: "timed_out", attempts: 2, processingStatus: "IN_PROGRESS" }
    });
    expect(api.getReportStatus).toHaveBeenCalledTimes(2);
  });

  it("fails a DONE status that carries no document id", async () => {
    const { typed } = fakeApi([{ processingStatus: "DONE" }]);

    const outcome = await acquireReport(request, { maxPollAttempts: 2, pollIntervalMs: 0 }, {
      api: typed,
      sleep: async () => undefined
    });

    expect(outcome.status).toBe("failed");
    if (outcome.status === "failed") expect(outcome.reason).toBe("missing_document_id");
  });

  it("reports undecodable bytes when Latin-1 is disabled", async () => {
    const { typed } = fakeApi(
      [{ processingStatus: "DONE", reportDocumentId: "D1" }],
      new Uint8Array([0xff, 0xfe, 0x00])
    );

    const outcome = await acquireReport(request, { maxPollAttempts: 1, pollIntervalMs: 0 }, {
      api: typed,
      sleep: async () => undefined,
      decode: { allowLatin1: false }
    });

    expect(outcome.status).toBe("undecodable");
    if (outcome.status === "undecodable") expect(outcome.byteLength).toBe(3);
  });

  it("does not create a report once cancelled", async () => {
    const { api, typed } = fakeApi([]);
    const controller = new AbortController();
    controller.abort();

    await expect(
      acquireReport(request, { maxPollAttempts: 1, pollIntervalMs: 0 }, { api: typed, signal: controller.signal })
    ).rejects.toBeInstanceOf(OperationCancelledError);
    expect(api.createReport).not.toHaveBeenCalled();
  });

  it("rejects a poll budget below one", async () => {
    const { typed } = fakeApi([]);

    await expect(acquireReport(request, { maxPollAttempts: 0, pollIntervalMs: 0 }, { api: typed })).rejects.toThrow(
      "maxPollAttempts=0 must be an integer >= 1"
    );
  });
});

describe("downloadReportDocument", () => {
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it("fetches a listed report's document without creating or polling", async () => {
    const { api, typed } = fakeApi([], new Uint8Array(gzipSync(Buffer.from("a\tb\n", "utf8"))));

    const retrieved = await downloadReportDocument("S1", "DS1", { api: typed });

    expect(retrieved).toEqual({ status: "done", payload: { encoding: "utf-8", compressed: true, text: "a\tb\n" } });
    expect(api.createReport).not.toHaveBeenCalled();
    expect(api.getReportStatus).not.toHaveBeenCalled();
    expect(api.getReportDocument).toHaveBeenCalledWith("DS1", { signal: undefined });
  });

  it("logs the declared compression algorithm next to what was detected", async () => {
    const { typed } = fakeApi([], new Uint8Array(gzipSync(Buffer.from("x", "utf8"))));

    await downloadReportDocument("S1", "DS1", { api: typed });

    expect(JSON.parse(logSpy.mock.calls[0][0])).toEqual({
      event: "report.downloaded",
      reportId: "S1",
      encoding: "utf-8",
      compressed: true,
      compressionAlgorithm: "GZIP",
      length: 1
    });
  });

  it("logs a null compression algorithm when the document declares none", async () => {
    const { api, typed } = fakeApi([], new Uint8Array(Buffer.from("plain", "utf8")));
    api.getReportDocument.mockResolvedValue({ url: "https://example.test/doc" });

    await downloadReportDocument("S2", "DS2", { api: typed });

    expect(JSON.parse(logSpy.mock.calls[0][0])).toMatchObject({ compressed: false, compressionAlgorithm: null, length: 5 });
  });
});
