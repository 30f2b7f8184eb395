import { decodePayload } from "../../core/payload/decodePayload";
import type { DecodedPayload, DecodeOptions } from "../../core/payload/decodePayload";
import {
  DONE_STATUS,
  TERMINAL_FAILURE_STATUSES,
  type PollingOptions,
  type ReportJob,
  type ReportOutcome,
  type ReportRequest
} from "../../core/reports/report.types";
import type { ReportsApi } from "../../ports/ReportsApi";
import type { Sleep } from "../../shared/time/sleep";
import { sleep as defaultSleep, throwIfCancelled } from "../../shared/time/sleep";

export type AcquireReportDeps = {
  api: ReportsApi;
  sleep?: Sleep;
  signal?: AbortSignal;
  decode?: DecodeOptions;
};

const assertPolling = (polling: PollingOptions) => {
  if (!Number.isInteger(polling.maxPollAttempts) || polling.maxPollAttempts < 1) {
    throw new Error(`maxPollAttempts=${String(polling.maxPollAttempts)} must be an integer >= 1`);
  }
  if (!Number.isFinite(polling.pollIntervalMs) || polling.pollIntervalMs < 0) {
    throw new Error(`pollIntervalMs=${String(polling.pollIntervalMs)} must be a finite number >= 0`);
  }
};

const snapshot = (job: ReportJob): ReportJob => ({ ...job });

/**
 * Create, poll, resolve and download one report.
 *
 * Remote terminal statuses and exhausted polling come back as outcomes; transport failures,
 * malformed responses and cancellation are thrown.
 */
export const acquireReport = async (
  request: ReportRequest,
  polling: PollingOptions,
  deps: AcquireReportDeps
): Promise<ReportOutcome> => {
  assertPolling(polling);
  const { api, signal } = deps;
  const sleep = deps.sleep ?? defaultSleep;

  throwIfCancelled(signal);
  const requestId = await api.createReport(request, { signal });
  const job: ReportJob = { requestId, state: "created", attempts: 0 };
  console.log(JSON.stringify({
    event: "report.created",
    reportType: request.reportType,
    reportId: requestId,
    dataStartTime: request.window.start.toISOString()
  }));

  job.state = "polling";
  while (job.attempts < polling.maxPollAttempts) {
    throwIfCancelled(signal);
    await sleep(polling.pollIntervalMs, signal);

    const status = await api.getReportStatus(requestId, { signal });
    job.attempts += 1;
    job.processingStatus = status.processingStatus;
    console.log(JSON.stringify({
      event: "report.polled",
      reportId: requestId,
      attempt: job.attempts,
      maxPollAttempts: polling.maxPollAttempts,
      processingStatus: status.processingStatus
    }));

    if (status.processingStatus === DONE_STATUS) {
      if (!status.reportDocumentId) {
        job.state = "failed";
        return { status: "failed", job: snapshot(job), reason: "missing_document_id" };
      }
      job.state = "done";
      job.documentId = status.reportDocumentId;
      break;
    }

    if (TERMINAL_FAILURE_STATUSES.includes(status.processingStatus)) {
      job.state = "failed";
      console.warn(JSON.stringify({
        event: "report.failed",
        reportId: requestId,
        processingStatus: status.processingStatus,
        attempts: job.attempts
      }));
      return { status: "failed", job: snapshot(job), reason: status.processingStatus };
    }
  }

  if (job.state !== "done" || !job.documentId) {
    job.state = "timed_out";
    console.warn(JSON.stringify({ event: "report.timed_out", reportId: requestId, attempts: job.attempts }));
    return { status: "timed_out", job: snapshot(job) };
  }

  const retrieved = await downloadReportDocument(requestId, job.documentId, deps);
  return retrieved.status === "done"
    ? { status: "done", job: snapshot(job), payload: retrieved.payload }
    : { status: "undecodable", job: snapshot(job), byteLength: retrieved.byteLength };
};

export type RetrievedDocument =
  | { status: "done"; payload: DecodedPayload }
  | { status: "undecodable"; byteLength: number };

/**
 * Resolves a finished report's document, downloads it and decodes it.
 * Also used for reports the platform generates on its own schedule and that are only listed, never created.
 */
export const downloadReportDocument = async (
  reportId: string,
  documentId: string,
  deps: AcquireReportDeps
): Promise<RetrievedDocument> => {
  const { api, signal } = deps;

  throwIfCancelled(signal);
  const document = await api.getReportDocument(documentId, { signal });
  const bytes = await api.download(document.url, { signal });

  const decoded = decodePayload(bytes, deps.decode);
  if (!decoded.ok) {
    console.warn(JSON.stringify({
      event: "report.undecodable",
      reportId,
      byteLength: decoded.error.byteLength
    }));
    return { status: "undecodable", byteLength: decoded.error.byteLength };
  }

  console.log(JSON.stringify({
    event: "report.downloaded",
    reportId,
    encoding: decoded.payload.encoding,
    compressed: decoded.payload.compressed,
    compressionAlgorithm: document.compressionAlgorithm ?? null,
    length: decoded.payload.text.length
  }));
  return { status: "done", payload: decoded.payload };
};
