import type { DecodedPayload } from "../payload/decodePayload";
import type { DateWindow } from "../windows/dateWindows";

export type ReportOptions = Readonly<Record<string, string>>;

export type ReportRequest = {
  readonly reportType: string;
  readonly marketplaceIds: readonly string[];
  readonly window: DateWindow;
  readonly options?: ReportOptions;
};

export const buildReportRequest = (input: {
  reportType: string;
  marketplaceIds: readonly string[];
  window: DateWindow;
  options?: Record<string, string>;
}): ReportRequest => {
  const options = input.options && Object.keys(input.options).length > 0
    ? Object.freeze({ ...input.options })
    : undefined;

  return Object.freeze({
    reportType: input.reportType,
    marketplaceIds: Object.freeze([...input.marketplaceIds]),
    window: Object.freeze({ ...input.window }),
    ...(options ? { options } : {})
  });
};

export type ReportJobState = "created" | "polling" | "done" | "failed" | "timed_out";

export type ReportJob = {
  requestId: string;
  state: ReportJobState;
  documentId?: string;
  attempts: number;
  processingStatus?: string;
};

/** Remote statuses that end polling without a document. */
export const TERMINAL_FAILURE_STATUSES: readonly string[] = ["FATAL", "CANCELLED"];

export const DONE_STATUS = "DONE";

export type ReportOutcome =
  | { status: "done"; job: ReportJob; payload: DecodedPayload }
  | { status: "failed"; job: ReportJob; reason: string }
  | { status: "timed_out"; job: ReportJob }
  | { status: "undecodable"; job: ReportJob; byteLength: number };

export type PollingOptions = {
  maxPollAttempts: number;
  pollIntervalMs: number;
};
