import { isIngestError } from "../../core/errors";
import type { RunMode } from "../../core/windows/dateWindows";

export type UnitFailureCode =
  | "report_failed"
  | "timed_out"
  | "decode_exhausted"
  | "rate_limited"
  | "server_error"
  | "network_error"
  | "http_error"
  | "malformed_response"
  | "auth"
  | "sink_write_failed"
  | "unexpected";

const HARD_FAILURE_CODES: readonly UnitFailureCode[] = [
  "rate_limited",
  "server_error",
  "network_error",
  "http_error",
  "malformed_response",
  "auth",
  "sink_write_failed",
  "unexpected"
];

export const isHardFailureCode = (code: UnitFailureCode): boolean => HARD_FAILURE_CODES.includes(code);

export type UnitErrorContext = {
  driver: string;
  outputKey: string;
  objectName?: string;
  chunk?: number;
};

const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export class UnitFailedError extends Error {
  readonly code: UnitFailureCode;
  readonly context: UnitErrorContext;
  readonly cause?: unknown;

  constructor(args: { code: UnitFailureCode; message: string; context: UnitErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "UnitFailedError";
    this.code = args.code;
    this.context = args.context;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Maps whatever a unit threw onto a failure code. Cancellation is not a unit failure and is not classified here.
 */
export const classifyUnitFailure = (reason: unknown): UnitFailureCode => {
  if (reason instanceof UnitFailedError) return reason.code;
  if (!isIngestError(reason)) return "unexpected";

  switch (reason.kind) {
    case "report_failed":
    case "timed_out":
    case "decode_exhausted":
    case "rate_limited":
    case "server_error":
    case "network_error":
    case "http_error":
    case "malformed_response":
    case "auth":
      return reason.kind;
    case "cancelled":
    case "unknown_driver":
      return "unexpected";
  }
};

export const wrapSinkFailure = (reason: unknown, context: UnitErrorContext): UnitFailedError =>
  new UnitFailedError({
    code: "sink_write_failed",
    message: `Sink write failed for ${context.objectName ?? context.outputKey}: ${toErrorMessage(reason)}`,
    context,
    cause: reason
  });

export type UnitFailedLog = {
  event: "unit.failed";
  driver: string;
  outputKey: string;
  code: UnitFailureCode;
  hard: boolean;
  reason: string;
  consecutiveFailures: number;
};

export const buildUnitFailedLog = (
  reason: unknown,
  context: UnitErrorContext,
  consecutiveFailures: number
): UnitFailedLog => {
  const code = classifyUnitFailure(reason);
  return {
    event: "unit.failed",
    driver: context.driver,
    outputKey: context.outputKey,
    code,
    hard: isHardFailureCode(code),
    reason: toErrorMessage(reason),
    consecutiveFailures
  };
};

export type AbandonReason = "consecutive_failures" | "consecutive_timeouts" | "retention_boundary";

export type DriverSummary = {
  driver: string;
  mode: RunMode;
  succeeded: number;
  skipped: number;
  failed: number;
  empty: number;
  abandoned: boolean;
  abandonReason?: AbandonReason;
  aborted?: string;
  hardFailure: boolean;
  failedByCode: Partial<Record<UnitFailureCode, number>>;
};

export const createDriverSummaryTracker = (driver: string, mode: RunMode) => {
  let succeeded = 0;
  let skipped = 0;
  let empty = 0;
  let abandonReason: AbandonReason | undefined;
  const failedByCode: Partial<Record<UnitFailureCode, number>> = {};

  const failedTotal = () => Object.values(failedByCode).reduce((sum, n) => sum + (n ?? 0), 0);

  return {
    addSucceeded: () => {
      succeeded += 1;
    },
    addSkipped: () => {
      skipped += 1;
    },
    addEmpty: () => {
      empty += 1;
    },
    addFailed: (code: UnitFailureCode) => {
      failedByCode[code] = (failedByCode[code] ?? 0) + 1;
      return failedByCode[code] ?? 0;
    },
    abandon: (reason: AbandonReason) => {
      abandonReason = reason;
    },
    summary: (): DriverSummary => {
      const summary: DriverSummary = {
        driver,
        mode,
        succeeded,
        skipped,
        failed: failedTotal(),
        empty,
        abandoned: abandonReason != null,
        hardFailure: Object.keys(failedByCode).some((code) =>
          HARD_FAILURE_CODES.some((hard) => hard === code)
        ),
        failedByCode: { ...failedByCode }
      };
      if (abandonReason) summary.abandonReason = abandonReason;
      return summary;
    }
  };
};

/** Summary for a driver that threw before finishing. */
export const abortedDriverSummary = (driver: string, mode: RunMode, reason: unknown): DriverSummary => ({
  driver,
  mode,
  succeeded: 0,
  skipped: 0,
  failed: 0,
  empty: 0,
  abandoned: false,
  aborted: toErrorMessage(reason),
  hardFailure: true,
  failedByCode: {}
});
