export type ErrorKind =
  | "auth"
  | "rate_limited"
  | "server_error"
  | "network_error"
  | "http_error"
  | "malformed_response"
  | "report_failed"
  | "timed_out"
  | "decode_exhausted"
  | "cancelled"
  | "unknown_driver";

type ErrorArgs = {
  message: string;
  cause?: unknown;
};

/**
 * Base for every error the ingest raises on purpose. Callers branch on `kind`, never on the message.
 */
export abstract class IngestError extends Error {
  abstract readonly kind: ErrorKind;
  readonly cause?: unknown;

  constructor(args: ErrorArgs) {
    super(args.message);
    this.name = new.target.name;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AuthError extends IngestError {
  readonly kind = "auth";
  readonly status?: number;

  constructor(args: ErrorArgs & { status?: number }) {
    super(args);
    this.status = args.status;
  }
}

type HttpFailureArgs = ErrorArgs & {
  status: number;
  body: string;
  url: string;
  attempts: number;
};

abstract class HttpFailure extends IngestError {
  readonly status: number;
  readonly body: string;
  readonly url: string;
  readonly attempts: number;

  constructor(args: HttpFailureArgs) {
    super(args);
    this.status = args.status;
    this.body = args.body;
    this.url = args.url;
    this.attempts = args.attempts;
  }
}

/** Retries exhausted against 429 responses. */
export class RateLimitExceededError extends HttpFailure {
  readonly kind = "rate_limited";
}

/** Retries exhausted against 5xx responses. */
export class ServerError extends HttpFailure {
  readonly kind = "server_error";
}

/** Non-retryable non-2xx status. */
export class HttpError extends HttpFailure {
  readonly kind = "http_error";
}

export class NetworkError extends IngestError {
  readonly kind = "network_error";
  readonly url: string;
  readonly attempts: number;
  readonly isTimeout: boolean;

  constructor(args: ErrorArgs & { url: string; attempts: number; isTimeout?: boolean }) {
    super(args);
    this.url = args.url;
    this.attempts = args.attempts;
    this.isTimeout = args.isTimeout ?? false;
  }
}

export class MalformedResponseError extends IngestError {
  readonly kind = "malformed_response";
  readonly url: string;

  constructor(args: ErrorArgs & { url: string }) {
    super(args);
    this.url = args.url;
  }
}

export class ReportFailedError extends IngestError {
  readonly kind = "report_failed";
  readonly reportId: string;
  readonly processingStatus: string;

  constructor(args: ErrorArgs & { reportId: string; processingStatus: string }) {
    super(args);
    this.reportId = args.reportId;
    this.processingStatus = args.processingStatus;
  }
}

export class ReportTimedOutError extends IngestError {
  readonly kind = "timed_out";
  readonly reportId: string;
  readonly attempts: number;

  constructor(args: ErrorArgs & { reportId: string; attempts: number }) {
    super(args);
    this.reportId = args.reportId;
    this.attempts = args.attempts;
  }
}

export class DecodeExhaustedError extends IngestError {
  readonly kind = "decode_exhausted";
  readonly byteLength: number;

  constructor(args: ErrorArgs & { byteLength: number }) {
    super(args);
    this.byteLength = args.byteLength;
  }
}

export class OperationCancelledError extends IngestError {
  readonly kind = "cancelled";

  constructor(message = "Operation cancelled") {
    super({ message });
  }
}

export class UnknownDriverError extends IngestError {
  readonly kind = "unknown_driver";
  readonly driver: string;

  constructor(driver: string, known: readonly string[]) {
    super({ message: `Unknown driver: ${driver}. Known drivers: ${known.join(", ")}` });
    this.driver = driver;
  }
}

export const isIngestError = (value: unknown): value is IngestError => value instanceof IngestError;
