import {
  HttpError,
  NetworkError,
  OperationCancelledError,
  RateLimitExceededError,
  ServerError
} from "../../core/errors";
import { retry, scheduleDelayMs } from "../../shared/retry/retry";
import type { HttpMethod } from "../../core/http/http.types";
import type { Sleep } from "../../shared/time/sleep";
import { sleep as defaultSleep } from "../../shared/time/sleep";

export type { HttpMethod };

export type RetryPolicy = {
  maxAttempts: number;
  backoffScheduleSeconds: readonly number[];
};

export type TransportConfig = {
  statusPolicy: RetryPolicy;
  networkBackoffScheduleSeconds: readonly number[];
  timeoutMs: number;
};

export type ExecuteOptions = {
  headers?: Record<string, string>;
  body?: string;
  query?: Record<string, string | readonly string[] | undefined>;
  retryPolicy?: RetryPolicy;
  signal?: AbortSignal;
};

export const defaultTransportConfig: TransportConfig = {
  statusPolicy: { maxAttempts: 4, backoffScheduleSeconds: [60, 300, 300] },
  networkBackoffScheduleSeconds: [5, 15, 30],
  timeoutMs: 30000
};

const describeAttemptError = (error: unknown): { kind: string; status: number | null } => {
  if (error instanceof RateLimitExceededError || error instanceof ServerError || error instanceof HttpError) {
    return { kind: error.kind, status: error.status };
  }
  if (error instanceof NetworkError) {
    return { kind: error.kind, status: null };
  }
  return { kind: "unknown", status: null };
};

type LinkedSignal = {
  signal: AbortSignal;
  /** Detaches from the caller's signal, which outlives the attempt. */
  release: () => void;
};

const linkSignals = (caller: AbortSignal, timeout: AbortSignal): LinkedSignal => {
  const controller = new AbortController();
  const onCallerAbort = () => controller.abort(caller.reason);

  if (caller.aborted) {
    controller.abort(caller.reason);
  } else {
    caller.addEventListener("abort", onCallerAbort, { once: true });
  }
  // The timeout signal dies with the attempt, so its listener keeps covering the body read.
  timeout.addEventListener("abort", () => controller.abort(timeout.reason), { once: true });

  return {
    signal: controller.signal,
    release: () => caller.removeEventListener("abort", onCallerAbort)
  };
};

/**
 * Strips query string and fragment so pre-signed signatures and tokens never reach the logs.
 */
export const sanitizeUrl = (url: URL): string => `${url.origin}${url.pathname}`;

const buildUrl = (rawUrl: string, query: ExecuteOptions["query"]): URL => {
  const url = new URL(rawUrl);
  if (!query) return url;

  for (const [name, value] of Object.entries(query)) {
    if (value == null) continue;
    if (typeof value === "string") {
      url.searchParams.set(name, value);
    } else {
      url.searchParams.set(name, value.join(","));
    }
  }
  return url;
};

/**
 * Single HTTP call with bounded retry on 429, 5xx and network failures.
 * Responses in the 2xx range are returned untouched; any other status fails fast.
 */
export class ResilientTransport {
  private readonly config: TransportConfig;

  constructor(
    config: Partial<TransportConfig> = {},
    private readonly sleep: Sleep = defaultSleep,
    private readonly fetchFn: typeof fetch = fetch
  ) {
    this.config = { ...defaultTransportConfig, ...config };
  }

  async execute(method: HttpMethod, rawUrl: string, options: ExecuteOptions = {}): Promise<Response> {
    const url = buildUrl(rawUrl, options.query);
    const safeUrl = sanitizeUrl(url);
    const policy = options.retryPolicy ?? this.config.statusPolicy;
    const networkSchedule = this.config.networkBackoffScheduleSeconds;
    const maxAttempts = Math.max(1, policy.maxAttempts);

    const attemptOnce = async (attempt: number): Promise<Response> => {
      const attempts = attempt + 1;
      const timeoutSignal = AbortSignal.timeout(this.config.timeoutMs);
      const linked = options.signal ? linkSignals(options.signal, timeoutSignal) : undefined;

      const fetchFn = this.fetchFn;
      let res: Response;
      try {
        res = await fetchFn(url, {
          method,
          headers: options.headers,
          body: options.body,
          signal: linked?.signal ?? timeoutSignal
        });
      } catch (err) {
        if (options.signal?.aborted) {
          throw new OperationCancelledError();
        }
        const isTimeout = timeoutSignal.aborted;
        throw new NetworkError({
          message: isTimeout
            ? `${method} ${safeUrl} timed out after ${this.config.timeoutMs}ms`
            : `${method} ${safeUrl} failed before a response: ${err instanceof Error ? err.message : String(err)}`,
          url: safeUrl,
          attempts,
          isTimeout,
          cause: err
        });
      } finally {
        linked?.release();
      }

      if (res.ok) return res;

      const body = await res.text().catch(() => "");
      const details = { status: res.status, body, url: safeUrl, attempts };
      if (res.status === 429) {
        throw new RateLimitExceededError({ message: `${method} ${safeUrl} rate limited: 429`, ...details });
      }
      if (res.status >= 500 && res.status <= 599) {
        throw new ServerError({ message: `${method} ${safeUrl} server error: ${res.status}`, ...details });
      }
      throw new HttpError({ message: `${method} ${safeUrl} failed: ${res.status}`, ...details });
    };

    return retry(attemptOnce, {
      retries: maxAttempts - 1,
      minDelayMs: 0,
      maxDelayMs: Number.MAX_SAFE_INTEGER,
      sleep: this.sleep,
      signal: options.signal,
      onRetry: ({ attempt, maxAttempts: max, delayMs, error }) => {
        console.warn(JSON.stringify({
          event: "http.retry",
          method,
          url: safeUrl,
          ...describeAttemptError(error),
          attempt,
          maxAttempts: max,
          delayMs
        }));
      },
      onGiveUp: ({ attempt, maxAttempts: max, error }) => {
        if (!(error instanceof RateLimitExceededError || error instanceof ServerError || error instanceof NetworkError)) {
          return;
        }
        console.warn(JSON.stringify({
          event: "http.give_up",
          method,
          url: safeUrl,
          ...describeAttemptError(error),
          attempt,
          maxAttempts: max
        }));
      },
      shouldRetry: (err, attempt) => {
        if (err instanceof RateLimitExceededError || err instanceof ServerError) {
          return { retry: true, delayMs: scheduleDelayMs(policy.backoffScheduleSeconds, attempt) };
        }
        if (err instanceof NetworkError) {
          return { retry: true, delayMs: scheduleDelayMs(networkSchedule, attempt) };
        }
        return false;
      }
    });
  }
}
