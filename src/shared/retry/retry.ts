import { sleep as defaultSleep } from "../time/sleep";

export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryOptions = {
  retries: number;          // max attempts after initial try (e.g. 3 means up to 4 total tries)
  minDelayMs: number;       // base delay for backoff
  maxDelayMs: number;       // max delay cap
  shouldRetry: (err: unknown, attempt: number) => RetryDecision;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  signal?: AbortSignal;
};

/**
 * Runs `fn` until it resolves or the retry budget is spent.
 *
 * A decision carrying `delayMs` is honoured exactly (capped by `maxDelayMs`, no jitter);
 * otherwise the delay grows exponentially from `minDelayMs` with a small jitter.
 */
export const retry = async <T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> => {
  const {
    retries,
    minDelayMs,
    maxDelayMs,
    shouldRetry,
    onRetry,
    onGiveUp,
    randomFn = Math.random,
    jitterRatio = 0.2,
    sleep = defaultSleep,
    signal
  } = opts;

  let attempt = 0;
  const maxAttempts = retries + 1;
  // attempt=0 is first try, then up to retries extra
  while (true) {
    try {
      return await fn(attempt);
    } catch (err) {
      const decision = shouldRetry(err, attempt);
      const normalized =
        typeof decision === "boolean"
          ? { retry: decision, delayMs: undefined }
          : decision;
      if (attempt >= retries || !normalized.retry) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const customDelayMs =
        typeof normalized.delayMs === "number" && Number.isFinite(normalized.delayMs) && normalized.delayMs >= 0
          ? normalized.delayMs
          : undefined;

      let waitMs: number;
      if (customDelayMs != null) {
        waitMs = Math.min(maxDelayMs, customDelayMs);
      } else {
        const backoff = Math.min(maxDelayMs, minDelayMs * Math.pow(2, attempt));
        const normalizedJitterRatio = Math.min(1, Math.max(0, jitterRatio));
        const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
        waitMs = backoff + Math.floor(backoff * normalizedJitterRatio * normalizedRandom);
      }

      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      await sleep(waitMs, signal);
      attempt += 1;
    }
  }
};

/**
 * Picks the wait for the n-th retry (zero-based) from a schedule, repeating the last entry.
 */
export const scheduleDelayMs = (scheduleSeconds: readonly number[], attempt: number): number => {
  if (scheduleSeconds.length === 0) return 0;
  const index = Math.min(Math.max(0, attempt), scheduleSeconds.length - 1);
  return scheduleSeconds[index] * 1000;
};
