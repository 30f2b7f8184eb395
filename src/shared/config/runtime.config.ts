import {
  type FailurePolicy,
  type ReportJobConfigInput,
  reportJobCaps
} from "../../application/report-jobs/report-job.config";
import type { PollingOptions } from "../../core/reports/report.types";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 120000 },
  httpMaxAttempts: { min: 1, max: 10 },
  concurrency: { min: 1, max: 50 }
} as const;

export type RuntimeConfig = {
  reportJob: ReportJobConfigInput;
  /** Applied over every driver's own polling settings when set. */
  pollingOverride: Partial<PollingOptions>;
  timeoutMs: number;
  httpMaxAttempts: number;
  concurrency?: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalBoolean = (env: NodeJS.ProcessEnv, name: string): boolean | undefined => {
  const raw = env[name]?.trim().toLowerCase();
  if (raw == null || raw === "") return undefined;
  if (raw === "1" || raw === "true") return true;
  if (raw === "0" || raw === "false") return false;
  throw new Error(`${name}=${env[name] ?? ""} must be one of 1, 0, true, false`);
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const pollingOverride: Partial<PollingOptions> = {};
  const maxPollAttempts = parseOptionalIntInRange(env, "POLL_MAX_ATTEMPTS", reportJobCaps.maxPollAttempts);
  if (maxPollAttempts != null) pollingOverride.maxPollAttempts = maxPollAttempts;
  const pollIntervalMs = parseOptionalIntInRange(env, "POLL_INTERVAL_MS", reportJobCaps.pollIntervalMs);
  if (pollIntervalMs != null) pollingOverride.pollIntervalMs = pollIntervalMs;

  const failurePolicy: Partial<FailurePolicy> = {};
  const cooldownAfter = parseOptionalIntInRange(env, "COOLDOWN_AFTER_FAILURES", reportJobCaps.cooldownAfter);
  if (cooldownAfter != null) failurePolicy.cooldownAfter = cooldownAfter;
  const cooldownStepMs = parseOptionalIntInRange(env, "COOLDOWN_STEP_MS", reportJobCaps.cooldownStepMs);
  if (cooldownStepMs != null) failurePolicy.cooldownStepMs = cooldownStepMs;
  const cooldownMaxMs = parseOptionalIntInRange(env, "COOLDOWN_MAX_MS", reportJobCaps.cooldownMaxMs);
  if (cooldownMaxMs != null) failurePolicy.cooldownMaxMs = cooldownMaxMs;
  const abandonAfter = parseOptionalIntInRange(env, "ABANDON_AFTER_FAILURES", reportJobCaps.abandonAfter);
  if (abandonAfter != null) failurePolicy.abandonAfter = abandonAfter;
  const abandonAfterTimeouts = parseOptionalIntInRange(env, "ABANDON_AFTER_TIMEOUTS", reportJobCaps.abandonAfterTimeouts);
  if (abandonAfterTimeouts != null) failurePolicy.abandonAfterTimeouts = abandonAfterTimeouts;

  const reportJob: ReportJobConfigInput = {};
  const unitDelayMs = parseOptionalIntInRange(env, "UNIT_DELAY_MS", reportJobCaps.unitDelayMs);
  if (unitDelayMs != null) reportJob.unitDelayMs = unitDelayMs;
  const lookbackDays = parseOptionalIntInRange(env, "BACKFILL_LOOKBACK_DAYS", reportJobCaps.lookbackDays);
  if (lookbackDays != null) reportJob.lookbackDays = lookbackDays;
  const allowLatin1 = parseOptionalBoolean(env, "DECODE_ALLOW_LATIN1");
  if (allowLatin1 != null) reportJob.allowLatin1 = allowLatin1;
  if (Object.keys(failurePolicy).length > 0) reportJob.failurePolicy = failurePolicy;

  const timeoutMs = parseOptionalIntInRange(env, "HTTP_TIMEOUT_MS", runtimeCaps.timeoutMs) ?? 30000;
  const httpMaxAttempts = parseOptionalIntInRange(env, "HTTP_MAX_ATTEMPTS", runtimeCaps.httpMaxAttempts) ?? 4;
  const concurrency = parseOptionalIntInRange(env, "DRIVER_CONCURRENCY", runtimeCaps.concurrency);

  const runtime: RuntimeConfig = { reportJob, pollingOverride, timeoutMs, httpMaxAttempts };
  if (concurrency != null) runtime.concurrency = concurrency;
  return runtime;
};

