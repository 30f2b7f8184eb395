import type { PollingOptions } from "../../core/reports/report.types";
import type { RefreshWindowOptions, RunMode } from "../../core/windows/dateWindows";
import { RUN_MODES } from "../../core/windows/dateWindows";

export type FailurePolicy = {
  cooldownAfter: number;
  cooldownStepMs: number;
  cooldownMaxMs: number;
  abandonAfter: number;
  abandonAfterTimeouts: number;
};

export type ReportJobConfig = {
  mode: RunMode;
  marketplaceIds: string[];
  polling: PollingOptions;
  failurePolicy: FailurePolicy;
  unitDelayMs: number;
  lookbackDays: number;
  refreshWindow: RefreshWindowOptions;
  allowLatin1: boolean;
};

export type ReportJobConfigInput = Partial<Omit<ReportJobConfig, "polling" | "failurePolicy" | "refreshWindow">> & {
  polling?: Partial<PollingOptions>;
  failurePolicy?: Partial<FailurePolicy>;
  refreshWindow?: Partial<RefreshWindowOptions>;
};

export const JP_MARKETPLACE_ID = "A1VC38T7YXB528";

export const defaultReportJobConfig: ReportJobConfig = {
  mode: "refresh",
  marketplaceIds: [JP_MARKETPLACE_ID],
  polling: { maxPollAttempts: 20, pollIntervalMs: 30000 },
  failurePolicy: {
    cooldownAfter: 3,
    cooldownStepMs: 5000,
    cooldownMaxMs: 30000,
    abandonAfter: 5,
    abandonAfterTimeouts: 3
  },
  unitDelayMs: 2000,
  lookbackDays: 730,
  refreshWindow: { startDaysAgo: 8, endDaysAgo: 1 },
  allowLatin1: true
};

export const reportJobCaps = {
  maxPollAttempts: { min: 1, max: 500 },
  pollIntervalMs: { min: 0, max: 600000 },
  cooldownAfter: { min: 1, max: 100 },
  cooldownStepMs: { min: 0, max: 600000 },
  cooldownMaxMs: { min: 0, max: 3600000 },
  abandonAfter: { min: 1, max: 1000 },
  abandonAfterTimeouts: { min: 1, max: 1000 },
  unitDelayMs: { min: 0, max: 600000 },
  lookbackDays: { min: 1, max: 3650 },
  startDaysAgo: { min: 0, max: 3650 },
  endDaysAgo: { min: 0, max: 3650 }
} as const;

const assertIntegerInRange = (name: string, value: number, range: { min: number; max: number }) => {
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${range.min}..${range.max}]`);
  }
};

export const isRunMode = (value: string): value is RunMode => RUN_MODES.some((mode) => mode === value);

export const validateReportJobConfig = (config: ReportJobConfig): ReportJobConfig => {
  if (!isRunMode(config.mode)) {
    throw new Error(`mode=${String(config.mode)} must be one of ${RUN_MODES.join(", ")}`);
  }
  if (config.marketplaceIds.length === 0 || config.marketplaceIds.some((id) => id.trim() === "")) {
    throw new Error("marketplaceIds must contain at least one non-empty id");
  }

  assertIntegerInRange("maxPollAttempts", config.polling.maxPollAttempts, reportJobCaps.maxPollAttempts);
  assertIntegerInRange("pollIntervalMs", config.polling.pollIntervalMs, reportJobCaps.pollIntervalMs);
  assertIntegerInRange("cooldownAfter", config.failurePolicy.cooldownAfter, reportJobCaps.cooldownAfter);
  assertIntegerInRange("cooldownStepMs", config.failurePolicy.cooldownStepMs, reportJobCaps.cooldownStepMs);
  assertIntegerInRange("cooldownMaxMs", config.failurePolicy.cooldownMaxMs, reportJobCaps.cooldownMaxMs);
  assertIntegerInRange("abandonAfter", config.failurePolicy.abandonAfter, reportJobCaps.abandonAfter);
  assertIntegerInRange(
    "abandonAfterTimeouts",
    config.failurePolicy.abandonAfterTimeouts,
    reportJobCaps.abandonAfterTimeouts
  );
  assertIntegerInRange("unitDelayMs", config.unitDelayMs, reportJobCaps.unitDelayMs);
  assertIntegerInRange("lookbackDays", config.lookbackDays, reportJobCaps.lookbackDays);
  assertIntegerInRange("startDaysAgo", config.refreshWindow.startDaysAgo, reportJobCaps.startDaysAgo);
  assertIntegerInRange("endDaysAgo", config.refreshWindow.endDaysAgo, reportJobCaps.endDaysAgo);
  if (config.refreshWindow.endDaysAgo > config.refreshWindow.startDaysAgo) {
    throw new Error(
      `endDaysAgo=${config.refreshWindow.endDaysAgo} must not exceed startDaysAgo=${config.refreshWindow.startDaysAgo}`
    );
  }

  return config;
};

export const resolveReportJobConfig = (input: ReportJobConfigInput = {}): ReportJobConfig =>
  validateReportJobConfig({
    ...defaultReportJobConfig,
    ...input,
    marketplaceIds: [...(input.marketplaceIds ?? defaultReportJobConfig.marketplaceIds)],
    polling: { ...defaultReportJobConfig.polling, ...input.polling },
    failurePolicy: { ...defaultReportJobConfig.failurePolicy, ...input.failurePolicy },
    refreshWindow: { ...defaultReportJobConfig.refreshWindow, ...input.refreshWindow }
  });
