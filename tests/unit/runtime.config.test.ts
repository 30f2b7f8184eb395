import { loadRuntimeConfigFromEnv } from "../../src/shared/config/runtime.config";

describe("runtime config caps", () => {
  it("uses transport defaults and no overrides when nothing is set", () => {
    expect(loadRuntimeConfigFromEnv({})).toEqual({
      reportJob: {},
      pollingOverride: {},
      timeoutMs: 30000,
      httpMaxAttempts: 4
    });
  });

  it("accepts boundary values within allowed caps", () => {
    const runtime = loadRuntimeConfigFromEnv({
      POLL_MAX_ATTEMPTS: "500",
      POLL_INTERVAL_MS: "0",
      COOLDOWN_AFTER_FAILURES: "1",
      COOLDOWN_STEP_MS: "600000",
      COOLDOWN_MAX_MS: "3600000",
      ABANDON_AFTER_FAILURES: "1000",
      ABANDON_AFTER_TIMEOUTS: "1",
      UNIT_DELAY_MS: "0",
      BACKFILL_LOOKBACK_DAYS: "3650",
      DECODE_ALLOW_LATIN1: "false",
      HTTP_TIMEOUT_MS: "120000",
      HTTP_MAX_ATTEMPTS: "10",
      DRIVER_CONCURRENCY: "50"
    });

    expect(runtime).toEqual({
      reportJob: {
        unitDelayMs: 0,
        lookbackDays: 3650,
        allowLatin1: false,
        failurePolicy: {
          cooldownAfter: 1,
          cooldownStepMs: 600000,
          cooldownMaxMs: 3600000,
          abandonAfter: 1000,
          abandonAfterTimeouts: 1
        }
      },
      pollingOverride: { maxPollAttempts: 500, pollIntervalMs: 0 },
      timeoutMs: 120000,
      httpMaxAttempts: 10,
      concurrency: 50
    });
  });

  it.each([
    { env: { POLL_MAX_ATTEMPTS: "0" }, message: "POLL_MAX_ATTEMPTS=0 is out of allowed range [1..500]" },
    { env: { POLL_INTERVAL_MS: "1.5" }, message: "POLL_INTERVAL_MS=1.5 is out of allowed range [0..600000]" },
    { env: { DRIVER_CONCURRENCY: "51" }, message: "DRIVER_CONCURRENCY=51 is out of allowed range [1..50]" },
    { env: { HTTP_TIMEOUT_MS: "999" }, message: "HTTP_TIMEOUT_MS=999 is out of allowed range [1000..120000]" },
    { env: { HTTP_MAX_ATTEMPTS: "abc" }, message: "HTTP_MAX_ATTEMPTS=abc is out of allowed range [1..10]" },
    { env: { DECODE_ALLOW_LATIN1: "maybe" }, message: "DECODE_ALLOW_LATIN1=maybe must be one of 1, 0, true, false" }
  ])("rejects out-of-range config: $message", ({ env, message }) => {
    expect(() => loadRuntimeConfigFromEnv(env)).toThrow(message);
  });

  it("ignores blank values", () => {
    expect(loadRuntimeConfigFromEnv({ UNIT_DELAY_MS: "  ", DECODE_ALLOW_LATIN1: "" }).reportJob).toEqual({});
  });
});
