#!/usr/bin/env node
import { isRunMode } from "../application/report-jobs/report-job.config";
import type { RunReport } from "../application/orchestrator/runDrivers";
import { runReports } from "../composition/root";
import { UnknownDriverError } from "../core/errors";
import type { RunMode } from "../core/windows/dateWindows";

type ErrorContext = Partial<{
  driver: string;
  outputKey: string;
  objectName: string;
  chunk: number;
}>;

type CliErrorEnvelope = {
  event: "run.failed";
  name: string;
  message: string;
  code?: string;
  kind?: string;
  context?: ErrorContext;
  status?: number;
  stack?: string;
};

export type CliArgs = {
  driver?: string;
  mode: RunMode;
};

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const USAGE = "Usage: run-reports [driver] [--mode refresh|backfill]";

const stringContextKeys: Array<"driver" | "outputKey" | "objectName"> = ["driver", "outputKey", "objectName"];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  for (const key of stringContextKeys) {
    const raw = value[key];
    if (typeof raw === "string" && raw !== "") {
      sanitizedContext[key] = raw;
    }
  }
  if (typeof value.chunk === "number" && Number.isFinite(value.chunk)) {
    sanitizedContext.chunk = value.chunk;
  }

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "run.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  if (typeof errorRecord.kind === "string") {
    envelope.kind = errorRecord.kind;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (typeof errorRecord.status === "number" && Number.isFinite(errorRecord.status)) {
    envelope.status = errorRecord.status;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const parseCliArgs = (argv: readonly string[]): CliArgs => {
  let driver: string | undefined;
  let mode: RunMode = "refresh";

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    let modeValue: string | undefined;

    if (arg === "--mode") {
      modeValue = argv[i + 1];
      i += 1;
      if (modeValue == null) throw new CliUsageError(`--mode needs a value. ${USAGE}`);
    } else if (arg.startsWith("--mode=")) {
      modeValue = arg.slice("--mode=".length);
    } else if (arg.startsWith("-")) {
      throw new CliUsageError(`Unknown option: ${arg}. ${USAGE}`);
    } else if (driver == null) {
      driver = arg;
      continue;
    } else {
      throw new CliUsageError(`Unexpected argument: ${arg}. ${USAGE}`);
    }

    if (!isRunMode(modeValue)) {
      throw new CliUsageError(`Unknown mode: ${modeValue}. ${USAGE}`);
    }
    mode = modeValue;
  }

  return driver == null ? { mode } : { driver, mode };
};

export const exitCodeFor = (report: RunReport): number => (report.hardFailure ? EXIT_FAILURE : EXIT_OK);

/**
 * Wires SIGINT/SIGTERM to an AbortController so in-flight sleeps and requests stop promptly.
 */
export const installShutdownHandlers = (controller: AbortController): (() => void) => {
  const onSignal = (signal: NodeJS.Signals) => {
    console.warn(JSON.stringify({ event: "run.shutdown_requested", signal }));
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  return () => {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
  };
};

export const executeRunReportsCli = async (argv: readonly string[] = process.argv.slice(2)): Promise<void> => {
  const controller = new AbortController();
  const uninstall = installShutdownHandlers(controller);
  let exitCode = EXIT_OK;

  try {
    const args = parseCliArgs(argv);
    const report = await runReports({ ...args, signal: controller.signal });
    console.log(JSON.stringify({
      event: "run.summary",
      mode: report.mode,
      hardFailure: report.hardFailure,
      drivers: report.summaries
    }));
    exitCode = exitCodeFor(report);
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    exitCode = err instanceof UnknownDriverError || err instanceof CliUsageError ? EXIT_USAGE : EXIT_FAILURE;
  } finally {
    uninstall();
  }

  if (exitCode !== EXIT_OK) process.exit(exitCode);
};

if (require.main === module) {
  void executeRunReportsCli();
}
