import { OperationCancelledError, UnknownDriverError } from "../../core/errors";
import type { RunMode } from "../../core/windows/dateWindows";
import { createLimiter } from "../../shared/concurrency/limiter";
import type { ReportJobDefinition } from "../report-jobs/catalog";
import { abortedDriverSummary, type DriverSummary } from "../report-jobs/report-job.error-handler";

export type DriverRunner = (definition: ReportJobDefinition) => Promise<DriverSummary>;

export type RunDriversOptions = {
  mode: RunMode;
  /** Run only this driver; prerequisites are not forced. */
  only?: string;
  concurrency?: number;
  signal?: AbortSignal;
};

export type RunReport = {
  mode: RunMode;
  summaries: DriverSummary[];
  hardFailure: boolean;
  prerequisiteFailed?: string;
};

const toMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * Runs `runFirst` drivers one by one, then the rest through a bounded limiter.
 * A driver that throws is reported as aborted; it never stops its siblings.
 */
export const runDrivers = async (
  catalog: readonly ReportJobDefinition[],
  runDriver: DriverRunner,
  options: RunDriversOptions
): Promise<RunReport> => {
  const { mode, only, signal } = options;

  let selected: readonly ReportJobDefinition[] = catalog;
  if (only != null) {
    const match = catalog.find((definition) => definition.name === only);
    if (!match) {
      throw new UnknownDriverError(only, catalog.map((definition) => definition.name));
    }
    selected = [match];
  }

  const runGuarded = async (definition: ReportJobDefinition): Promise<DriverSummary> => {
    try {
      return await runDriver(definition);
    } catch (err) {
      if (err instanceof OperationCancelledError || signal?.aborted) {
        console.warn(JSON.stringify({ event: "driver.cancelled", driver: definition.name }));
      } else {
        console.error(JSON.stringify({ event: "driver.aborted", driver: definition.name, reason: toMessage(err) }));
      }
      return abortedDriverSummary(definition.name, mode, err);
    }
  };

  const summaries: DriverSummary[] = [];
  const prerequisites = selected.filter((definition) => definition.runFirst);
  const rest = selected.filter((definition) => !definition.runFirst);

  for (const definition of prerequisites) {
    const summary = await runGuarded(definition);
    summaries.push(summary);
    if (summary.hardFailure) {
      console.error(JSON.stringify({ event: "run.prerequisite_failed", driver: definition.name }));
      const report: RunReport = { mode, summaries, hardFailure: true, prerequisiteFailed: definition.name };
      console.log(JSON.stringify({ event: "run.completed", mode, hardFailure: true, drivers: summaries.length }));
      return report;
    }
  }

  if (rest.length > 0) {
    const limit = createLimiter(Math.max(1, options.concurrency ?? rest.length));
    const results = await Promise.all(rest.map((definition) => limit(() => runGuarded(definition))));
    summaries.push(...results);
  }

  const hardFailure = summaries.some((summary) => summary.hardFailure);
  console.log(JSON.stringify({ event: "run.completed", mode, hardFailure, drivers: summaries.length }));
  return { mode, summaries, hardFailure };
};
