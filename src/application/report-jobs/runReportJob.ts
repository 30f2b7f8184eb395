import { chunkList } from "../../core/chunks/chunkList";
import {
  DecodeExhaustedError,
  OperationCancelledError,
  ReportFailedError,
  ReportTimedOutError
} from "../../core/errors";
import { buildReportRequest, type PollingOptions } from "../../core/reports/report.types";
import { isBlankBody, joinSegments, reshapePayload } from "../../core/shape/reshapePayload";
import {
  type DateWindow,
  dayWindow,
  formatCompactDate,
  outputKeyFor,
  windowsFor,
  wireRange
} from "../../core/windows/dateWindows";
import type { CatalogApi } from "../../ports/CatalogApi";
import type { InventoryApi } from "../../ports/InventoryApi";
import type { OrdersApi } from "../../ports/OrdersApi";
import type { ListedReport, ReportsApi } from "../../ports/ReportsApi";
import type { ReportSink } from "../../ports/ReportSink";
import type { Sleep } from "../../shared/time/sleep";
import { sleep as defaultSleep, throwIfCancelled } from "../../shared/time/sleep";
import { acquireReport, downloadReportDocument } from "../report-protocol/acquireReport";
import type { ReportJobDefinition, ReportJobSource } from "./catalog";
import type { ReportJobConfig, ReportJobConfigInput } from "./report-job.config";
import { resolveReportJobConfig } from "./report-job.config";
import {
  buildUnitFailedLog,
  classifyUnitFailure,
  createDriverSummaryTracker,
  type DriverSummary,
  type UnitErrorContext,
  wrapSinkFailure
} from "./report-job.error-handler";

export type ReportJobDeps = {
  reports: ReportsApi;
  inventory: InventoryApi;
  orders: OrdersApi;
  catalog: CatalogApi;
  sink: ReportSink;
  /** Identifiers partitioned into chunked requests; only called for definitions that chunk. */
  listIdentifiers: (signal?: AbortSignal) => Promise<string[]>;
  sleep?: Sleep;
  now?: () => Date;
  signal?: AbortSignal;
};

type UnitResult =
  | { status: "written"; empty: boolean }
  | { status: "skipped" }
  | { status: "empty_skipped" }
  | { status: "failed"; error: unknown };

type ReportSource = Extract<ReportJobSource, { kind: "report" }>;

/** One object to produce: a date window, or a report the platform already holds. */
export type WorkUnit =
  | { kind: "window"; window: DateWindow; outputKey: string }
  | { kind: "listed"; report: ListedReport; documentId: string; outputKey: string };

export const objectNameFor = (definition: ReportJobDefinition, outputKey: string): string =>
  `${definition.prefix}${outputKey}${definition.extension}`;

/** Snapshot sources (inventory, catalog) run once, keyed by today. */
export const plannedWindows = (
  definition: ReportJobDefinition,
  config: ReportJobConfig,
  now: Date
): Iterable<DateWindow> => {
  const { kind } = definition.source;
  if (kind === "inventory" || kind === "catalog") return [dayWindow(now)];
  return windowsFor(config.mode, definition.windowKind, now, {
    refresh: config.refreshWindow,
    lookbackDays: definition.lookbackDays ?? config.lookbackDays,
    settlePeriods: definition.settlePeriods
  });
};

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})/;

/** The calendar date as written in the timestamp, whatever its offset. */
const compactDay = (timestamp: string): string => {
  const match = CALENDAR_DATE.exec(timestamp);
  if (match) return `${match[1]}${match[2]}${match[3]}`;
  const parsed = new Date(timestamp);
  return Number.isNaN(parsed.getTime()) ? timestamp.slice(0, 10).replace(/-/g, "") : formatCompactDate(parsed);
};

/** `YYYYMMDD-YYYYMMDD-<reportId>` from the listed report's data range. */
export const listedOutputKey = (report: ListedReport): string =>
  `${compactDay(report.dataStartTime)}-${compactDay(report.dataEndTime)}-${report.reportId}`;

function* windowUnits(windows: Iterable<DateWindow>): Generator<WorkUnit> {
  for (const window of windows) {
    yield { kind: "window", window, outputKey: outputKeyFor(window) };
  }
}

/**
 * Runs one driver over its units: skip what exists, fetch, reshape, write.
 * Unit failures are counted, never thrown; cancellation, report listing and identifier lookup failures are thrown.
 */
export const runReportJob = async (
  definition: ReportJobDefinition,
  deps: ReportJobDeps,
  configInput: ReportJobConfigInput = {}
): Promise<DriverSummary> => {
  const config = resolveReportJobConfig(configInput);
  const { sink, signal } = deps;
  const sleep = deps.sleep ?? defaultSleep;
  const clock = deps.now ?? (() => new Date());
  const now = clock();
  const polling: PollingOptions = { ...config.polling, ...definition.polling };
  const policy = config.failurePolicy;
  const tracker = createDriverSummaryTracker(definition.name, config.mode);

  console.log(JSON.stringify({
    event: "driver.started",
    driver: definition.name,
    mode: config.mode,
    sink: sink.description
  }));

  const source = definition.source;
  const needsIdentifiers = (source.kind === "report" && source.identifiers != null) || source.kind === "catalog";
  const identifiers = needsIdentifiers ? await deps.listIdentifiers(signal) : undefined;

  const listUnits = async (reportType: string): Promise<WorkUnit[]> => {
    const listed = await deps.reports.listReports(
      { reportTypes: [reportType], marketplaceIds: config.marketplaceIds, processingStatuses: ["DONE"] },
      { signal }
    );
    const units: WorkUnit[] = [];
    for (const report of listed) {
      if (report.processingStatus !== "DONE") continue;
      if (!report.reportDocumentId) {
        console.warn(JSON.stringify({ event: "report.no_document", driver: definition.name, reportId: report.reportId }));
        continue;
      }
      units.push({ kind: "listed", report, documentId: report.reportDocumentId, outputKey: listedOutputKey(report) });
    }
    console.log(JSON.stringify({ event: "reports.listed", driver: definition.name, listed: listed.length, units: units.length }));
    return units;
  };

  const fetchReportSegments = async (
    report: ReportSource,
    window: DateWindow,
    context: UnitErrorContext
  ): Promise<string[]> => {
    const chunks: Array<string[] | undefined> =
      report.identifiers && identifiers ? chunkList(identifiers, report.identifiers.chunkSize) : [undefined];
    if (chunks.length === 0) {
      console.warn(JSON.stringify({ event: "unit.no_identifiers", driver: context.driver, outputKey: context.outputKey }));
      return [];
    }

    const segments: string[] = [];
    let failedChunks = 0;
    let lastFailure = { reportId: "", reason: "" };

    for (const [index, chunk] of chunks.entries()) {
      if (index > 0) await sleep(config.unitDelayMs, signal);

      const options: Record<string, string> = { ...report.reportOptions };
      if (chunk && report.identifiers) {
        options[report.identifiers.optionKey] = chunk.join(report.identifiers.separator);
      }
      const request = buildReportRequest({
        reportType: report.reportType,
        marketplaceIds: config.marketplaceIds,
        window,
        options
      });

      const outcome = await acquireReport(request, polling, {
        api: deps.reports,
        sleep,
        signal,
        decode: { allowLatin1: config.allowLatin1 }
      });

      switch (outcome.status) {
        case "done":
          segments.push(...reshapePayload(outcome.payload.text, definition.shape, `report:${outcome.job.requestId}`));
          break;
        case "failed":
          failedChunks += 1;
          lastFailure = { reportId: outcome.job.requestId, reason: outcome.reason };
          console.warn(JSON.stringify({
            event: "chunk.dropped",
            driver: context.driver,
            outputKey: context.outputKey,
            chunk: index,
            reportId: outcome.job.requestId,
            reason: outcome.reason
          }));
          break;
        case "timed_out":
          throw new ReportTimedOutError({
            message: `Report ${outcome.job.requestId} not ready after ${outcome.job.attempts} polls`,
            reportId: outcome.job.requestId,
            attempts: outcome.job.attempts
          });
        case "undecodable":
          throw new DecodeExhaustedError({
            message: `Report ${outcome.job.requestId} could not be decoded`,
            byteLength: outcome.byteLength
          });
      }
    }

    if (failedChunks === chunks.length) {
      throw new ReportFailedError({
        message: `Report ${lastFailure.reportId} ended with ${lastFailure.reason}`,
        reportId: lastFailure.reportId,
        processingStatus: lastFailure.reason
      });
    }
    return segments;
  };

  const fetchListedSegments = async (report: ListedReport, documentId: string): Promise<string[]> => {
    const retrieved = await downloadReportDocument(report.reportId, documentId, {
      api: deps.reports,
      sleep,
      signal,
      decode: { allowLatin1: config.allowLatin1 }
    });
    if (retrieved.status === "undecodable") {
      throw new DecodeExhaustedError({
        message: `Report ${report.reportId} could not be decoded`,
        byteLength: retrieved.byteLength
      });
    }
    return reshapePayload(retrieved.payload.text, definition.shape, `report:${report.reportId}`);
  };

  const fetchWindowSegments = async (window: DateWindow, context: UnitErrorContext): Promise<string[]> => {
    switch (source.kind) {
      case "report":
        return fetchReportSegments(source, window, context);
      case "settlement":
        throw new Error(`${definition.name} runs over listed reports, not date windows`);
      case "catalog": {
        if (!identifiers || identifiers.length === 0) {
          console.warn(JSON.stringify({ event: "unit.no_identifiers", driver: context.driver, outputKey: context.outputKey }));
          return [];
        }
        const records: string[] = [];
        let calls = 0;
        for (const marketplaceId of config.marketplaceIds) {
          for (const asin of identifiers) {
            if (calls > 0) await sleep(source.itemDelayMs, signal);
            calls += 1;
            const catalogData = await deps.catalog.getCatalogItem(
              asin,
              { marketplaceId, includedData: source.includedData },
              { signal }
            );
            if (!catalogData) continue;
            records.push(JSON.stringify({ fetchedAt: clock().toISOString(), marketplaceId, asin, catalogData }));
          }
        }
        return records;
      }
      case "orders": {
        const range = wireRange(window);
        const orders = await deps.orders.listOrders(
          { lastUpdatedAfter: range.dataStartTime, lastUpdatedBefore: range.dataEndTime },
          { signal }
        );
        return orders.map((order) => JSON.stringify(order));
      }
      case "inventory": {
        const records: string[] = [];
        for (const marketplaceId of config.marketplaceIds) {
          const summaries = await deps.inventory.listInventorySummaries(marketplaceId, { signal });
          const fetchedAt = clock().toISOString();
          for (const inventorySummary of summaries) {
            records.push(JSON.stringify({ fetchedAt, marketplaceId, inventorySummary }));
          }
        }
        return records;
      }
    }
  };

  const fetchSegments = (unit: WorkUnit, context: UnitErrorContext): Promise<string[]> =>
    unit.kind === "listed" ? fetchListedSegments(unit.report, unit.documentId) : fetchWindowSegments(unit.window, context);

  const outputExists = async (name: string, context: UnitErrorContext): Promise<boolean> => {
    try {
      return await sink.exists(name);
    } catch (err) {
      console.warn(JSON.stringify({
        event: "sink.exists_failed",
        driver: context.driver,
        objectName: name,
        reason: err instanceof Error ? err.message : String(err)
      }));
      return false;
    }
  };

  let fetchedUnits = 0;

  const runUnit = async (unit: WorkUnit): Promise<UnitResult> => {
    const { outputKey } = unit;
    const objectName = objectNameFor(definition, outputKey);
    const context: UnitErrorContext = { driver: definition.name, outputKey, objectName };

    if (await outputExists(objectName, context)) {
      console.log(JSON.stringify({ event: "unit.skipped", driver: definition.name, objectName }));
      return { status: "skipped" };
    }

    if (fetchedUnits > 0) await sleep(config.unitDelayMs, signal);
    fetchedUnits += 1;

    let body: string;
    try {
      body = joinSegments(await fetchSegments(unit, context));
    } catch (error) {
      if (error instanceof OperationCancelledError) throw error;
      return { status: "failed", error };
    }

    const empty = isBlankBody(body);
    if (empty && definition.emptyPolicy === "skip") {
      console.log(JSON.stringify({ event: "unit.empty", driver: definition.name, objectName }));
      return { status: "empty_skipped" };
    }

    try {
      await sink.write(objectName, empty ? "" : body, definition.contentType);
    } catch (error) {
      return { status: "failed", error: wrapSinkFailure(error, context) };
    }

    console.log(JSON.stringify({
      event: "unit.written",
      driver: definition.name,
      objectName,
      bytes: Buffer.byteLength(body, "utf8"),
      empty
    }));
    return { status: "written", empty };
  };

  let consecutiveFailures = 0;
  let consecutiveTimeouts = 0;

  const units: Iterable<WorkUnit> = source.kind === "settlement"
    ? await listUnits(source.reportType)
    : windowUnits(plannedWindows(definition, config, now));

  for (const unit of units) {
    throwIfCancelled(signal);
    const result = await runUnit(unit);

    if (result.status === "skipped") {
      tracker.addSkipped();
      continue;
    }

    if (result.status !== "failed") {
      if (result.status === "written") tracker.addSucceeded();
      if (result.status === "empty_skipped" || result.empty) tracker.addEmpty();
      consecutiveFailures = 0;
      consecutiveTimeouts = 0;
      continue;
    }

    const code = classifyUnitFailure(result.error);
    tracker.addFailed(code);
    consecutiveFailures += 1;
    consecutiveTimeouts = code === "timed_out" ? consecutiveTimeouts + 1 : 0;
    console.warn(JSON.stringify(buildUnitFailedLog(
      result.error,
      { driver: definition.name, outputKey: unit.outputKey },
      consecutiveFailures
    )));

    if (config.mode === "backfill" && code === "report_failed") {
      tracker.abandon("retention_boundary");
      break;
    }
    if (consecutiveTimeouts >= policy.abandonAfterTimeouts) {
      tracker.abandon("consecutive_timeouts");
      break;
    }
    if (consecutiveFailures >= policy.abandonAfter) {
      tracker.abandon("consecutive_failures");
      break;
    }
    if (consecutiveFailures >= policy.cooldownAfter) {
      const cooldownMs = Math.min(policy.cooldownMaxMs, consecutiveFailures * policy.cooldownStepMs);
      console.warn(JSON.stringify({ event: "driver.cooldown", driver: definition.name, consecutiveFailures, cooldownMs }));
      await sleep(cooldownMs, signal);
    }
  }

  const summary = tracker.summary();
  if (summary.abandoned) {
    console.warn(JSON.stringify({ event: "driver.abandoned", driver: definition.name, reason: summary.abandonReason }));
  }
  console.log(JSON.stringify({ event: "driver.completed", ...summary }));
  return summary;
};
