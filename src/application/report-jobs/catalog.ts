import type { PollingOptions } from "../../core/reports/report.types";
import type { PayloadShape } from "../../core/shape/reshapePayload";
import { flatten, passthrough } from "../../core/shape/reshapePayload";
import type { WindowKind } from "../../core/windows/dateWindows";

export type IdentifierChunking = {
  chunkSize: number;
  optionKey: string;
  separator: string;
};

export type ReportJobSource =
  | {
      kind: "report";
      reportType: string;
      reportOptions?: Readonly<Record<string, string>>;
      identifiers?: IdentifierChunking;
    }
  | {
      /** Reports the platform generates on its own schedule; listed and downloaded, never created. */
      kind: "settlement";
      reportType: string;
    }
  | {
      /** Per-identifier entity snapshot over the inventory's ASINs. */
      kind: "catalog";
      includedData: readonly string[];
      itemDelayMs: number;
    }
  | { kind: "orders" }
  | { kind: "inventory" };

export type EmptyPolicy = "write_empty" | "skip";

export type ReportJobDefinition = {
  name: string;
  source: ReportJobSource;
  windowKind: WindowKind;
  shape: PayloadShape;
  prefix: string;
  extension: string;
  contentType: string;
  emptyPolicy: EmptyPolicy;
  polling?: Partial<PollingOptions>;
  /** Runs, and must succeed, before any other driver starts. */
  runFirst?: boolean;
  /** Complete periods skipped at the recent end of a backfill. */
  settlePeriods?: number;
  lookbackDays?: number;
};

const JSON_TYPE = "application/json";
const NDJSON_TYPE = "application/x-ndjson";
const TSV_TYPE = "text/tab-separated-values; charset=utf-8";

const BRAND_ANALYTICS_POLLING: Partial<PollingOptions> = { maxPollAttempts: 15, pollIntervalMs: 20000 };
const CATALOG_INCLUDED_DATA: readonly string[] = [
  "summaries",
  "attributes",
  "classifications",
  "dimensions",
  "identifiers",
  "images",
  "productTypes",
  "relationships",
  "salesRanks"
];
const ASIN_CHUNKS: IdentifierChunking = { chunkSize: 10, optionKey: "asin", separator: " " };

const SALES_AND_TRAFFIC = "GET_SALES_AND_TRAFFIC_REPORT";
const SEARCH_QUERY_PERFORMANCE = "GET_BRAND_ANALYTICS_SEARCH_QUERY_PERFORMANCE_REPORT";
const REPEAT_PURCHASE = "GET_BRAND_ANALYTICS_REPEAT_PURCHASE_REPORT";

export const reportJobCatalog: readonly ReportJobDefinition[] = [
  {
    name: "fba_inventory",
    source: { kind: "inventory" },
    windowKind: "day",
    shape: passthrough,
    prefix: "fba-inventory/",
    extension: ".jsonl",
    contentType: NDJSON_TYPE,
    emptyPolicy: "skip",
    runFirst: true
  },
  {
    name: "sales_and_traffic_day",
    source: { kind: "report", reportType: SALES_AND_TRAFFIC },
    windowKind: "day",
    shape: passthrough,
    prefix: "sales-and-traffic-report/day/",
    extension: ".json",
    contentType: JSON_TYPE,
    emptyPolicy: "skip",
    polling: { maxPollAttempts: 20, pollIntervalMs: 30000 }
  },
  {
    name: "sales_and_traffic_child_asin",
    source: {
      kind: "report",
      reportType: SALES_AND_TRAFFIC,
      reportOptions: { dateGranularity: "DAY", asinGranularity: "CHILD" }
    },
    windowKind: "day",
    shape: passthrough,
    prefix: "sales-and-traffic-report/child-asin/",
    extension: ".json",
    contentType: JSON_TYPE,
    emptyPolicy: "skip",
    polling: { maxPollAttempts: 20, pollIntervalMs: 30000 }
  },
  {
    name: "brand_analytics_search_query_weekly",
    source: {
      kind: "report",
      reportType: SEARCH_QUERY_PERFORMANCE,
      reportOptions: { reportPeriod: "WEEK" },
      identifiers: ASIN_CHUNKS
    },
    windowKind: "week",
    shape: flatten("dataByAsin"),
    prefix: "brand-analytics-search-query-performance-report/WEEK/",
    extension: ".json",
    contentType: JSON_TYPE,
    emptyPolicy: "skip",
    polling: BRAND_ANALYTICS_POLLING
  },
  {
    name: "brand_analytics_search_query_monthly",
    source: {
      kind: "report",
      reportType: SEARCH_QUERY_PERFORMANCE,
      reportOptions: { reportPeriod: "MONTH" },
      identifiers: ASIN_CHUNKS
    },
    windowKind: "month",
    shape: flatten("dataByAsin"),
    prefix: "brand-analytics-search-query-performance-report/MONTH/",
    extension: ".json",
    contentType: JSON_TYPE,
    emptyPolicy: "skip",
    polling: BRAND_ANALYTICS_POLLING
  },
  {
    name: "brand_analytics_repeat_purchase_weekly",
    source: { kind: "report", reportType: REPEAT_PURCHASE, reportOptions: { reportPeriod: "WEEK" } },
    windowKind: "week",
    shape: flatten("dataByAsin"),
    prefix: "brand-analytics-repeat-purchase/weekly/",
    extension: ".jsonl",
    contentType: NDJSON_TYPE,
    emptyPolicy: "skip",
    polling: { maxPollAttempts: 30, pollIntervalMs: 20000 }
  },
  {
    name: "brand_analytics_repeat_purchase_monthly",
    source: { kind: "report", reportType: REPEAT_PURCHASE, reportOptions: { reportPeriod: "MONTH" } },
    windowKind: "month",
    shape: passthrough,
    prefix: "brand-analytics-repeat-purchase/monthly/",
    extension: ".json",
    contentType: JSON_TYPE,
    emptyPolicy: "skip",
    polling: { maxPollAttempts: 30, pollIntervalMs: 20000 }
  },
  {
    name: "ledger_detail",
    source: { kind: "report", reportType: "GET_LEDGER_DETAIL_VIEW_DATA" },
    windowKind: "day",
    shape: passthrough,
    prefix: "ledger-detail-view-data/",
    extension: ".tsv",
    contentType: TSV_TYPE,
    emptyPolicy: "write_empty",
    polling: { maxPollAttempts: 15, pollIntervalMs: 20000 },
    lookbackDays: 548
  },
  {
    name: "ledger_summary",
    source: {
      kind: "report",
      reportType: "GET_LEDGER_SUMMARY_VIEW_DATA",
      reportOptions: { aggregatedByTimePeriod: "MONTHLY" }
    },
    windowKind: "month",
    shape: passthrough,
    prefix: "ledger-summary-view-data/",
    extension: ".tsv",
    contentType: TSV_TYPE,
    emptyPolicy: "write_empty",
    polling: { maxPollAttempts: 15, pollIntervalMs: 20000 }
  },
  {
    name: "all_orders_report",
    source: { kind: "report", reportType: "GET_FLAT_FILE_ALL_ORDERS_DATA_BY_ORDER_DATE_GENERAL" },
    windowKind: "day",
    shape: passthrough,
    prefix: "all-orders-report/",
    extension: ".tsv",
    contentType: TSV_TYPE,
    emptyPolicy: "skip",
    polling: { maxPollAttempts: 20, pollIntervalMs: 20000 }
  },
  {
    name: "settlement_report",
    source: { kind: "settlement", reportType: "GET_V2_SETTLEMENT_REPORT_DATA_FLAT_FILE_V2" },
    windowKind: "day",
    shape: passthrough,
    prefix: "settlement-report-data-flat-file-v2/",
    extension: ".tsv",
    contentType: TSV_TYPE,
    emptyPolicy: "skip"
  },
  {
    name: "catalog_items",
    source: { kind: "catalog", includedData: CATALOG_INCLUDED_DATA, itemDelayMs: 500 },
    windowKind: "day",
    shape: passthrough,
    prefix: "catalog-items/",
    extension: ".jsonl",
    contentType: NDJSON_TYPE,
    emptyPolicy: "skip"
  },
  {
    name: "orders_api",
    source: { kind: "orders" },
    windowKind: "day",
    shape: passthrough,
    prefix: "orders-api/",
    extension: ".jsonl",
    contentType: NDJSON_TYPE,
    emptyPolicy: "skip"
  }
];

export const driverNames = (catalog: readonly ReportJobDefinition[] = reportJobCatalog): string[] =>
  catalog.map((definition) => definition.name);

export const findDriver = (
  name: string,
  catalog: readonly ReportJobDefinition[] = reportJobCatalog
): ReportJobDefinition | undefined => catalog.find((definition) => definition.name === name);
