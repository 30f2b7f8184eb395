import { gzipSync } from "zlib";
import type { ReportRequest } from "../../src/core/reports/report.types";
import type { CatalogApi, CatalogItem, CatalogItemQuery } from "../../src/ports/CatalogApi";
import type { InventoryApi, InventorySummary } from "../../src/ports/InventoryApi";
import type { OrdersApi, OrdersQuery, RawOrder } from "../../src/ports/OrdersApi";
import type { ListedReport, ListReportsQuery, ReportsApi, ReportStatus } from "../../src/ports/ReportsApi";
import type { ReportSink } from "../../src/ports/ReportSink";

export type ReportScript = {
  statuses: ReportStatus[];
  body?: string;
};

/**
 * Scripted reports API: the n-th created report follows the n-th script; the last status repeats.
 * Listed reports are served separately, with their bodies keyed by document id.
 */
export class ScriptedReportsApi implements ReportsApi {
  readonly created: ReportRequest[] = [];
  readonly listQueries: ListReportsQuery[] = [];
  private readonly listed: ListedReport[] = [];
  private readonly listedBodies = new Map<string, Uint8Array>();
  private readonly progress = new Map<string, { script: ReportScript; polls: number }>();

  constructor(private readonly scripts: ReportScript[], private readonly fallback: ReportScript = { statuses: [] }) {}

  async createReport(request: ReportRequest): Promise<string> {
    this.created.push(request);
    const reportId = `R${this.created.length}`;
    this.progress.set(reportId, { script: this.scripts[this.created.length - 1] ?? this.fallback, polls: 0 });
    return reportId;
  }

  list(report: ListedReport, body?: string | Uint8Array): this {
    this.listed.push(report);
    if (report.reportDocumentId && body !== undefined) {
      const bytes = typeof body === "string" ? new Uint8Array(gzipSync(Buffer.from(body, "utf8"))) : body;
      this.listedBodies.set(report.reportDocumentId, bytes);
    }
    return this;
  }

  async listReports(query: ListReportsQuery): Promise<ListedReport[]> {
    this.listQueries.push(query);
    return this.listed;
  }

  async getReportStatus(reportId: string): Promise<ReportStatus> {
    const entry = this.progress.get(reportId);
    if (!entry) throw new Error(`unknown report ${reportId}`);
    const { statuses } = entry.script;
    const status = statuses[Math.min(entry.polls, statuses.length - 1)] ?? { processingStatus: "IN_PROGRESS" };
    entry.polls += 1;
    return status;
  }

  async getReportDocument(documentId: string): Promise<{ url: string }> {
    return { url: `memory://${documentId}` };
  }

  async download(url: string): Promise<Uint8Array> {
    const documentId = url.replace("memory://", "");
    const listedBody = this.listedBodies.get(documentId);
    if (listedBody) return listedBody;
    for (const { script } of this.progress.values()) {
      if (script.statuses.some((status) => status.reportDocumentId === documentId)) {
        return new Uint8Array(gzipSync(Buffer.from(script.body ?? "", "utf8")));
      }
    }
    throw new Error(`unknown document ${documentId}`);
  }
}

export const done = (documentId: string, body: string): ReportScript => ({
  statuses: [{ processingStatus: "IN_PROGRESS" }, { processingStatus: "DONE", reportDocumentId: documentId }],
  body
});

export const fatal = (): ReportScript => ({ statuses: [{ processingStatus: "FATAL" }] });

export class MemorySink implements ReportSink {
  readonly description = "memory";
  readonly objects = new Map<string, { body: string; contentType: string }>();

  async exists(name: string): Promise<boolean> {
    return this.objects.has(name);
  }

  async write(name: string, body: string, contentType: string): Promise<void> {
    this.objects.set(name, { body, contentType });
  }
}

export class StaticInventoryApi implements InventoryApi {
  constructor(private readonly summaries: InventorySummary[]) {}

  async listInventorySummaries(): Promise<InventorySummary[]> {
    return this.summaries;
  }
}

export class StaticOrdersApi implements OrdersApi {
  readonly queries: OrdersQuery[] = [];

  constructor(private readonly orders: RawOrder[]) {}

  async listOrders(query: OrdersQuery): Promise<RawOrder[]> {
    this.queries.push(query);
    return this.orders;
  }
}

/** Serves catalog items by ASIN; an ASIN with no entry answers as not found. */
export class StaticCatalogApi implements CatalogApi {
  readonly requests: Array<{ asin: string; query: CatalogItemQuery }> = [];

  constructor(private readonly items: Record<string, CatalogItem> = {}) {}

  async getCatalogItem(asin: string, query: CatalogItemQuery): Promise<CatalogItem | undefined> {
    this.requests.push({ asin, query });
    return this.items[asin];
  }
}
