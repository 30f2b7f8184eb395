import { wireRange } from "../../core/windows/dateWindows";
import type { ReportRequest } from "../../core/reports/report.types";
import type { CredentialProvider } from "../../ports/CredentialProvider";
import { MalformedResponseError } from "../../core/errors";
import type {
  CallOptions,
  ListedReport,
  ListReportsQuery,
  ReportDocument,
  ReportsApi,
  ReportStatus
} from "../../ports/ReportsApi";
import type { ResilientTransport } from "../http/ResilientTransport";
import { sanitizeUrl } from "../http/ResilientTransport";
import { isRecord, optionalString, readJsonObject, requireString, SP_API_ACCESS_TOKEN_HEADER } from "./spApiJson";

const REPORTS_PATH = "/reports/2021-06-30";

/**
 * Reports API 2021-06-30 over the resilient transport.
 */
export class SpApiReportsClient implements ReportsApi {
  constructor(
    private readonly transport: ResilientTransport,
    private readonly credentials: CredentialProvider,
    private readonly baseUrl: string,
    private readonly maxListPages = 100
  ) {}

  async createReport(request: ReportRequest, options: CallOptions = {}): Promise<string> {
    const url = `${this.baseUrl}${REPORTS_PATH}/reports`;
    const payload: Record<string, unknown> = {
      reportType: request.reportType,
      marketplaceIds: [...request.marketplaceIds],
      ...wireRange(request.window)
    };
    if (request.options) {
      payload.reportOptions = { ...request.options };
    }

    const res = await this.transport.execute("POST", url, {
      headers: await this.headers(),
      body: JSON.stringify(payload),
      signal: options.signal
    });
    const body = await readJsonObject(res, url);
    return requireString(body, "reportId", url);
  }

  async getReportStatus(reportId: string, options: CallOptions = {}): Promise<ReportStatus> {
    const url = `${this.baseUrl}${REPORTS_PATH}/reports/${encodeURIComponent(reportId)}`;
    const res = await this.transport.execute("GET", url, { headers: await this.headers(), signal: options.signal });
    const body = await readJsonObject(res, url);
    return {
      processingStatus: requireString(body, "processingStatus", url),
      reportDocumentId: optionalString(body, "reportDocumentId")
    };
  }

  /**
   * getReports, following `nextToken`; follow-up pages send the token alone.
   * Entries without the fields an object name is built from are dropped.
   */
  async listReports(query: ListReportsQuery, options: CallOptions = {}): Promise<ListedReport[]> {
    const url = `${this.baseUrl}${REPORTS_PATH}/reports`;
    const reports: ListedReport[] = [];
    let nextToken: string | undefined;
    let page = 0;

    do {
      page += 1;
      if (page > this.maxListPages) {
        throw new MalformedResponseError({
          message: `Report listing exceeded ${this.maxListPages} pages`,
          url: sanitizeUrl(new URL(url))
        });
      }

      const res = await this.transport.execute("GET", url, {
        headers: await this.headers(),
        query: nextToken
          ? { nextToken }
          : {
              reportTypes: query.reportTypes,
              marketplaceIds: query.marketplaceIds,
              processingStatuses: query.processingStatuses,
              createdSince: query.createdSince,
              pageSize: "100"
            },
        signal: options.signal
      });
      const body = await readJsonObject(res, url);

      const items = body.reports;
      if (Array.isArray(items)) {
        for (const item of items) {
          const listed = isRecord(item) ? toListedReport(item) : undefined;
          if (listed) reports.push(listed);
        }
      }
      nextToken = optionalString(body, "nextToken");
    } while (nextToken);

    return reports;
  }

  async getReportDocument(documentId: string, options: CallOptions = {}): Promise<ReportDocument> {
    const url = `${this.baseUrl}${REPORTS_PATH}/documents/${encodeURIComponent(documentId)}`;
    const res = await this.transport.execute("GET", url, { headers: await this.headers(), signal: options.signal });
    const body = await readJsonObject(res, url);
    return {
      url: requireString(body, "url", url),
      compressionAlgorithm: optionalString(body, "compressionAlgorithm")
    };
  }

  /** Pre-signed document URL; sent without SP-API headers. */
  async download(url: string, options: CallOptions = {}): Promise<Uint8Array> {
    const res = await this.transport.execute("GET", url, { signal: options.signal });
    return new Uint8Array(await res.arrayBuffer());
  }

  private async headers(): Promise<Record<string, string>> {
    return {
      [SP_API_ACCESS_TOKEN_HEADER]: await this.credentials.getBearerToken(),
      "content-type": "application/json"
    };
  }
}

const toListedReport = (item: Record<string, unknown>): ListedReport | undefined => {
  const reportId = optionalString(item, "reportId");
  const reportType = optionalString(item, "reportType");
  const processingStatus = optionalString(item, "processingStatus");
  const dataStartTime = optionalString(item, "dataStartTime");
  const dataEndTime = optionalString(item, "dataEndTime");
  if (!reportId || !reportType || !processingStatus || !dataStartTime || !dataEndTime) return undefined;

  const reportDocumentId = optionalString(item, "reportDocumentId");
  return {
    reportId,
    reportType,
    processingStatus,
    dataStartTime,
    dataEndTime,
    ...(reportDocumentId ? { reportDocumentId } : {})
  };
};
