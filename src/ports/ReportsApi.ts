import type { ReportRequest } from "../core/reports/report.types";

export type ReportStatus = {
  processingStatus: string;
  reportDocumentId?: string;
};

export type ReportDocument = {
  url: string;
  compressionAlgorithm?: string;
};

/** A report the platform already holds, as returned by getReports. */
export type ListedReport = {
  reportId: string;
  reportType: string;
  processingStatus: string;
  dataStartTime: string;
  dataEndTime: string;
  reportDocumentId?: string;
};

export type ListReportsQuery = {
  reportTypes: readonly string[];
  marketplaceIds: readonly string[];
  processingStatuses?: readonly string[];
  createdSince?: string;
};

export type CallOptions = {
  signal?: AbortSignal;
};

export interface ReportsApi {
  createReport(request: ReportRequest, options?: CallOptions): Promise<string>;
  getReportStatus(reportId: string, options?: CallOptions): Promise<ReportStatus>;
  listReports(query: ListReportsQuery, options?: CallOptions): Promise<ListedReport[]>;
  getReportDocument(documentId: string, options?: CallOptions): Promise<ReportDocument>;
  download(url: string, options?: CallOptions): Promise<Uint8Array>;
}
