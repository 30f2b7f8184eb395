import http from "http";
import { URL } from "url";
import { gzipSync } from "zlib";

/**
 * Minimal fake Selling Partner API for E2E and local runs.
 * - POST /auth/o2/token
 * - POST /tokens/2021-03-01/restrictedDataToken
 * - POST /reports/2021-06-30/reports, GET .../reports, GET .../reports/:id, GET .../documents/:id
 * - GET  /download/:id (gzip when the document says so)
 * - GET  /fba/inventory/v1/summaries
 * - GET  /orders/v0/orders
 * - GET  /catalog/2022-04-01/items/:asin
 */
export type FakeReportDocument = {
  body: string;
  /** Terminal status once pending polls are used up. */
  finalStatus?: "DONE" | "FATAL" | "CANCELLED";
  gzip?: boolean;
};

/** A report the fake already holds; served by the listing route and never created. */
export type FakeListedReport = FakeReportDocument & {
  reportId: string;
  reportType: string;
  dataStartTime: string;
  dataEndTime: string;
};

export type FakeSpApiOptions = {
  /** Report bodies keyed by report type. Unknown types finish DONE with an empty body. */
  reports?: Record<string, FakeReportDocument>;
  /** IN_PROGRESS answers before the terminal status. */
  pendingPolls?: number;
  inventoryPages?: Array<Array<Record<string, unknown>>>;
  orderPages?: Array<Array<Record<string, unknown>>>;
  listedReports?: FakeListedReport[];
  /** Catalog items keyed by ASIN; other ASINs answer 404. */
  catalogItems?: Record<string, Record<string, unknown>>;
  /** Leading 429 responses on report creation. */
  rateLimitedCreates?: number;
  accessToken?: string;
};

export type FakeCall = {
  method: string;
  path: string;
  query: Record<string, string>;
  body?: string;
};

type FakeReport = {
  id: string;
  reportType: string;
  polls: number;
  request: Record<string, unknown>;
};

export type FakeSpApiServer = {
  server: http.Server;
  calls: FakeCall[];
  createdReports: () => Array<{ id: string; reportType: string; request: Record<string, unknown> }>;
};

const readBody = (req: http.IncomingMessage): Promise<string> =>
  new Promise((resolve, reject) => {
    const parts: Buffer[] = [];
    req.on("data", (part: Buffer) => parts.push(part));
    req.on("end", () => resolve(Buffer.concat(parts).toString("utf8")));
    req.on("error", reject);
  });

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseObject = (text: string): Record<string, unknown> => {
  try {
    const value: unknown = JSON.parse(text);
    return isRecord(value) ? value : {};
  } catch {
    return {};
  }
};

const sendJson = (res: http.ServerResponse, status: number, payload: unknown, headers: Record<string, string> = {}) => {
  res.writeHead(status, { "content-type": "application/json", ...headers });
  res.end(JSON.stringify(payload));
};

const pageOf = <T>(pages: T[][], token: string | null): { items: T[]; nextToken?: string } => {
  const index = token ? Number(token.replace("page-", "")) : 0;
  const items = pages[index] ?? [];
  return index + 1 < pages.length ? { items, nextToken: `page-${index + 1}` } : { items };
};

export const createFakeSpApiServer = (options: FakeSpApiOptions = {}): FakeSpApiServer => {
  const pendingPolls = options.pendingPolls ?? 1;
  const accessToken = options.accessToken ?? "fake-access-token";
  const calls: FakeCall[] = [];
  const reports = new Map<string, FakeReport>();
  let rateLimited = 0;

  const listed = new Map((options.listedReports ?? []).map((report) => [report.reportId, report]));

  const documentFor = (reportType: string): FakeReportDocument =>
    options.reports?.[reportType] ?? { body: "" };

  const documentById = (id: string): FakeReportDocument | undefined => {
    const report = reports.get(id);
    return report ? documentFor(report.reportType) : listed.get(id);
  };

  const authorized = (req: http.IncomingMessage): boolean => {
    const token = req.headers["x-amz-access-token"];
    return token === accessToken || token === "fake-restricted-token";
  };

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const body = req.method === "POST" ? await readBody(req) : undefined;
    calls.push({ method: req.method ?? "GET", path: url.pathname, query: Object.fromEntries(url.searchParams), body });

    if (req.method === "POST" && url.pathname === "/auth/o2/token") {
      const form = new URLSearchParams(body ?? "");
      if (form.get("grant_type") !== "refresh_token" || !form.get("refresh_token")) {
        return sendJson(res, 400, { error: "invalid_grant" });
      }
      return sendJson(res, 200, { access_token: accessToken, token_type: "bearer", expires_in: 3600 });
    }

    if (url.pathname.startsWith("/download/")) {
      const document = documentById(decodeURIComponent(url.pathname.slice("/download/".length)));
      if (!document) return sendJson(res, 404, { errors: [{ code: "NotFound" }] });
      const bytes = document.gzip ? gzipSync(Buffer.from(document.body, "utf8")) : Buffer.from(document.body, "utf8");
      res.writeHead(200, { "content-type": "application/octet-stream" });
      res.end(bytes);
      return;
    }

    if (!authorized(req)) {
      return sendJson(res, 403, { errors: [{ code: "Unauthorized" }] });
    }

    if (req.method === "POST" && url.pathname === "/tokens/2021-03-01/restrictedDataToken") {
      return sendJson(res, 200, { restrictedDataToken: "fake-restricted-token", expiresIn: 3600 });
    }

    if (req.method === "POST" && url.pathname === "/reports/2021-06-30/reports") {
      if (rateLimited < (options.rateLimitedCreates ?? 0)) {
        rateLimited += 1;
        return sendJson(res, 429, { errors: [{ code: "QuotaExceeded" }] });
      }
      const request = parseObject(body ?? "");
      const reportType = typeof request.reportType === "string" ? request.reportType : "UNKNOWN";
      const id = `R${reports.size + 1}`;
      reports.set(id, { id, reportType, polls: 0, request });
      return sendJson(res, 202, { reportId: id });
    }

    if (req.method === "GET" && url.pathname === "/reports/2021-06-30/reports") {
      const types = (url.searchParams.get("reportTypes") ?? "").split(",");
      return sendJson(res, 200, {
        reports: [...listed.values()]
          .filter((report) => types.includes(report.reportType))
          .map(({ reportId, reportType, dataStartTime, dataEndTime }) => ({
            reportId,
            reportType,
            dataStartTime,
            dataEndTime,
            processingStatus: "DONE",
            reportDocumentId: `D-${reportId}`
          }))
      });
    }

    const reportMatch = /^\/reports\/2021-06-30\/reports\/([^/]+)$/.exec(url.pathname);
    if (req.method === "GET" && reportMatch) {
      const report = reports.get(decodeURIComponent(reportMatch[1]));
      if (!report) return sendJson(res, 404, { errors: [{ code: "NotFound" }] });
      report.polls += 1;
      if (report.polls <= pendingPolls) {
        return sendJson(res, 200, { reportId: report.id, processingStatus: "IN_PROGRESS" });
      }
      const status = documentFor(report.reportType).finalStatus ?? "DONE";
      return sendJson(res, 200, {
        reportId: report.id,
        processingStatus: status,
        ...(status === "DONE" ? { reportDocumentId: `D-${report.id}` } : {})
      });
    }

    const documentMatch = /^\/reports\/2021-06-30\/documents\/D-([^/]+)$/.exec(url.pathname);
    if (req.method === "GET" && documentMatch) {
      const id = decodeURIComponent(documentMatch[1]);
      const document = documentById(id);
      if (!document) return sendJson(res, 404, { errors: [{ code: "NotFound" }] });
      return sendJson(res, 200, {
        reportDocumentId: `D-${id}`,
        url: `${url.origin}/download/${encodeURIComponent(id)}`,
        ...(document.gzip ? { compressionAlgorithm: "GZIP" } : {})
      });
    }

    if (req.method === "GET" && url.pathname === "/fba/inventory/v1/summaries") {
      const { items, nextToken } = pageOf(options.inventoryPages ?? [[]], url.searchParams.get("nextToken"));
      return sendJson(res, 200, {
        payload: { granularity: { granularityType: "Marketplace" }, inventorySummaries: items },
        ...(nextToken ? { pagination: { nextToken } } : {})
      });
    }

    if (req.method === "GET" && url.pathname === "/orders/v0/orders") {
      const { items, nextToken } = pageOf(options.orderPages ?? [[]], url.searchParams.get("NextToken"));
      return sendJson(res, 200, { payload: { Orders: items, ...(nextToken ? { NextToken: nextToken } : {}) } });
    }

    const catalogMatch = /^\/catalog\/2022-04-01\/items\/([^/]+)$/.exec(url.pathname);
    if (req.method === "GET" && catalogMatch) {
      const asin = decodeURIComponent(catalogMatch[1]);
      const item = options.catalogItems?.[asin];
      if (!item) return sendJson(res, 404, { errors: [{ code: "NotFound", message: `ASIN ${asin} not found` }] });
      return sendJson(res, 200, { asin, ...item });
    }

    return sendJson(res, 404, { errors: [{ code: "NotFound" }] });
  };

  const server = http.createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      sendJson(res, 500, { errors: [{ code: "InternalFailure", message: String(err) }] });
    });
  });

  return {
    server,
    calls,
    createdReports: () => [...reports.values()].map(({ id, reportType, request }) => ({ id, reportType, request }))
  };
};

if (require.main === module) {
  const port = Number(process.env.FAKE_SP_API_PORT ?? 3999);
  const { server } = createFakeSpApiServer({
    reports: {
      GET_SALES_AND_TRAFFIC_REPORT: {
        body: JSON.stringify({ salesAndTrafficByAsin: [{ childAsin: "B000TEST01" }] }),
        gzip: true
      }
    },
    inventoryPages: [[{ asin: "B000TEST01", sellerSku: "SKU-1" }]]
  });

  server.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Fake SP-API server on http://localhost:${port}`);
  });
}
