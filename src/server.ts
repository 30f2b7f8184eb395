import http from "http";
import { URL } from "url";
import type { RunReport } from "./application/orchestrator/runDrivers";
import { isRunMode } from "./application/report-jobs/report-job.config";
import { runReports, type RunReportsOptions } from "./composition/root";
import { UnknownDriverError } from "./core/errors";

export type ServerOptions = {
  run?: (options: RunReportsOptions) => Promise<RunReport>;
};

const sendJson = (res: http.ServerResponse, status: number, payload: unknown) => {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(payload));
};

/**
 * Trigger surface for schedulers that prefer HTTP over a process exit code.
 * - GET /health
 * - GET /run?driver=<name>&mode=refresh|backfill
 */
export const createServer = (options: ServerOptions = {}) => {
  const run = options.run ?? runReports;

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? "/", "http://localhost");

    if (req.method === "GET" && url.pathname === "/health") {
      sendJson(res, 200, { ok: true });
      return;
    }

    if (req.method === "GET" && url.pathname === "/run") {
      const mode = url.searchParams.get("mode") ?? "refresh";
      if (!isRunMode(mode)) {
        sendJson(res, 400, { ok: false, error: `Unknown mode: ${mode}` });
        return;
      }
      const driver = url.searchParams.get("driver") ?? undefined;

      try {
        const report = await run(driver == null ? { mode } : { mode, driver });
        sendJson(res, report.hardFailure ? 500 : 200, { ok: !report.hardFailure, ...report });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        if (err instanceof UnknownDriverError) {
          sendJson(res, 400, { ok: false, error: message });
          return;
        }
        console.error(JSON.stringify({ event: "run.failed", message }));
        sendJson(res, 500, { ok: false, error: message });
      }
      return;
    }

    sendJson(res, 404, { ok: false, error: "not_found" });
  };

  return http.createServer((req, res) => {
    void handle(req, res);
  });
};

if (require.main === module) {
  const port = Number(process.env.PORT ?? 3000);
  const server = createServer();

  server.listen(port, () => {
    console.log(`Server listening on http://localhost:${port}`);
  });
}
