import { getEventListeners } from "events";
import http from "http";
import type { AddressInfo } from "net";
import {
  HttpError,
  NetworkError,
  OperationCancelledError,
  RateLimitExceededError,
  ServerError
} from "../../src/core/errors";
import { ResilientTransport, sanitizeUrl } from "../../src/infrastructure/http/ResilientTransport";
import { createFakeFetch, jsonResponse } from "../helpers/fakeFetch";

type TestServer = {
  baseUrl: string;
  close: () => Promise<void>;
};

const startServer = async (
  handler: (req: http.IncomingMessage, res: http.ServerResponse) => void
): Promise<TestServer> => {
  const server = http.createServer(handler);
  await new Promise<void>((resolve) => {
    server.listen(0, "127.0.0.1", () => resolve());
  });

  const address = server.address() as AddressInfo;
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
};

const recordingSleep = () => {
  const delays: number[] = [];
  const sleep = async (ms: number) => {
    delays.push(ms);
  };
  return { delays, sleep };
};

describe("ResilientTransport retry policy", () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it("waits 60s, 300s, 300s on persistent 429 and gives up after four requests", async () => {
    let requests = 0;
    const server = await startServer((_req, res) => {
      requests += 1;
      res.writeHead(429, { "content-type": "application/json" });
      res.end(JSON.stringify({ errors: [{ code: "QuotaExceeded" }] }));
    });
    const { delays, sleep } = recordingSleep();

    const transport = new ResilientTransport({}, sleep);
    const error = await transport.execute("GET", `${server.baseUrl}/reports`).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RateLimitExceededError);
    expect(requests).toBe(4);
    expect(delays).toEqual([60000, 300000, 300000]);
    if (error instanceof RateLimitExceededError) {
      expect(error.status).toBe(429);
      expect(error.attempts).toBe(4);
    }

    await server.close();
  });

  it("keeps its own schedule when a 429 carries Retry-After", async () => {
    let calls = 0;
    const { fetchFn } = createFakeFetch(() => {
      calls += 1;
      return calls === 1
        ? new Response("{}", { status: 429, headers: { "Retry-After": "1" } })
        : jsonResponse({ reportId: "R1" });
    });
    const { delays, sleep } = recordingSleep();

    const transport = new ResilientTransport({}, sleep, fetchFn);
    const res = await transport.execute("POST", "https://sp-api.test/reports", { body: "{}" });

    expect(res.status).toBe(200);
    expect(delays).toEqual([60000]);
  });

  it("retries 5xx and returns the first successful response", async () => {
    let requests = 0;
    const server = await startServer((_req, res) => {
      requests += 1;
      if (requests < 3) {
        res.writeHead(503, { "content-type": "text/plain" });
        res.end("unavailable");
        return;
      }
      res.writeHead(200, { "content-type": "application/json" });
      res.end(JSON.stringify({ reportId: "R1" }));
    });
    const { delays, sleep } = recordingSleep();

    const transport = new ResilientTransport({}, sleep);
    const res = await transport.execute("POST", `${server.baseUrl}/reports`, { body: "{}" });

    expect(await res.json()).toEqual({ reportId: "R1" });
    expect(requests).toBe(3);
    expect(delays).toEqual([60000, 300000]);

    await server.close();
  });

  it("throws ServerError once 5xx retries are exhausted", async () => {
    const server = await startServer((_req, res) => {
      res.writeHead(500, { "content-type": "text/plain" });
      res.end("boom");
    });
    const { sleep } = recordingSleep();

    const transport = new ResilientTransport({ statusPolicy: { maxAttempts: 2, backoffScheduleSeconds: [1] } }, sleep);

    await expect(transport.execute("GET", `${server.baseUrl}/x`)).rejects.toBeInstanceOf(ServerError);

    await server.close();
  });

  it("fails fast on other 4xx statuses", async () => {
    let requests = 0;
    const server = await startServer((_req, res) => {
      requests += 1;
      res.writeHead(403, { "content-type": "application/json" });
      res.end(JSON.stringify({ errors: [{ code: "Unauthorized" }] }));
    });
    const { delays, sleep } = recordingSleep();

    const transport = new ResilientTransport({}, sleep);
    const error = await transport.execute("GET", `${server.baseUrl}/orders`).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(HttpError);
    expect(requests).toBe(1);
    expect(delays).toEqual([]);
    expect(warnSpy).not.toHaveBeenCalled();

    await server.close();
  });

  it("retries dropped connections on the network schedule", async () => {
    let requests = 0;
    const server = await startServer((_req, res) => {
      requests += 1;
      if (requests < 3) {
        res.socket?.destroy();
        return;
      }
      res.writeHead(200, { "content-type": "application/json" });
      res.end("{}");
    });
    const { delays, sleep } = recordingSleep();

    const transport = new ResilientTransport({}, sleep);
    const res = await transport.execute("GET", `${server.baseUrl}/x`);

    expect(res.status).toBe(200);
    expect(requests).toBe(3);
    expect(delays).toEqual([5000, 15000]);

    await server.close();
  });

  it("turns a slow response into a timeout NetworkError", async () => {
    const server = await startServer((_req, res) => {
      setTimeout(() => {
        res.writeHead(200, { "content-type": "application/json" });
        res.end("{}");
      }, 200);
    });
    const { sleep } = recordingSleep();

    const transport = new ResilientTransport(
      { timeoutMs: 20, statusPolicy: { maxAttempts: 1, backoffScheduleSeconds: [] } },
      sleep
    );
    const error = await transport.execute("GET", `${server.baseUrl}/slow`).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(NetworkError);
    if (error instanceof NetworkError) {
      expect(error.isTimeout).toBe(true);
      expect(error.message).toBe(`GET ${server.baseUrl}/slow timed out after 20ms`);
    }

    await server.close();
  });

  it("reports cancellation instead of a network failure", async () => {
    const server = await startServer((_req, res) => {
      res.writeHead(200);
      res.end();
    });
    const controller = new AbortController();
    controller.abort();

    const transport = new ResilientTransport({}, recordingSleep().sleep);

    await expect(
      transport.execute("GET", `${server.baseUrl}/x`, { signal: controller.signal })
    ).rejects.toBeInstanceOf(OperationCancelledError);

    await server.close();
  });

  it("leaves no abort listener on the caller's signal once calls settle", async () => {
    let calls = 0;
    const { fetchFn } = createFakeFetch(() => {
      calls += 1;
      return calls % 5 === 0 ? jsonResponse({ errors: [] }, 404) : jsonResponse({});
    });
    const controller = new AbortController();
    const transport = new ResilientTransport({}, recordingSleep().sleep, fetchFn);

    for (let i = 0; i < 20; i += 1) {
      await transport.execute("GET", "https://sp-api.test/reports/2021-06-30/reports/R1", { signal: controller.signal })
        .catch((err: unknown) => err);
    }

    expect(calls).toBe(20);
    expect(getEventListeners(controller.signal, "abort")).toHaveLength(0);
  });

  it("still aborts an in-flight request when the caller cancels", async () => {
    const controller = new AbortController();
    const fetchFn: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
        controller.abort();
      });
    const transport = new ResilientTransport({}, recordingSleep().sleep, fetchFn);

    await expect(
      transport.execute("GET", "https://sp-api.test/reports/2021-06-30/reports/R1", { signal: controller.signal })
    ).rejects.toBeInstanceOf(OperationCancelledError);
    expect(getEventListeners(controller.signal, "abort")).toHaveLength(0);
  });

  it("serializes query values and drops undefined ones", async () => {
    let receivedUrl = "";
    const server = await startServer((req, res) => {
      receivedUrl = req.url ?? "";
      res.writeHead(200, { "content-type": "application/json" });
      res.end("{}");
    });

    const transport = new ResilientTransport({}, recordingSleep().sleep);
    await transport.execute("GET", `${server.baseUrl}/orders/v0/orders`, {
      query: { MarketplaceIds: ["A1", "A2"], LastUpdatedAfter: "2024-09-14T00:00:00.000Z", NextToken: undefined }
    });

    const parsed = new URL(receivedUrl, server.baseUrl);
    expect(parsed.pathname).toBe("/orders/v0/orders");
    expect(parsed.searchParams.get("MarketplaceIds")).toBe("A1,A2");
    expect(parsed.searchParams.get("LastUpdatedAfter")).toBe("2024-09-14T00:00:00.000Z");
    expect(parsed.searchParams.has("NextToken")).toBe(false);

    await server.close();
  });
});

describe("ResilientTransport sanitized logging", () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it("logs retry metadata without query strings or response bodies", async () => {
    let requests = 0;
    const secretBody = "super-secret-http-body";
    const server = await startServer((_req, res) => {
      requests += 1;
      if (requests === 1) {
        res.writeHead(500, { "content-type": "text/plain" });
        res.end(secretBody);
        return;
      }
      res.writeHead(200, { "content-type": "application/json" });
      res.end("{}");
    });

    const transport = new ResilientTransport({}, recordingSleep().sleep);
    await transport.execute("GET", `${server.baseUrl}/download/R1?X-Amz-Signature=test-secret`);

    expect(warnSpy).toHaveBeenCalledTimes(1);
    const retryLog = JSON.parse(String(warnSpy.mock.calls[0][0])) as Record<string, unknown>;
    expect(retryLog).toEqual({
      event: "http.retry",
      method: "GET",
      url: `${server.baseUrl}/download/R1`,
      kind: "server_error",
      status: 500,
      attempt: 1,
      maxAttempts: 4,
      delayMs: 60000
    });
    expect(JSON.stringify(retryLog)).not.toContain(secretBody);

    await server.close();
  });

  it("strips query and fragment from URLs", () => {
    expect(sanitizeUrl(new URL("https://example.test/doc/1?sig=test-secret#frag"))).toBe("https://example.test/doc/1");
  });
});
