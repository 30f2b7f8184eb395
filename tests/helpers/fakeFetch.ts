export type RecordedRequest = {
  method: string;
  url: URL;
  headers: Headers;
  body?: string;
};

export type FakeRoute = (request: RecordedRequest) => Response | Promise<Response>;

export const jsonResponse = (payload: unknown, status = 200): Response =>
  new Response(JSON.stringify(payload), { status, headers: { "content-type": "application/json" } });

/**
 * In-process stand-in for `fetch`: records every request and answers through `route`.
 */
export const createFakeFetch = (route: FakeRoute) => {
  const requests: RecordedRequest[] = [];

  const fetchFn: typeof fetch = async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    const request: RecordedRequest = {
      method: init?.method ?? "GET",
      url,
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? init.body : undefined
    };
    requests.push(request);
    return route(request);
  };

  return { fetchFn, requests };
};

export const noSleep = async (): Promise<void> => undefined;
