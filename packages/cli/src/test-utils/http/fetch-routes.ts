// pattern: Test

import { type Mock, vi } from "vitest";

type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export type RouteHandler = (init?: RequestInit) => Response | Promise<Response>;

export function jsonResponse(body: unknown, status = 200): RouteHandler {
  return () =>
    new Response(JSON.stringify(body), {
      status,
      headers: { "Content-Type": "application/json" },
    });
}

export function textResponse(body: string, status = 200): RouteHandler {
  return () => new Response(body, { status });
}

export function statusResponse(status: number): RouteHandler {
  return () => new Response(null, { status });
}

/**
 * Never settles until the request's signal aborts
 */
export function hangingResponse(): RouteHandler {
  return init =>
    new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener("abort", () => {
        reject(new DOMException("This operation was aborted", "AbortError"));
      });
    });
}

function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

/**
 * Install a fetch stub answering from an exact-URL route table.
 * Unknown URLs answer 404.
 */
export function stubFetchRoutes(
  routes: Record<string, RouteHandler>
): Mock<FetchFn> {
  const mockFetch = vi.fn<FetchFn>(async (input, init) => {
    const handler = routes[requestUrl(input)];
    return handler ? handler(init) : new Response("Not Found", { status: 404 });
  });
  vi.stubGlobal("fetch", mockFetch);
  return mockFetch;
}
