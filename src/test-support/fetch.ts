// pattern: Imperative Shell

/**
 * Fetch stand-ins for tests. Each route answers requests whose URL contains its key.
 */

import { vi } from "vitest";

export type RecordedRequest = {
  readonly url: string;
  readonly init: RequestInit | undefined;
};

export type FetchRoute = (request: RecordedRequest) => Response | Promise<Response>;

export function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function htmlResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { "Content-Type": "text/html" } });
}

/**
 * Replace the global fetch. Unmatched URLs reject, so a test never reaches the network.
 */
export function stubFetch(routes: Record<string, FetchRoute>): Array<RecordedRequest> {
  const requests: Array<RecordedRequest> = [];

  vi.stubGlobal(
    "fetch",
    vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
      const request = { url: requestUrl(input), init };
      requests.push(request);
      for (const [key, route] of Object.entries(routes)) {
        if (request.url.includes(key)) {
          return route(request);
        }
      }
      throw new Error(`unexpected fetch: ${request.url}`);
    }),
  );

  return requests;
}
