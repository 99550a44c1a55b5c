/**
 * Global fetch stand-in answering by URL path
 */

import { vi } from "vitest";

export interface FetchStub {
  urls: string[];
  headers: Record<string, string>[];
}

function isStatus(value: unknown): value is { status: number; statusText?: string } {
  return (
    value !== null &&
    typeof value === "object" &&
    "status" in value &&
    typeof value.status === "number" &&
    Object.keys(value).every((key) => key === "status" || key === "statusText")
  );
}

/**
 * Install a fetch that serves JSON bodies from `routes`, keyed by pathname.
 * An Error rejects the request; `{ status }` answers with an empty body.
 */
export function stubFetchRoutes(routes: Record<string, unknown>): FetchStub {
  const stub: FetchStub = { urls: [], headers: [] };

  vi.stubGlobal(
    "fetch",
    vi.fn(async (input: string, init?: RequestInit) => {
      stub.urls.push(input);
      const headers = init?.headers;
      stub.headers.push(
        headers !== undefined && !Array.isArray(headers) && !(headers instanceof Headers)
          ? headers
          : {}
      );

      const route = routes[new URL(input).pathname];
      if (route instanceof Error) {
        throw route;
      }
      if (route === undefined) {
        return new Response("", { status: 404, statusText: "Not Found" });
      }
      if (isStatus(route)) {
        return new Response("", route);
      }
      return new Response(JSON.stringify(route), { status: 200 });
    })
  );

  return stub;
}
