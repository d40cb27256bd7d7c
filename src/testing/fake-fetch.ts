/**
 * In-process stand-in for fetch, routing requests by method and URL
 */

import { vi } from "vitest";
import type { FetchFn } from "../utils";

export type RouteHandler = (
  init: RequestInit | undefined,
) => Response | Promise<Response>;

function requestUrl(input: Parameters<FetchFn>[0]): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

/**
 * Routes are keyed "METHOD url", e.g. "HEAD http://photos.test/1.png".
 * Unknown routes reject the way fetch does on a network failure.
 */
export function createFakeFetch(routes: Record<string, RouteHandler>) {
  return vi.fn<FetchFn>(async (input, init) => {
    const method = init?.method ?? "GET";
    const key = `${method} ${requestUrl(input)}`;
    const handler = routes[key];
    if (!handler) {
      throw new TypeError(`fetch failed: no route for ${key}`);
    }
    return handler(init);
  });
}

/**
 * Count calls made to a route
 */
export function callsTo(
  fetchMock: ReturnType<typeof createFakeFetch>,
  method: string,
  url: string,
): number {
  return fetchMock.mock.calls.filter(
    ([input, init]) =>
      (init?.method ?? "GET") === method && requestUrl(input) === url,
  ).length;
}

export function imageHead(contentType: string): RouteHandler {
  return () => new Response(null, { headers: { "content-type": contentType } });
}

export function body(content: string, status = 200): RouteHandler {
  return () => new Response(content, { status });
}

export function json(value: unknown, status = 200): RouteHandler {
  return () => new Response(JSON.stringify(value), { status });
}
