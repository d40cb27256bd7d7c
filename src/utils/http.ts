/**
 * HTTP Utilities
 * Shared request options for the catalog client and asset fetcher
 */

import type { HttpConfig } from "../types";

export type FetchFn = typeof fetch;

export interface HttpOptions {
  /** Injected fetch implementation (defaults to the global fetch) */
  fetch?: FetchFn;
  /** Per-request timeout in milliseconds; 0 or undefined disables it */
  timeout?: number;
  /** Treat non-2xx responses as errors */
  checkStatus?: boolean;
}

/**
 * Run a request with an abort signal that fires after `timeout` ms.
 * The timer covers reading the body as well as the headers.
 */
export async function withTimeout<T>(
  timeout: number | undefined,
  run: (signal: AbortSignal | undefined) => Promise<T>,
): Promise<T> {
  if (!timeout) {
    return run(undefined);
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    return await run(controller.signal);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Request options for a run, from the `http` config section
 */
export function createHttpOptions(
  config: HttpConfig,
  fetchFn?: FetchFn,
): HttpOptions {
  return {
    fetch: fetchFn,
    timeout: config.timeout,
    checkStatus: config.checkStatus,
  };
}
