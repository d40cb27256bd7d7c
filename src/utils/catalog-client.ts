/**
 * Fetch one page of the house listing
 */

import { ZodError } from "zod";
import { FetchError, describeError } from "./errors";
import { withTimeout, type HttpOptions } from "./http";
import { PageSchema, type Page } from "../types";

export interface CatalogOptions extends HttpOptions {
  endpoint: string;
}

/**
 * Build the listing URL for a page, keeping any query already on the endpoint
 */
export function buildPageUrl(endpoint: string, pageNumber: number): string {
  const url = new URL(endpoint);
  url.searchParams.set("page", String(pageNumber));
  return url.toString();
}

/**
 * Fetch and decode a listing page. Single attempt; callers retry.
 */
export async function fetchPage(
  pageNumber: number,
  options: CatalogOptions,
): Promise<Page> {
  const fetchFn = options.fetch ?? fetch;
  const url = buildPageUrl(options.endpoint, pageNumber);

  return withTimeout(options.timeout, async (signal) => {
    let response: Response;
    try {
      response = await fetchFn(url, { signal });
    } catch (error) {
      throw new FetchError(
        "transport",
        pageNumber,
        `Request for page ${pageNumber} failed: ${describeError(error)}`,
        { cause: error },
      );
    }

    if (response.status !== 200) {
      throw new FetchError(
        "bad-status",
        pageNumber,
        `HTTP ${response.status} fetching page ${pageNumber}`,
        { status: response.status },
      );
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw new FetchError(
        "transport",
        pageNumber,
        `Reading page ${pageNumber} failed: ${describeError(error)}`,
        { cause: error },
      );
    }

    try {
      return PageSchema.parse(JSON.parse(body));
    } catch (error) {
      const details =
        error instanceof ZodError
          ? error.issues.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ")
          : describeError(error);
      throw new FetchError(
        "malformed",
        pageNumber,
        `Page ${pageNumber} has an unexpected body: ${details}`,
        { cause: error },
      );
    }
  });
}
