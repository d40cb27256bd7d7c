/**
 * Asset Fetcher
 * Probes an asset's content type and downloads it to disk
 */

import { writeFile } from "fs/promises";
import { DownloadError, ProbeError, describeError } from "./errors";
import { withTimeout, type HttpOptions } from "./http";

// Subtypes end up in filenames: no separators or ".." segments
const SAFE_SUBTYPE = /^\w[\w.+-]*$/;

/**
 * Map a Content-Type header value to a file extension.
 * Returns null when the header carries no usable type.
 *
 * @example extensionFromContentType("image/jpeg") // "jpg"
 */
export function extensionFromContentType(
  contentType: string | null,
): string | null {
  if (contentType === null) return null;

  // Drop parameters such as "; charset=binary"
  const mimeType = contentType.split(";")[0].trim().toLowerCase();
  const subtype = mimeType.slice(mimeType.indexOf("/") + 1);

  if (!SAFE_SUBTYPE.test(subtype) || subtype.includes("..")) return null;
  return subtype === "jpeg" ? "jpg" : subtype;
}

/**
 * Resolve the file extension of an asset with a HEAD request.
 * The response status is not checked: hosts that refuse HEAD often still
 * send the content type.
 */
export async function probeExtension(
  url: string,
  options: HttpOptions = {},
): Promise<string> {
  const fetchFn = options.fetch ?? fetch;

  return withTimeout(options.timeout, async (signal) => {
    let response: Response;
    try {
      response = await fetchFn(url, { method: "HEAD", signal });
    } catch (error) {
      throw new ProbeError(
        "transport",
        url,
        `HEAD ${url} failed: ${describeError(error)}`,
        { cause: error },
      );
    }

    const extension = extensionFromContentType(
      response.headers.get("content-type"),
    );
    if (extension === null) {
      throw new ProbeError("missing-header", url, `No usable content type for ${url}`);
    }

    return extension;
  });
}

/**
 * Download an asset, creating or overwriting `destinationPath`.
 * Returns the number of bytes written.
 */
export async function downloadAsset(
  url: string,
  destinationPath: string,
  options: HttpOptions = {},
): Promise<number> {
  const fetchFn = options.fetch ?? fetch;

  return withTimeout(options.timeout, async (signal) => {
    let buffer: Buffer;
    try {
      const response = await fetchFn(url, { signal });

      if (options.checkStatus && !response.ok) {
        throw new DownloadError(
          "bad-status",
          url,
          `HTTP ${response.status}: GET ${url}`,
        );
      }

      buffer = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      if (error instanceof DownloadError) throw error;
      throw new DownloadError(
        "transport",
        url,
        `GET ${url} failed: ${describeError(error)}`,
        { cause: error },
      );
    }

    try {
      // "w" truncates an existing file, so reruns replace rather than append
      await writeFile(destinationPath, buffer, { flag: "w" });
    } catch (error) {
      throw new DownloadError(
        "io-write",
        url,
        `Writing ${destinationPath} failed: ${describeError(error)}`,
        { cause: error },
      );
    }

    return buffer.byteLength;
  });
}
