/**
 * Download Worker
 * Fetches one house's photo and reports back to its page worker
 */

import { join } from "node:path";
import {
  buildAssetFilename,
  createHttpOptions,
  createRetryOptions,
  describeError,
  downloadAsset,
  probeExtension,
  retry,
  RetryExhaustedError,
  type SignalQueue,
} from "../utils";
import type { CompletionSignal, DownloadContext, House } from "../types";

/**
 * Probe, name, download and signal. The probe and download are retried
 * together, so a failed download probes the content type again.
 *
 * Sends exactly one signal on `queue`: "downloaded" once the file is
 * written, or "failed" when a bounded retry policy gives up.
 */
export async function downloadWorker(
  ctx: DownloadContext,
  house: House,
  page: number,
  queue: SignalQueue<CompletionSignal>,
): Promise<void> {
  const { config, tracker, logger } = ctx;
  const http = createHttpOptions(config.http, ctx.fetch);

  const retryOptions = createRetryOptions(config.retry, (error, attempt) => {
    tracker.incrementFailedAttempts();
    logger.debug(
      `Page ${page}, house ${house.id}: attempt ${attempt} failed: ${describeError(error)}`,
    );
  });

  try {
    const { path, bytes } = await retry(async () => {
      const extension = await probeExtension(house.photoURL, http);
      const path = join(config.output, buildAssetFilename(house, extension));
      const bytes = await downloadAsset(house.photoURL, path, http);
      return { path, bytes };
    }, retryOptions);

    tracker.trackDownloaded(bytes);
    logger.debug(`Saved ${path} (${bytes} bytes)`);
    queue.send({ status: "downloaded", path });
  } catch (error) {
    if (!(error instanceof RetryExhaustedError)) throw error;

    tracker.trackAssetError(page, house.photoURL, error);
    logger.warn(`Page ${page}, house ${house.id}: ${error.message}`);
    queue.send({ status: "failed" });
  }
}
