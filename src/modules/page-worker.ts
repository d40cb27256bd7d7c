/**
 * Page Worker
 * Fetches one listing page, runs a download worker per house and
 * collects their completion signals.
 *
 * States: fetching -> dispatching -> collecting -> done
 */

import { downloadWorker } from "./download-worker";
import {
  createHttpOptions,
  createRetryOptions,
  describeError,
  fetchPage,
  retry,
  RetryExhaustedError,
  SignalQueue,
} from "../utils";
import type {
  CompletionSignal,
  DownloadContext,
  House,
  PageResult,
} from "../types";

export async function pageWorker(
  ctx: DownloadContext,
  page: number,
): Promise<PageResult> {
  const { config, tracker, logger, progress } = ctx;

  // fetching
  logger.debug(`Page ${page}: fetching`);
  let houses: readonly House[];
  try {
    const result = await retry(
      () =>
        fetchPage(page, {
          ...createHttpOptions(config.http, ctx.fetch),
          endpoint: config.endpoint,
        }),
      createRetryOptions(config.retry, (error, attempt) => {
        tracker.incrementFailedAttempts();
        logger.debug(
          `Page ${page}: attempt ${attempt} failed: ${describeError(error)}`,
        );
      }),
    );
    houses = result.houses;
  } catch (error) {
    if (!(error instanceof RetryExhaustedError)) throw error;

    tracker.trackPageError(page, error);
    logger.warn(`Page ${page}: ${error.message}`);
    return { page, fetched: false, total: 0, downloaded: 0, failed: 0 };
  }
  tracker.incrementPagesFetched();

  // dispatching
  const total = houses.length;
  logger.debug(`Page ${page}: dispatching ${total} downloads`);
  const queue = new SignalQueue<CompletionSignal>(total);
  const workers = houses.map((house) =>
    downloadWorker(ctx, house, page, queue),
  );

  // collecting
  const collect = async (): Promise<PageResult> => {
    let downloaded = 0;
    let failed = 0;

    for (let i = 0; i < total; i++) {
      const signal = await queue.receive();
      if (signal.status === "downloaded") {
        downloaded++;
        progress.report({ page, total, current: downloaded });
      } else {
        failed++;
      }
    }

    return { page, fetched: true, total, downloaded, failed };
  };

  // A worker that throws rejects the page instead of leaving it waiting
  const [result] = await Promise.all([collect(), Promise.all(workers)]);

  // done
  logger.debug(
    `Page ${page}: done (${result.downloaded}/${total} downloaded)`,
  );
  return result;
}
