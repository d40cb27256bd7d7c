/**
 * Orchestrator
 * Runs one page worker per page and waits for all of them
 */

import { mkdir } from "fs/promises";
import { pageWorker } from "./page-worker";
import type { DownloadContext, PageResult, RunSummary } from "../types";

/**
 * Download every page in `1..config.pageCount`.
 *
 * Reads from context:
 * - config (pageCount, output, progress.expectedPerPage)
 *
 * Resolves only after every page worker is done.
 */
export async function run(ctx: DownloadContext): Promise<RunSummary> {
  const { config, progress, logger } = ctx;

  await mkdir(config.output, { recursive: true });

  progress.start(config.pageCount * config.progress.expectedPerPage);
  logger.debug(`Starting ${config.pageCount} page workers`);

  try {
    const workers: Promise<PageResult>[] = [];
    for (let page = 1; page <= config.pageCount; page++) {
      workers.push(pageWorker(ctx, page));
    }

    const pages = await Promise.all(workers);

    return {
      pages,
      downloaded: pages.reduce((sum, p) => sum + p.downloaded, 0),
      failed: pages.reduce((sum, p) => sum + p.failed, 0),
      failedPages: pages.filter((p) => !p.fetched).length,
    };
  } finally {
    progress.stop();
  }
}
