/**
 * Download context - flows through the orchestrator and workers.
 * Everything a worker needs is passed here; nothing is read from globals.
 */

import type { DownloaderConfig } from "./config";
import type { FetchFn } from "../utils/http";
import type { Logger } from "../utils/logger";
import type { ProgressAggregator } from "../utils/progress";
import type { Tracker } from "../utils/tracker";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  ConfigIssue,
  PageIssue,
  AssetIssue,
  ConfigIssueReason,
  PageIssueReason,
  AssetIssueReason,
  DownloadStats,
} from "../utils/tracker";

export interface DownloadContext {
  config: DownloaderConfig;
  tracker: Tracker;
  logger: Logger;
  progress: ProgressAggregator;

  // Defaults to the global fetch
  fetch?: FetchFn;
  verbose?: boolean;
}
