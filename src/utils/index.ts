/**
 * Utility exports
 */

// Network utilities
export { fetchPage, buildPageUrl } from "./catalog-client";
export type { CatalogOptions } from "./catalog-client";
export {
  probeExtension,
  downloadAsset,
  extensionFromContentType,
} from "./asset-fetcher";
export { createHttpOptions, withTimeout } from "./http";
export type { FetchFn, HttpOptions } from "./http";

// Retry
export { retry, retryForever, createRetryOptions } from "./retry";
export type { RetryOptions } from "./retry";

// Errors
export {
  DownloaderError,
  FetchError,
  ProbeError,
  DownloadError,
  RetryExhaustedError,
  ConfigError,
  describeError,
} from "./errors";

// Path/filename utilities
export { buildAssetFilename } from "./filename";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";

// Classes
export { SignalQueue } from "./signal-queue";
export { ProgressAggregator } from "./progress";
export type { ProgressRenderer } from "./progress";
export { Logger, consoleSink } from "./logger";
export type { LogSink } from "./logger";
export { Tracker } from "./tracker";
