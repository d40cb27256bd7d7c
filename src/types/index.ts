/**
 * Central type exports
 */

// Configuration
export type {
  DownloaderConfig,
  PartialDownloaderConfig,
  ProgressConfig,
  HttpConfig,
  RetryConfig,
  LoggingConfig,
  LogLevel,
} from "./config";
export {
  DownloaderConfigSchema,
  PartialDownloaderConfigSchema,
} from "./config";

// Catalog
export type {
  House,
  Page,
  CompletionSignal,
  ProgressEvent,
  PageResult,
  RunSummary,
} from "./catalog";
export { HouseSchema, PageSchema } from "./catalog";

// Context
export type {
  DownloadContext,
  Issue,
  IssueType,
  ConfigIssue,
  PageIssue,
  AssetIssue,
  ConfigIssueReason,
  PageIssueReason,
  AssetIssueReason,
  DownloadStats,
} from "./context";

// Tracker
export { Tracker } from "../utils/tracker";
