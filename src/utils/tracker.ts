/**
 * Download Tracker
 * Unified tracking for run stats and issues
 */

import { ZodError } from "zod";
import {
  ConfigError,
  DownloadError,
  FetchError,
  ProbeError,
  RetryExhaustedError,
  describeError,
  type DownloadErrorReason,
  type FetchErrorReason,
  type ProbeErrorReason,
} from "./errors";

// ============================================================================
// Types
// ============================================================================

export type ConfigIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";
export type PageIssueReason = FetchErrorReason | "unknown";
export type AssetIssueReason =
  | ProbeErrorReason
  | DownloadErrorReason
  | "unknown";

// Discriminated union - each type has its own subset of reasons
export interface ConfigIssue {
  type: "config";
  path: string;
  reason: ConfigIssueReason;
  details: string;
}

export interface PageIssue {
  type: "page";
  page: number;
  reason: PageIssueReason;
  details: string;
}

export interface AssetIssue {
  type: "asset";
  page: number;
  url: string;
  reason: AssetIssueReason;
  details: string;
}

export type Issue = ConfigIssue | PageIssue | AssetIssue;
export type IssueType = Issue["type"];

export interface DownloadStats {
  pagesFetched: number;
  downloadedAssets: number;
  failedAssets: number;
  bytesWritten: number;
  failedAttempts: number;
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

// Bounded retries wrap the last failure; report that one
function unwrap(error: unknown): unknown {
  return error instanceof RetryExhaustedError ? error.lastError : error;
}

function mapConfigError(error: unknown): IssueInfo<ConfigIssueReason> {
  const cause = error instanceof ConfigError ? error.cause : error;

  if (cause instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: cause.issues
        .map((e) => `${e.path.join(".")}: ${e.message}`)
        .join("; "),
    };
  }
  if (cause instanceof SyntaxError) {
    return { reason: "invalid-json", details: cause.message };
  }
  return { reason: "read-error", details: describeError(error) };
}

function mapPageError(error: unknown): IssueInfo<PageIssueReason> {
  const cause = unwrap(error);
  if (cause instanceof FetchError) {
    return { reason: cause.reason, details: cause.message };
  }
  return { reason: "unknown", details: describeError(cause) };
}

function mapAssetError(error: unknown): IssueInfo<AssetIssueReason> {
  const cause = unwrap(error);
  if (cause instanceof ProbeError || cause instanceof DownloadError) {
    return { reason: cause.reason, details: cause.message };
  }
  return { reason: "unknown", details: describeError(cause) };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private pagesFetched = 0;
  private downloadedAssets = 0;
  private failedAssets = 0;
  private bytesWritten = 0;
  private failedAttempts = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  incrementPagesFetched(): void {
    this.pagesFetched++;
  }

  trackDownloaded(bytes: number): void {
    this.downloadedAssets++;
    this.bytesWritten += bytes;
  }

  incrementFailedAttempts(): void {
    this.failedAttempts++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackConfigError(path: string, error: unknown): void {
    const { reason, details } = mapConfigError(error);
    this.issues.push({ type: "config", path, reason, details });
  }

  trackPageError(page: number, error: unknown): void {
    const { reason, details } = mapPageError(error);
    this.issues.push({ type: "page", page, reason, details });
  }

  trackAssetError(page: number, url: string, error: unknown): void {
    this.failedAssets++;
    const { reason, details } = mapAssetError(error);
    this.issues.push({ type: "asset", page, url, reason, details });
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues<T extends IssueType>(type: T): Extract<Issue, { type: T }>[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): DownloadStats {
    const duration = new Date().getTime() - this.startTime.getTime();

    return {
      pagesFetched: this.pagesFetched,
      downloadedAssets: this.downloadedAssets,
      failedAssets: this.failedAssets,
      bytesWritten: this.bytesWritten,
      failedAttempts: this.failedAttempts,
      issues: this.issues,
      duration,
    };
  }
}
