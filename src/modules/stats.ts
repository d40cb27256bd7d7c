/**
 * Stats Module
 * Displays run statistics and issues
 */

import chalk from "chalk";
import type {
  DownloadContext,
  DownloadStats,
  RunSummary,
  Tracker,
} from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  const kb = bytes / 1024;
  if (kb < 1024) return `${kb.toFixed(1)} KB`;
  return `${(kb / 1024).toFixed(1)} MB`;
}

function progressBar(
  current: number,
  total: number,
  width: number = 24,
): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = Math.min(current / total, 1);
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  const filledBar = chalk.green("━".repeat(filled));
  const emptyBar = chalk.dim("━".repeat(empty));

  return `${filledBar}${emptyBar} ${chalk.dim(percentText)}`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Display run statistics to the console
 */
export function stats(ctx: DownloadContext, summary: RunSummary): void {
  const { tracker, verbose } = ctx;
  const stats = tracker.getStats();
  const hasErrors = summary.failed > 0 || summary.failedPages > 0;
  const hasWarnings = stats.issues.length > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold("Download Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayImagesSection(summary, stats);
  displayIssuesSection(tracker, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayImagesSection(summary: RunSummary, stats: DownloadStats): void {
  console.log(sectionHeader("Images"));

  const dispatched = summary.pages.reduce((sum, p) => sum + p.total, 0);
  console.log(`   ${progressBar(summary.downloaded, dispatched)}`);

  console.log(
    statRow(chalk.green("◉"), "Downloaded", summary.downloaded, chalk.green),
  );
  console.log(
    statRow(chalk.cyan("◉"), "Written", formatBytes(stats.bytesWritten), chalk.cyan),
  );
  console.log(
    statRow(
      chalk.cyan("◉"),
      "Pages",
      `${stats.pagesFetched}/${summary.pages.length}`,
      chalk.cyan,
    ),
  );

  if (stats.failedAttempts > 0) {
    console.log(
      statRow(
        chalk.yellow("◉"),
        "Retried attempts",
        stats.failedAttempts,
        chalk.yellow,
      ),
    );
  }

  if (summary.failed > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", summary.failed, chalk.red));
  }
}

function displayIssuesSection(tracker: Tracker, verbose?: boolean): void {
  const configIssues = tracker.getIssues("config");
  const pageIssues = tracker.getIssues("page");
  const assetIssues = tracker.getIssues("asset");

  if (
    configIssues.length === 0 &&
    pageIssues.length === 0 &&
    assetIssues.length === 0
  ) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  if (configIssues.length > 0) {
    console.log(
      statRow(chalk.yellow("✖"), "Config failed", configIssues.length, chalk.yellow),
    );
    for (const issue of configIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      console.log(`        ${chalk.dim(issue.details)}`);
    }
  }

  if (pageIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Pages failed", pageIssues.length, chalk.red),
    );
    for (const issue of pageIssues) {
      console.log(`      ${chalk.dim("·")} page ${issue.page} (${issue.reason})`);
      if (verbose) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }

  if (assetIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Images failed", assetIssues.length, chalk.red),
    );
    const shown = verbose ? assetIssues : assetIssues.slice(0, 5);
    for (const issue of shown) {
      console.log(`      ${chalk.dim("·")} ${issue.url} (${issue.reason})`);
    }
    if (shown.length < assetIssues.length) {
      console.log(
        `      ${chalk.dim(`  +${assetIssues.length - shown.length} more`)}`,
      );
    }
  }
}
