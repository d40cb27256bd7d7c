/**
 * Logger Utility
 * Handles console output with different log levels
 */

import type { LogLevel } from "../types";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Where formatted lines go. The CLI swaps this for one that keeps the
 * spinner intact.
 */
export type LogSink = (level: LogLevel, line: string) => void;

export const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export class Logger {
  constructor(
    private level: LogLevel = "info",
    private sink: LogSink = consoleSink,
  ) {}

  private enabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      this.sink("debug", `[DEBUG] ${message}`);
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      this.sink("info", `[INFO] ${message}`);
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      this.sink("warn", `[WARN] ${message}`);
    }
  }

  error(message: string, error?: unknown): void {
    this.sink("error", `[ERROR] ${message}`);
    if (error) {
      this.sink(
        "error",
        error instanceof Error ? (error.stack ?? error.message) : String(error),
      );
    }
  }
}
