/**
 * Error types raised by the network and filesystem operations.
 * Each error carries a typed reason so the tracker can report it.
 */

export type FetchErrorReason = "bad-status" | "malformed" | "transport";
export type ProbeErrorReason = "transport" | "missing-header";
export type DownloadErrorReason = "transport" | "bad-status" | "io-write";

export class DownloaderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Listing page could not be fetched or decoded
 */
export class FetchError extends DownloaderError {
  readonly status?: number;

  constructor(
    readonly reason: FetchErrorReason,
    readonly page: number,
    message: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super(message, options);
    this.status = options?.status;
  }
}

/**
 * Content type of an asset could not be determined
 */
export class ProbeError extends DownloaderError {
  constructor(
    readonly reason: ProbeErrorReason,
    readonly url: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * Asset could not be fetched or written to disk
 */
export class DownloadError extends DownloaderError {
  constructor(
    readonly reason: DownloadErrorReason,
    readonly url: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class RetryExhaustedError extends DownloaderError {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(
      `Gave up after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${describeError(lastError)}`,
      { cause: lastError },
    );
  }
}

/**
 * Invalid configuration file or command-line option
 */
export class ConfigError extends DownloaderError {
  constructor(
    readonly path: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
