/**
 * Download command - Loads config and runs the download
 */

import ora from "ora";
import { z } from "zod";
import {
  ConfigError,
  Logger,
  ProgressAggregator,
  Tracker,
  consoleSink,
  loadConfig,
  type LogSink,
  type ProgressRenderer,
} from "../../utils";
import * as modules from "../../modules";
import type { DownloadContext, DownloaderConfig } from "../../types";

export const DownloadOptionsSchema = z.object({
  pageCount: z.coerce.number().int().nonnegative().optional(),
  output: z.string().min(1).optional(),
  downloadPath: z.string().min(1).optional(),
  config: z.string().optional(),
  endpoint: z.string().url().optional(),
  maxAttempts: z.coerce.number().int().positive().optional(),
  retryDelay: z.coerce.number().int().nonnegative().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof DownloadOptionsSchema>;
type ParsedOptions = z.infer<typeof DownloadOptionsSchema>;

/**
 * Override config values with CLI options
 */
export function applyOptions(
  config: DownloaderConfig,
  options: ParsedOptions,
): DownloaderConfig {
  const retryDelay = options.retryDelay;

  return {
    ...config,
    pageCount: options.pageCount ?? config.pageCount,
    output: options.output ?? options.downloadPath ?? config.output,
    endpoint: options.endpoint ?? config.endpoint,
    retry: {
      ...config.retry,
      maxAttempts: options.maxAttempts ?? config.retry.maxAttempts,
      ...(retryDelay === undefined
        ? {}
        : {
            backoff: retryDelay > 0 ? ("fixed" as const) : ("none" as const),
            delay: retryDelay,
          }),
    },
    logging: options.verbose ? { level: "debug" } : config.logging,
  };
}

interface Spinner {
  readonly isSpinning: boolean;
  clear(): unknown;
  render(): unknown;
}

/**
 * Print log lines above a running spinner: clear its line, print, redraw
 */
export function createSpinnerSink(
  spinner: Spinner,
  print: LogSink = consoleSink,
): LogSink {
  return (level, line) => {
    if (!spinner.isSpinning) {
      print(level, line);
      return;
    }
    spinner.clear();
    print(level, line);
    spinner.render();
  };
}

export async function downloadCommand(opts: Options): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI options
    const parsed = DownloadOptionsSchema.safeParse(opts);
    if (!parsed.success) {
      throw new ConfigError("command line", "Invalid options", {
        cause: parsed.error,
      });
    }
    const options = parsed.data;

    // Load configuration (default → user → custom)
    const { config: loaded, errors } = await loadConfig(options.config);
    const config = applyOptions(loaded, options);

    const tracker = new Tracker();
    const logger = new Logger(
      config.logging.level,
      createSpinnerSink(spinner),
    );

    // Add any config loading errors to tracker
    for (const err of errors) {
      tracker.trackConfigError(err.path, err);
      logger.warn(`${err.message}, ignoring it`);
    }

    const renderer: ProgressRenderer = {
      start: (text) => {
        spinner.text = text;
      },
      update: (text) => {
        spinner.text = text;
      },
      stop: (text) => {
        spinner.succeed(text);
      },
    };

    const ctx: DownloadContext = {
      config,
      tracker,
      logger,
      progress: new ProgressAggregator(renderer),
      verbose: options.verbose,
    };

    const summary = await modules.run(ctx);

    modules.stats(ctx, summary);

    if (summary.failed > 0 || summary.failedPages > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.fail("Download failed");
    if (error instanceof ConfigError && error.cause instanceof z.ZodError) {
      for (const issue of error.cause.issues) {
        console.error(`  ${issue.path.join(".")}: ${issue.message}`);
      }
    } else {
      console.error(error);
    }
    process.exit(1);
  }
}
