#!/usr/bin/env node

/**
 * CLI entry point for the catalog image downloader
 * Handles command-line argument parsing
 */

import { Command } from "commander";
import { downloadCommand } from "./commands/download";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("catalog-dl")
  .description("Download every house photo from the paginated catalog")
  .version("0.1.0");

// Main download command (default action)
program
  .option("-p, --page-count <count>", "Number of pages to download")
  .option("-o, --output <path>", "Directory to save the images to")
  .option("-d, --download-path <path>", "Alias for --output")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--endpoint <url>", "Listing endpoint URL")
  .option("--max-attempts <count>", "Give up on a request after this many attempts")
  .option("--retry-delay <ms>", "Wait between attempts (fixed backoff)")
  .option("-v, --verbose", "Verbose output")
  .action(downloadCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
