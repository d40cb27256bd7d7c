import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import { ConfigError } from "./errors";
import type { DownloaderConfig, PartialDownloaderConfig } from "../types";
import {
  DownloaderConfigSchema,
  PartialDownloaderConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Linux: $XDG_CONFIG_HOME/catalog-dl, macOS: ~/Library/Preferences/catalog-dl
const paths = envPaths("catalog-dl", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<DownloaderConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return DownloaderConfigSchema.parse(JSON.parse(content));
}

async function loadPartialConfig(
  configPath: string,
): Promise<PartialDownloaderConfig> {
  try {
    const content = await readFile(configPath, "utf-8");
    return PartialDownloaderConfigSchema.parse(JSON.parse(content));
  } catch (error) {
    throw new ConfigError(configPath, `Invalid config file ${configPath}`, {
      cause: error,
    });
  }
}

export function mergeConfig(
  base: DownloaderConfig,
  override: PartialDownloaderConfig,
): DownloaderConfig {
  return {
    endpoint: override.endpoint ?? base.endpoint,
    pageCount: override.pageCount ?? base.pageCount,
    output: override.output ?? base.output,
    progress: { ...base.progress, ...override.progress },
    http: { ...base.http, ...override.http },
    retry: { ...base.retry, ...override.retry },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: DownloaderConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      errors.push(error);
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      errors.push(error);
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
