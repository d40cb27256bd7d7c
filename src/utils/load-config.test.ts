import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { rm, writeFile } from "fs/promises";
import { join } from "path";
import { ZodError } from "zod";
import { loadConfig, loadDefaultConfig, mergeConfig } from "./load-config";
import { ConfigError } from "./errors";
import { makeTempDir } from "../testing/context";

describe("loadDefaultConfig", () => {
  it("loads the bundled defaults", async () => {
    const config = await loadDefaultConfig();

    expect(config.pageCount).toBe(10);
    expect(config.output).toBe("./out");
    expect(config.retry).toEqual({
      maxAttempts: null,
      backoff: "none",
      delay: 0,
      maxDelay: 30000,
    });
    expect(config.http.checkStatus).toBe(true);
  });
});

describe("mergeConfig", () => {
  it("overrides nested keys without dropping their siblings", async () => {
    const base = await loadDefaultConfig();

    const merged = mergeConfig(base, {
      pageCount: 2,
      retry: { maxAttempts: 4 },
      http: { timeout: 5000 },
    });

    expect(merged.pageCount).toBe(2);
    expect(merged.output).toBe(base.output);
    expect(merged.retry).toEqual({ ...base.retry, maxAttempts: 4 });
    expect(merged.http).toEqual({ timeout: 5000, checkStatus: true });
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("applies a custom config file over the defaults", async () => {
    const custom = join(dir, "custom.json");
    await writeFile(
      custom,
      JSON.stringify({ pageCount: 3, retry: { backoff: "exponential", delay: 100 } }),
    );

    const { config, errors } = await loadConfig(custom);

    expect(errors).toEqual([]);
    expect(config.pageCount).toBe(3);
    expect(config.retry.backoff).toBe("exponential");
    expect(config.retry.delay).toBe(100);
    expect(config.retry.maxAttempts).toBeNull();
  });

  it("reports an invalid custom file and keeps the previous layers", async () => {
    const custom = join(dir, "custom.json");
    await writeFile(custom, JSON.stringify({ pageCount: -1 }));

    const { config, errors } = await loadConfig(custom);

    expect(config.pageCount).toBe(10);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(ConfigError);
    expect(errors[0].path).toBe(custom);
    expect(errors[0].cause).toBeInstanceOf(ZodError);
  });

  it("reports a file that is not JSON", async () => {
    const custom = join(dir, "custom.json");
    await writeFile(custom, "pageCount = 3");

    const { errors } = await loadConfig(custom);

    expect(errors[0].cause).toBeInstanceOf(SyntaxError);
  });
});
