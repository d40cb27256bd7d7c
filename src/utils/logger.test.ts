import { describe, it, expect, vi } from "vitest";
import { Logger, type LogSink } from "./logger";

describe("Logger", () => {
  it("sends enabled levels to the sink with a level prefix", () => {
    const sink = vi.fn<LogSink>();
    const logger = new Logger("info", sink);

    logger.debug("hidden");
    logger.info("Starting");
    logger.warn("Page 2: slow");

    expect(sink.mock.calls).toEqual([
      ["info", "[INFO] Starting"],
      ["warn", "[WARN] Page 2: slow"],
    ]);
  });

  it("always writes errors, followed by the cause", () => {
    const sink = vi.fn<LogSink>();
    const logger = new Logger("error", sink);

    logger.warn("hidden");
    logger.error("Run failed", "disk full");

    expect(sink.mock.calls).toEqual([
      ["error", "[ERROR] Run failed"],
      ["error", "disk full"],
    ]);
  });
});
