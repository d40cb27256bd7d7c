import { describe, it, expect, vi } from "vitest";
import { ProgressAggregator, type ProgressRenderer } from "./progress";

function createRenderer() {
  return {
    start: vi.fn<ProgressRenderer["start"]>(),
    update: vi.fn<ProgressRenderer["update"]>(),
    stop: vi.fn<ProgressRenderer["stop"]>(),
  };
}

describe("ProgressAggregator", () => {
  it("renders the running count against the expected total", () => {
    const renderer = createRenderer();
    const progress = new ProgressAggregator(renderer);

    progress.start(20);
    progress.report({ page: 1, total: 10, current: 1 });
    progress.report({ page: 2, total: 10, current: 1 });
    progress.stop();

    expect(renderer.start).toHaveBeenCalledWith("Downloading images... 0/20");
    expect(renderer.update.mock.calls).toEqual([
      ["Downloading images... 1/20 (page 1: 1/10)"],
      ["Downloading images... 2/20 (page 2: 1/10)"],
    ]);
    expect(renderer.stop).toHaveBeenCalledWith("Downloaded 2 images");
    expect(progress.total).toBe(2);
  });

  it("counts events without a renderer", () => {
    const progress = new ProgressAggregator();

    progress.start(10);
    progress.report({ page: 3, total: 2, current: 1 });
    progress.report({ page: 3, total: 2, current: 2 });

    expect(progress.total).toBe(2);
  });

  it("stops only once", () => {
    const renderer = createRenderer();
    const progress = new ProgressAggregator(renderer);

    progress.start(1);
    progress.report({ page: 1, total: 1, current: 1 });
    progress.stop();
    progress.stop();

    expect(renderer.stop).toHaveBeenCalledTimes(1);
    expect(renderer.stop).toHaveBeenCalledWith("Downloaded 1 image");
  });
});
