/**
 * Progress Aggregator
 * Counts completed downloads from every page worker and renders a single
 * progress indicator. All updates go through `report`, one at a time.
 */

import type { ProgressEvent } from "../types";

export interface ProgressRenderer {
  start(text: string): void;
  update(text: string): void;
  stop(text: string): void;
}

export class ProgressAggregator {
  private count = 0;
  private expected = 0;
  private running = false;

  constructor(private readonly renderer?: ProgressRenderer) {}

  start(expected: number): void {
    this.count = 0;
    this.expected = expected;
    this.running = true;
    this.renderer?.start(this.text());
  }

  report(event: ProgressEvent): void {
    this.count++;
    if (this.running) {
      this.renderer?.update(
        `${this.text()} (page ${event.page}: ${event.current}/${event.total})`,
      );
    }
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.renderer?.stop(
      `Downloaded ${this.count} image${this.count === 1 ? "" : "s"}`,
    );
  }

  get total(): number {
    return this.count;
  }

  private text(): string {
    return `Downloading images... ${this.count}/${this.expected}`;
  }
}
