import { describe, it, expect } from "vitest";
import { SignalQueue } from "./signal-queue";

describe("SignalQueue", () => {
  it("delivers buffered signals in send order", async () => {
    const queue = new SignalQueue<string>(3);
    queue.send("a");
    queue.send("b");

    expect(await queue.receive()).toBe("a");
    expect(await queue.receive()).toBe("b");
  });

  it("resolves a waiting receiver when a signal arrives", async () => {
    const queue = new SignalQueue<number>(1);
    const received = queue.receive();

    queue.send(7);

    await expect(received).resolves.toBe(7);
  });

  it("rejects signals beyond its capacity", () => {
    const queue = new SignalQueue<number>(1);
    queue.send(1);

    expect(() => queue.send(2)).toThrow("SignalQueue over capacity: 2 > 1");
  });
});
