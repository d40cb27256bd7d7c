/**
 * Signal Queue
 * Fixed-capacity, single-consumer queue used by a page worker to collect
 * one completion signal from each of its download workers.
 */

export class SignalQueue<T> {
  private buffered: T[] = [];
  private waiting: Array<(value: T) => void> = [];
  private sent = 0;

  constructor(readonly capacity: number) {}

  /**
   * Deliver a signal. Sending more than `capacity` signals is a bug.
   */
  send(value: T): void {
    if (this.sent >= this.capacity) {
      throw new Error(
        `SignalQueue over capacity: ${this.sent + 1} > ${this.capacity}`,
      );
    }
    this.sent++;

    const resolve = this.waiting.shift();
    if (resolve) {
      resolve(value);
    } else {
      this.buffered.push(value);
    }
  }

  /**
   * Wait for the next signal, in the order they were sent
   */
  receive(): Promise<T> {
    if (this.buffered.length > 0) {
      const [value] = this.buffered.splice(0, 1);
      return Promise.resolve(value);
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }
}
