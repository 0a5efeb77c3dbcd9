/**
 * Unbounded single-consumer async queue.
 * `send` never blocks; `receive` resolves with the next value, or undefined
 * once the channel is closed and drained.
 */
export class Channel<T> implements AsyncIterable<T> {
  private queue: T[] = [];
  private waiters: Array<(value: T | undefined) => void> = [];
  private closed = false;

  /** `onSend` runs after every accepted value. */
  constructor(private readonly onSend?: () => void) {}

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.queue.length;
  }

  /** Returns false when the channel is closed and the value was dropped. */
  send(value: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(value);
    } else {
      this.queue.push(value);
    }
    this.onSend?.();
    return true;
  }

  receive(): Promise<T | undefined> {
    if (this.queue.length > 0) {
      return Promise.resolve(this.queue.shift());
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Take the next queued value without waiting. */
  poll(): T | undefined {
    return this.queue.shift();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const value = await this.receive();
      if (value === undefined) return;
      yield value;
    }
  }
}
