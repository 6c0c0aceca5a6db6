/**
 * Single-writer, single-reader async channel.
 *
 * `send` never blocks: values queue in FIFO order until the reader takes
 * them. A channel nobody reads is simply dropped with its buffer, so the
 * writer never depends on a reader being present.
 */

export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: Array<{ value: T }> = [];
  private waiting: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private closed = false;

  /** True once close() has been called. */
  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of values sent but not yet received. */
  get pending(): number {
    return this.buffer.length;
  }

  /**
   * Queue a value for the reader.
   *
   * @returns False if the channel is already closed (the value is dropped).
   */
  send(value: T): boolean {
    if (this.closed) {
      return false;
    }
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value, done: false });
      return true;
    }
    this.buffer.push({ value });
    return true;
  }

  /** Close the channel. Buffered values are still delivered. Idempotent. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: undefined, done: true });
    }
  }

  /** Receive the next value, or `done` once closed and drained. */
  receive(): Promise<IteratorResult<T, undefined>> {
    const next = this.buffer.shift();
    if (next) {
      return Promise.resolve({ value: next.value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.waiting) {
      return Promise.reject(new Error("channel already has a pending reader"));
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive(),
    };
  }
}
