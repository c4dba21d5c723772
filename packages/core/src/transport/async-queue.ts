/**
 * AsyncQueue
 *
 * Push-based source exposed as an async iterator. Producers `push`, consumers
 * `for await`. `close()` ends iteration; `fail(error)` makes the pending or
 * next `next()` reject.
 */

type Waiter<T> = {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: unknown) => void;
};

export class AsyncQueue<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;
  private failure: { error: unknown } | null = null;

  constructor(private readonly onClose?: () => void) {}

  get isClosed(): boolean {
    return this.closed;
  }

  push(value: T): void {
    if (this.closed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value, done: false });
    } else {
      this.buffer.push(value);
    }
  }

  /**
   * End the stream. Pending consumers receive `done`. Safe to call repeatedly.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.buffer = [];

    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }

    this.onClose?.();
  }

  /**
   * Terminate the stream with an error.
   */
  fail(error: unknown): void {
    if (this.closed) return;

    const waiters = this.waiters.splice(0);
    if (waiters.length === 0) this.failure = { error };
    this.closed = true;
    this.buffer = [];

    for (const waiter of waiters) {
      waiter.reject(error);
    }

    this.onClose?.();
  }

  next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }

    if (this.failure) {
      const { error } = this.failure;
      this.failure = null;
      return Promise.reject(error);
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}
