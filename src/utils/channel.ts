// Bounded single-producer / single-consumer channel
// The producer awaits `send`, so a slow consumer throttles it once `capacity`
// values are buffered. Closing the iterator from the consumer side cancels the
// channel and every pending or future `send` resolves to false.

type Reader<T> = (result: IteratorResult<T>) => void;

export class BoundedChannel<T> implements AsyncIterable<T> {
  private buffer: Array<{ value: T }> = [];
  private readers: Array<Reader<T>> = [];
  private writers: Array<() => void> = [];
  private cancelListeners: Array<() => void> = [];
  private closed = false;
  private cancelled = false;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  async send(value: T): Promise<boolean> {
    while (true) {
      if (this.cancelled || this.closed) return false;

      const reader = this.readers.shift();
      if (reader) {
        reader({ value, done: false });
        return true;
      }

      if (this.buffer.length < this.capacity) {
        this.buffer.push({ value });
        return true;
      }

      await new Promise<void>((resolve) => this.writers.push(resolve));
    }
  }

  /** Producer side: no more values. Buffered values are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.flushReaders();
    this.wakeWriters();
  }

  /** Consumer side: stop listening and drop whatever is buffered. */
  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.buffer = [];
    this.flushReaders();
    this.wakeWriters();
    const listeners = this.cancelListeners;
    this.cancelListeners = [];
    for (const listener of listeners) listener();
  }

  onCancel(listener: () => void): void {
    if (this.cancelled) {
      listener();
      return;
    }
    this.cancelListeners.push(listener);
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.receive(),
      return: async (): Promise<IteratorResult<T>> => {
        this.cancel();
        return { value: undefined, done: true };
      },
    };
  }

  private receive(): Promise<IteratorResult<T>> {
    const entry = this.buffer.shift();
    if (entry) {
      this.writers.shift()?.();
      return Promise.resolve({ value: entry.value, done: false });
    }

    if (this.closed || this.cancelled) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => this.readers.push(resolve));
  }

  private flushReaders(): void {
    const readers = this.readers;
    this.readers = [];
    for (const reader of readers) reader({ value: undefined, done: true });
  }

  private wakeWriters(): void {
    const writers = this.writers;
    this.writers = [];
    for (const writer of writers) writer();
  }
}
