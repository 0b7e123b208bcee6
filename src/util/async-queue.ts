/**
 * Ordered single-consumer queue bridging push-style event sources (socket
 * messages, busboy parts) to `for await` consumers.
 *
 * Items pushed before a consumer attaches are buffered. `onDrain` fires when
 * the buffer falls back under the high-water mark so producers can resume.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private waiters: Array<{ resolve: (r: IteratorResult<T>) => void; reject: (e: unknown) => void }> = [];
  private ended = false;
  private failure: { error: unknown } | null = null;
  private iterating = false;

  constructor(
    private readonly highWater = Infinity,
    private readonly onDrain?: () => void
  ) {}

  get size(): number {
    return this.items.length;
  }

  get isEnded(): boolean {
    return this.ended;
  }

  /**
   * Returns false once the buffer is at or above the high-water mark. Items
   * pushed after the queue ended are dropped, and never ask the producer to
   * pause.
   */
  push(item: T): boolean {
    if (this.ended) return true;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
      return true;
    }
    this.items.push(item);
    return this.items.length < this.highWater;
  }

  /** Removes and returns whatever is buffered, for producers to dispose of. */
  takeBuffered(): T[] {
    return this.items.splice(0);
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) waiter.resolve({ value: undefined, done: true });
  }

  fail(error: unknown): void {
    if (this.ended) return;
    this.failure = { error };
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) waiter.reject(error);
  }

  next(): Promise<IteratorResult<T>> {
    if (this.items.length > 0) {
      const wasFull = this.items.length >= this.highWater;
      const [value] = this.items.splice(0, 1);
      if (wasFull && this.items.length < this.highWater) this.onDrain?.();
      return Promise.resolve({ value, done: false });
    }
    if (this.failure) return Promise.reject(this.failure.error);
    if (this.ended) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve, reject) => this.waiters.push({ resolve, reject }));
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.iterating) throw new Error('AsyncQueue supports a single consumer');
    this.iterating = true;
    return {
      next: () => this.next(),
      return: async () => {
        const wasFull = this.items.length >= this.highWater;
        this.end();
        this.items = [];
        if (wasFull) this.onDrain?.();
        return { value: undefined, done: true };
      }
    };
  }
}
