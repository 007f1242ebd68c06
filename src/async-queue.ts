/**
 * Unbounded FIFO queue bridging event callbacks to async iteration.
 *
 * Producers `push()` from event handlers; a single consumer awaits `shift()`
 * or iterates with `for await`. Items are delivered in push order. After
 * `close()`, remaining items drain and the iteration then ends.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private waiters: Array<(item: T | undefined) => void> = [];
  private closed = false;

  push(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  /**
   * Stop accepting items and wake pending consumers once the backlog is gone.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }

  /**
   * Next item, or `undefined` when the queue is closed and drained or the
   * signal aborts first.
   */
  shift(signal?: AbortSignal): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.closed || signal?.aborted) {
      return Promise.resolve(undefined);
    }

    return new Promise((resolve) => {
      const onAbort = (): void => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve(undefined);
      };
      const waiter = (item: T | undefined): void => {
        signal?.removeEventListener("abort", onAbort);
        resolve(item);
      };
      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  async *drain(signal?: AbortSignal): AsyncGenerator<T, void, undefined> {
    while (true) {
      const item = await this.shift(signal);
      if (item === undefined) return;
      yield item;
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.drain();
  }
}
