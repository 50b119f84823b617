/**
 * Push-based async queue: a producer task pushes synchronously, one consumer
 * drains it with `for await`. Pushes after close are dropped.
 */
export class AsyncQueue<T extends object> implements AsyncIterable<T> {
  private items: T[] = [];
  private closed = false;
  private waiter: ((value: IteratorResult<T, undefined>) => void) | null = null;

  push(item: T): void {
    if (this.closed) {
      return;
    }

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: item, done: false });
    } else {
      this.items.push(item);
    }
  }

  /**
   * End the stream. Items already queued are still delivered.
   */
  close(): void {
    this.closed = true;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
