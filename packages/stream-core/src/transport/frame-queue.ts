/**
 * Single-consumer async queue bridging push-style socket message events
 * to `for await` iteration.
 */
export class FrameQueue implements AsyncIterable<string> {
  private readonly buffered: string[] = [];
  private waiter: ((result: IteratorResult<string>) => void) | null = null;
  private failWaiter: ((error: Error) => void) | null = null;
  private ended = false;
  private failure: Error | null = null;

  push(item: string): void {
    if (this.ended) return;

    if (this.waiter) {
      const resolve = this.waiter;
      this.clearWaiters();
      resolve({ value: item, done: false });
      return;
    }
    this.buffered.push(item);
  }

  /**
   * Stop the queue. Buffered items are still delivered; after them the
   * iterator finishes, or throws `error` if one is given.
   */
  end(error?: Error): void {
    if (this.ended) return;
    this.ended = true;
    this.failure = error ?? null;

    if (this.waiter && this.failWaiter) {
      const resolve = this.waiter;
      const reject = this.failWaiter;
      this.clearWaiters();
      if (this.failure) {
        reject(this.failure);
      } else {
        resolve({ value: undefined, done: true });
      }
    }
  }

  private clearWaiters(): void {
    this.waiter = null;
    this.failWaiter = null;
  }

  private next(): Promise<IteratorResult<string>> {
    const item = this.buffered.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.ended) {
      return this.failure
        ? Promise.reject(this.failure)
        : Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => {
      this.waiter = resolve;
      this.failWaiter = reject;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<string> {
    return {
      next: () => this.next(),
      return: async () => {
        this.end();
        return { value: undefined, done: true };
      },
    };
  }
}
