/**
 * Unbounded FIFO between connection handlers and the writer
 */

interface Waiter {
  resolve: (record: string | undefined) => void;
  timer: NodeJS.Timeout;
}

export class RecordQueue {
  private items: string[] = [];
  private head = 0;
  private waiters: Waiter[] = [];

  /** Append a record, handing it straight to a waiting consumer if there is one */
  push(record: string): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(record);
      return;
    }
    this.items.push(record);
  }

  /**
   * Take the oldest record, waiting up to `timeoutMs` for one to arrive.
   * Resolves undefined on timeout or when woken by `wake()`.
   */
  pop(timeoutMs: number): Promise<string | undefined> {
    const record = this.take();
    if (record !== undefined) return Promise.resolve(record);

    return new Promise((resolve) => {
      const waiter: Waiter = {
        resolve,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          resolve(undefined);
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  /** Release every pending `pop` with undefined */
  wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      clearTimeout(waiter.timer);
      waiter.resolve(undefined);
    }
  }

  get size(): number {
    return this.items.length - this.head;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  private take(): string | undefined {
    if (this.head >= this.items.length) return undefined;
    const record = this.items[this.head];
    this.head++;
    // Compact once the consumed prefix dominates
    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return record;
  }
}
