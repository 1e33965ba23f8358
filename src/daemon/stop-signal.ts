/**
 * One-way stop flag shared by the listener, the writer and the daemon
 */

export class StopSignal {
  private reasonText: string | null = null;
  private readonly waiters: Array<(reason: string) => void> = [];

  /** Set the flag; only the first reason is kept */
  trigger(reason: string): void {
    if (this.reasonText !== null) return;
    this.reasonText = reason;
    for (const waiter of this.waiters.splice(0)) {
      waiter(reason);
    }
  }

  get triggered(): boolean {
    return this.reasonText !== null;
  }

  get reason(): string | null {
    return this.reasonText;
  }

  /** Resolves with the reason once triggered */
  wait(): Promise<string> {
    const reason = this.reasonText;
    if (reason !== null) return Promise.resolve(reason);
    return new Promise((resolve) => this.waiters.push(resolve));
  }
}
