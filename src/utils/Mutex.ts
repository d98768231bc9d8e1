/**
 * @fileoverview FIFO async mutex.
 *
 * Each printer owns one to serialize its TCP sessions (the hardware accepts a single
 * session at a time), and the registry owns one for its id map and notification ledger.
 * Waiters are served in arrival order; releasing hands ownership straight to the next
 * waiter so no late arrival can jump the queue.
 */

export class Mutex {
  private locked = false;
  private readonly waiters: Array<(release: () => void) => void> = [];

  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return this.createRelease();
    }

    return await new Promise<() => void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // still locked, transfer ownership
      next(this.createRelease());
      return;
    }
    this.locked = false;
  }
}
