/**
 * Promise-chained exclusive lock.
 * Waiters acquire in call order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Wait for the lock. Resolves with the release function.
   */
  acquire(): Promise<() => void> {
    const previous = this.tail;
    let release: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      release = () => {
        this.pending--;
        resolve();
      };
    });

    this.pending++;
    this.tail = previous.then(() => held);
    return previous.then(() => release);
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.pending > 0;
  }
}
