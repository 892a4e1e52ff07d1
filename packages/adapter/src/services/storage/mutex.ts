/**
 * Exclusive async lock. Callers queue in arrival order; the lock is released
 * when the callback settles, whether it resolves or rejects.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  private held = false;

  get isLocked(): boolean {
    return this.held;
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    this.held = true;
    try {
      return await fn();
    } finally {
      this.held = false;
      release();
    }
  }
}
