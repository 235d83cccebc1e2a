/**
 * Keyed Mutex
 *
 * One exclusive lock per key. Work queued on the same key runs strictly
 * in arrival order; work on different keys never waits on each other.
 */

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run fn while holding the lock for `key`.
   * The lock is released when fn settles, whether it resolves or throws.
   */
  async runExclusive<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      // Drop the entry once nobody is queued behind us
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /**
   * Number of keys with a holder or waiters (for diagnostics)
   */
  get size(): number {
    return this.tails.size;
  }
}
