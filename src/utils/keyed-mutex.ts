/**
 * Per-key async mutual exclusion.
 *
 * Tasks for the same key run one at a time in arrival order; tasks for
 * different keys never wait on each other. The lock for a key is dropped
 * once its queue drains, so idle keys cost nothing.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run `task` once every earlier task for `key` has settled.
   */
  async runExclusive<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Whether any task holds or waits for `key`. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
