/**
 * Keyed Mutex - per-key serialization of async operations
 *
 * Operations sharing a key run one after another in call order; operations
 * on different keys do not wait on each other. A key's entry is dropped as
 * soon as its chain drains, so idle keys hold no memory.
 */

export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  /**
   * Run `fn` once every earlier operation for `key` has settled.
   * A failure in one operation does not block the ones queued behind it.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Whether any operation for `key` is running or waiting
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }
}
