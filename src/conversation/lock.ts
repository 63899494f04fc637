/**
 * Keyed Mutex
 *
 * Serializes async work per key: calls for the same key run one at a time in
 * arrival order, calls for different keys never wait on each other.
 */

export class KeyedMutex {
  /** Last queued holder per key; removed when the queue drains */
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
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

  /** Whether work for `key` is running or queued */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
