/**
 * Serializes async work per key within this process
 * Calls for the same key run one after another; different keys do not wait on each other.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let releaseLock: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      releaseLock = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      releaseLock();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
