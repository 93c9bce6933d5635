/**
 * In-process async mutex keyed by string.
 * Operations on the same key run one at a time; different keys run concurrently.
 */
export class KeyedLock {
  private readonly locks = new Map<string, Promise<unknown>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    // Wait for any pending operation on this key
    // (the previous holder's failure belongs to its own caller)
    while (this.locks.has(key)) {
      await Promise.allSettled([this.locks.get(key)]);
    }

    const promise = fn();
    this.locks.set(key, promise);

    try {
      return await promise;
    } finally {
      if (this.locks.get(key) === promise) {
        this.locks.delete(key);
      }
    }
  }
}
