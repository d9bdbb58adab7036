/**
 * Runs tasks one after another per key; different keys run concurrently.
 */
export class KeyedLock<K> {
  private readonly locks = new Map<K, Promise<void>>();

  async run<T>(key: K, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();

    const current = (async () => {
      await previous;
      return await fn();
    })();

    const currentSettled = current.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(key, currentSettled);

    try {
      return await current;
    } finally {
      if (this.locks.get(key) === currentSettled) {
        this.locks.delete(key);
      }
    }
  }

  get size(): number {
    return this.locks.size;
  }
}
