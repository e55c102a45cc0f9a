/**
 * Keyed Mutex
 *
 * Serializes async work per key: a second caller for the same key waits
 * until the first one's work has settled. Different keys never wait on
 * each other. Used as the in-memory stand-in for a row lock.
 */

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await work();
    } finally {
      release();
    }
  }

  /**
   * Waits for the key and returns its release function. For locks whose
   * holder is not a single callback; releasing twice is harmless.
   */
  async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let unblock: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      unblock = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      unblock();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }

  /** Number of keys currently held or awaited (for tests) */
  get size(): number {
    return this.tails.size;
  }
}
