/**
 * Mutual exclusion per key. Callers for the same key run one at a time in arrival order;
 * different keys never wait on each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let releaseNext: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      releaseNext = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      releaseNext();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
