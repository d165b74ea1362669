/**
 * Per-key mutual exclusion built on promise chains.
 *
 * Operations sharing a key run one after another in call order; operations
 * on different keys never wait on each other. A failed operation does not
 * break the chain for the ones queued behind it.
 */
export class KeyedLock {
  private chains = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(key) ?? Promise.resolve();
    const result = previous.then(fn);
    const tail = result.then(
      () => {},
      () => {}
    );
    this.chains.set(key, tail);

    try {
      return await result;
    } finally {
      // Last one out removes the chain so idle keys do not accumulate
      if (this.chains.get(key) === tail) {
        this.chains.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.chains.has(key);
  }
}
