/**
 * Keyed Lock
 *
 * Serializes async critical sections that share a key; sections with
 * different keys run independently. Each key's queue is a promise chain
 * that is dropped once it drains.
 */

export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, section: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(section);
    // The chain must continue whether or not this section fails
    const tail = result.then(() => undefined, () => undefined);
    this.tails.set(key, tail);

    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Keys with a section running or queued
   */
  get activeKeys(): number {
    return this.tails.size;
  }
}
