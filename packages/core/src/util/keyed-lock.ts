/**
 * Per-key mutual exclusion.
 *
 * Work for one key runs strictly in submission order; work for different
 * keys never waits on each other.
 */

export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  /** Run `fn` once every earlier task for `key` has settled. */
  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const task = previous.then(fn);
    const tail = task.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await task;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with queued or running work. */
  get size(): number {
    return this.tails.size;
  }
}
