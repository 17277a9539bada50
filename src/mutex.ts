/**
 * @tessera/core — keyed async mutex
 *
 * Tasks sharing a key run one at a time, in submission order. Tasks with
 * different keys do not wait on each other.
 */

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run      = previous.then(fn);
    // The stored tail never rejects, so a failed task does not poison the key.
    const tail     = run.then(() => undefined, () => undefined);
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  /** True while a task for `key` is running or queued. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
