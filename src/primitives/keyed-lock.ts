/**
 * @module primitives/keyed-lock
 * @description Serializes asynchronous tasks that share a key.
 *
 * Tasks for the same key run one after another in submission order; tasks
 * for different keys are not ordered relative to each other. A failed task
 * does not block the ones queued behind it.
 */

export class KeyedLock {
  /** Last queued task per key, settled to `undefined` either way. */
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `task` once every earlier task for `key` has settled.
   * @returns Whatever `task` resolves or rejects with.
   */
  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Whether any task for `key` is queued or running. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
