/**
 * Keyed Mutex - Serializes async tasks that share a key
 *
 * Tasks for different keys run concurrently; tasks for one key run in
 * call order, each starting after the previous one settles.
 *
 * @module canary/keyed-mutex
 */

/**
 * Per-key mutual exclusion used by the deployment manager
 */
export interface LockProvider {
  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T>;
}

export class KeyedMutex implements LockProvider {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `task` once every earlier task for `key` has settled
   */
  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(task);
    const tail = current.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Whether a task for `key` is running or queued
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
