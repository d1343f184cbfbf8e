/**
 * MutationLock - Serialises store mutations
 *
 * Every mutation runs "check index → touch payload file → update index →
 * write snapshot" as one critical section. Readers of the in-memory index
 * never take the lock.
 */
export class MutationLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Run `task` once every previously queued task has settled
   */
  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending++;

    try {
      await previous;
      return await task();
    } finally {
      this.pending--;
      release();
    }
  }

  /** Number of queued or running tasks */
  get queued(): number {
    return this.pending;
  }
}
