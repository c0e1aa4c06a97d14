/**
 * Per-conversation serialization.
 *
 * Each key holds the tail of a promise chain; a new task for the same key
 * starts only after every earlier task for that key has settled. Different
 * keys never wait on each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    // The chain continues whether the task resolved or rejected
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return result;
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with queued or running tasks */
  get size(): number {
    return this.tails.size;
  }
}
