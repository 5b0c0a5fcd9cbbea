/**
 * Serialises async work per key. Work on different keys never waits on
 * each other; work on the same key runs in submission order.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  /** Number of keys with queued or running work. */
  get size(): number {
    return this.tails.size;
  }

  run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(fn);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );

    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }
}
