/**
 * Per-key mutual exclusion built on promise chaining. Work queued under the
 * same key runs one at a time in arrival order; different keys never wait on
 * each other.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(() => fn());
    // The tail must settle whether or not fn throws, or the key stays locked
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
