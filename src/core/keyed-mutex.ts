/**
 * Per-key mutual exclusion for async work.
 * Tasks sharing a key run one at a time in call order; different keys run concurrently.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    // The queue only tracks completion; the caller receives the outcome through `run`.
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

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

// Shared by every registry in the process so two instances over one root still serialize.
export const sharedBrandLocks = new KeyedMutex();
