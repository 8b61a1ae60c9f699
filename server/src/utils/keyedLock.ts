/**
 * Per-key mutual exclusion. Callers queue behind earlier holders of any of
 * their keys; all keys of one call are claimed in the same tick, so
 * overlapping multi-key calls cannot deadlock.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    return this.runMany([key], fn);
  }

  async runMany<T>(keys: string[], fn: () => Promise<T>): Promise<T> {
    const claimed: Array<{ key: string; tail: Promise<void> }> = [];
    const waits: Promise<void>[] = [];
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });

    for (const key of new Set(keys)) {
      const previous = this.tails.get(key);
      if (previous) waits.push(previous);
      this.tails.set(key, held);
      claimed.push({ key, tail: held });
    }

    await Promise.all(waits);
    try {
      return await fn();
    } finally {
      release();
      for (const { key, tail } of claimed) {
        if (this.tails.get(key) === tail) this.tails.delete(key);
      }
    }
  }
}
