// ============================================================================
// KEYED LOCK
// ============================================================================
// Serializes work per key. Work on unrelated keys runs concurrently. Keys for
// one call are always taken in sorted order, so two callers asking for
// overlapping sets cannot deadlock.

export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  get activeKeys(): number {
    return this.tails.size;
  }

  private async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;

    return () => {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    };
  }

  /**
   * Run `fn` while holding every key in `keys`.
   */
  async run<T>(keys: readonly string[], fn: () => Promise<T>): Promise<T> {
    const ordered = [...new Set(keys)].sort();
    const releases: Array<() => void> = [];

    try {
      for (const key of ordered) {
        releases.push(await this.acquire(key));
      }
      return await fn();
    } finally {
      for (const release of releases.reverse()) release();
    }
  }
}
