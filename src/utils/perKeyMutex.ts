// Per-key async mutex for serializing functions by key
export class PerKeyMutex {
  // Tail of the queue for each key; settles when the last queued holder finishes
  private locks = new Map<string, Promise<void>>();

  async acquire<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(key, tail);

    try {
      await previous;
      return await fn();
    } finally {
      release();
      // Clean up lock when nobody queued behind us
      if (this.locks.get(key) === tail) {
        this.locks.delete(key);
      }
    }
  }

  /**
   * Hold several keys at once. Keys are taken in sorted order so two callers
   * asking for overlapping sets cannot wait on each other.
   */
  async acquireMany<T>(keys: readonly string[], fn: () => Promise<T>): Promise<T> {
    const ordered = [...new Set(keys)].sort();

    const run = (index: number): Promise<T> => {
      const key = ordered[index];
      if (key === undefined) {
        return fn();
      }
      return this.acquire(key, () => run(index + 1));
    };

    return run(0);
  }

  // Get current lock status for debugging
  getLockStatus(): Record<string, boolean> {
    const status: Record<string, boolean> = {};
    for (const [key] of this.locks.entries()) {
      status[key] = true;
    }
    return status;
  }
}
