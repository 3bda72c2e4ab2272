// =============================================================================
// PATHGUARD — Keyed Lock
//
// Serializes async tasks that share a key; tasks with different keys run
// concurrently. Used by the in-process profile store to make each upsert a
// single read-modify-write.
// =============================================================================

export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    // The queue only waits for completion; the caller sees the failure
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

  /** Keys with a task queued or running */
  get size(): number {
    return this.tails.size;
  }
}
