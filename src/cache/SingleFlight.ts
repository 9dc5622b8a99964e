/**
 * Serializes tasks per key so that at most one download per cache file is in
 * flight. A task queued behind another starts only after the earlier one
 * settled, and is expected to re-check the cache itself.
 *
 * Each task receives the value of the task directly ahead of it in the queue,
 * or `undefined` when the queue was empty or that task failed.
 */
export class SingleFlight<T = unknown> {
  private readonly tails = new Map<string, Promise<T | undefined>>();

  async run(key: string, task: (previous: T | undefined) => Promise<T>): Promise<T> {
    const previous: Promise<T | undefined> = this.tails.get(key) ?? Promise.resolve(undefined);
    const current = previous.then(task);
    // the chain only carries values forward; failures reach the caller via `current`
    const tail = current.then(
      (value): T | undefined => value,
      () => undefined,
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

  /** Number of keys with a running or queued task */
  get size(): number {
    return this.tails.size;
  }
}
