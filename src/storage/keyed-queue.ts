/**
 * Serializes async work per key: tasks for one key run one after another in
 * submission order, tasks for different keys run concurrently. A failed task
 * does not block the ones queued behind it.
 */
export class KeyedQueue {
  private readonly tails = new Map<string, Promise<void>>();

  public run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
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

  /** Number of keys with queued or running work. */
  public get size(): number {
    return this.tails.size;
  }

  /** Resolves once everything queued so far has settled. */
  public async drain(): Promise<void> {
    await Promise.all(this.tails.values());
  }
}
