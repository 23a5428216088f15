/**
 * Per-key async mutual exclusion.
 *
 * Tasks for the same key run one after another in arrival order; tasks for
 * different keys never wait on each other. A rejected task does not poison
 * the chain for the next one.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<unknown>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task, task);
    // The chain only tracks completion; the caller sees the task's own result
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

  /** Keys with a task running or queued. */
  activeKeys(): string[] {
    return [...this.tails.keys()];
  }
}
