/**
 * Promise-chain lock per key. Tasks sharing a key run one after another in
 * arrival order; tasks under different keys never wait on each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  public async runExclusive<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    // The next waiter only needs to know this task settled; its caller sees the outcome through `result`.
    const tail = result.then(
      () => undefined,
      () => undefined
    );

    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  /** Keys with a task queued or running. */
  public get pendingKeys(): number {
    return this.tails.size;
  }
}
