/**
 * Runs tasks one at a time per key. Tasks for different keys do not wait on
 * each other; a failed task releases the key for the next one.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  public get activeKeys(): number {
    return this.tails.size;
  }

  public run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail: Promise<void> = result.then(
      () => this.release(key, tail),
      () => this.release(key, tail)
    );
    this.tails.set(key, tail);
    return result;
  }

  private release(key: string, tail: Promise<void>): void {
    if (this.tails.get(key) === tail) {
      this.tails.delete(key);
    }
  }
}
