/**
 * Promise-chain mutex. Callers queue in arrival order; a task that throws
 * releases the lock before its error reaches the caller.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  get pending(): number {
    return this._pending;
  }

  get locked(): boolean {
    return this._pending > 0;
  }

  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    this._pending++;
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await previous;
      return await task();
    } finally {
      this._pending--;
      release();
    }
  }
}
