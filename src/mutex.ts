/**
 * Promise-chain mutex. Callers queue in FIFO order; `acquire` resolves with a
 * release function that must be called exactly once.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private held = 0;

  public get locked(): boolean {
    return this.held > 0;
  }

  public acquire(): Promise<() => void> {
    let release: () => void = () => {};
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);
    this.held++;

    return previous.then(() => {
      let released = false;
      return () => {
        if (released) return;
        released = true;
        this.held--;
        release();
      };
    });
  }

  public async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
