// ---------------------------------------------------------------------------
// clanker-guard mutual exclusion
// FIFO async lock; one instance per credential store
// ---------------------------------------------------------------------------

export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Run `fn` once every previously queued call has settled. A rejection in
   * one caller does not poison the queue for the next.
   */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
