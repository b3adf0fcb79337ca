/**
 * FIFO async mutex. Serializes segment callbacks across workers.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  /** Run `task` once every earlier holder has released */
  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    let release: () => void = () => {};
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);

    await previous;
    try {
      return await task();
    } finally {
      release();
    }
  }
}
