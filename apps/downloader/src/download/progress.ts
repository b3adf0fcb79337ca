/**
 * Completed-segment counter shared by all workers
 */
export class ProgressCounter {
  private count = 0;

  constructor(readonly total: number) {}

  /** Increment and return the new value */
  increment(): number {
    this.count += 1;
    return this.count;
  }

  get value(): number {
    return this.count;
  }

  get isComplete(): boolean {
    return this.count === this.total;
  }
}
