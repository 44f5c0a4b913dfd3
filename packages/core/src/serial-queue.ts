/**
 * FIFO promise chain: each task starts only after the previous one settled.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get size(): number {
    return this.pending;
  }

  enqueue<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    // The chain continues whether the task resolved or rejected; the caller
    // observes the outcome through `result`.
    this.tail = result.then(
      () => this.done(),
      () => this.done()
    );
    return result;
  }

  /** Resolves once every task enqueued so far has settled. */
  idle(): Promise<void> {
    return this.tail;
  }

  private done(): void {
    this.pending--;
  }
}
