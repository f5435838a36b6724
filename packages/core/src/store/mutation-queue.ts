/**
 * Single-writer FIFO: tasks run one at a time in submission order. A failed
 * task rejects its own promise and does not stop the tasks queued behind it.
 */
export class MutationQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Tasks queued or running. */
  get size(): number {
    return this.pending;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task).finally(() => {
      this.pending--;
    });
    // The caller observes the rejection through `result`
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /** Resolves once every task queued so far has settled. */
  drain(): Promise<void> {
    return this.tail;
  }
}
