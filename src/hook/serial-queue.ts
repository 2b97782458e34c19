/**
 * Runs tasks one after another: a task starts only once every task queued
 * before it has settled. One queue per pool keeps notifications for the same
 * ledger from interleaving across `await` points.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // the queue only waits for completion; failures reach the caller through `result`
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
