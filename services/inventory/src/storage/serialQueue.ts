/**
 * Runs tasks one at a time in submission order. Used as the single writer in
 * front of the row store so that read-decide-write sequences from concurrent
 * requests in this process do not interleave.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task).finally(() => {
      this.pending -= 1;
    });
    // a failed task must not poison the tasks queued behind it
    this.tail = result.catch(() => undefined);
    return result;
  }

  get size(): number {
    return this.pending;
  }
}
