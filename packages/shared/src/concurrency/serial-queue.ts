/**
 * Runs async tasks one at a time in submission order.
 * Used as the single writer in front of the index: every mutation goes
 * through one queue, so deltas are applied strictly sequentially.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Schedules `task` after everything already queued. The returned promise
   * settles with the task's own outcome; a failing task does not stop the queue.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => {
        this.pending -= 1;
      },
      () => {
        this.pending -= 1;
      },
    );
    return result;
  }

  /** Resolves once every task queued so far has settled. */
  async drain(): Promise<void> {
    await this.tail;
  }

  get size(): number {
    return this.pending;
  }
}
