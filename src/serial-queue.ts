/**
 * Single-worker FIFO queue.
 *
 * Tasks run one at a time in the order they were pushed. A rejected task
 * never stalls the chain; its rejection is delivered only to the caller
 * that awaits it.
 */

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Enqueue a task and get a promise for its result */
  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      },
    );
    return result;
  }

  /** Number of tasks queued or running */
  get size(): number {
    return this.pending;
  }

  /** Resolves once every task queued so far has settled */
  onIdle(): Promise<void> {
    return this.tail;
  }
}
