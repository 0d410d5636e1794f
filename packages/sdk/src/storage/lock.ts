/**
 * Mutual exclusion for async units of work
 * @module storage/lock
 */

/**
 * A simple async mutex. While a task runs, later tasks wait in FIFO order.
 * Not reentrant: a task must not call runExclusive on the same mutex.
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Run the task once every earlier task has settled
   */
  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this.tail;
    this.tail = next;

    return previous.then(() => task().finally(release));
  }
}
