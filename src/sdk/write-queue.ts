/**
 * Serializes asynchronous writes so that each task runs to completion before
 * the next one starts. A failed task does not stall the tasks queued after it.
 */
export class WriteQueue {
  #tail: Promise<void> = Promise.resolve();
  #pending = 0;

  /** Number of tasks queued or running. */
  get pending(): number {
    return this.#pending;
  }

  /** Queue `task` behind every task enqueued before it. */
  run<T>(task: () => Promise<T>): Promise<T> {
    this.#pending++;
    const result = this.#tail.then(task).finally(() => {
      this.#pending--;
    });
    this.#tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
