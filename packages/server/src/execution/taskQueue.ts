/**
 * Single logical worker: tasks run one at a time in submission order. A task
 * that awaits keeps the queue blocked until it settles, so every mutation of an
 * account is serialized even across broker round-trips.
 */
export class TaskQueue {
  private tail: Promise<void> = Promise.resolve();
  private depth = 0;

  get size(): number {
    return this.depth;
  }

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.depth += 1;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle()
    );
    return result;
  }

  /** Resolves once every task queued so far has settled. */
  idle(): Promise<void> {
    return this.tail;
  }

  private settle(): void {
    this.depth -= 1;
  }
}
