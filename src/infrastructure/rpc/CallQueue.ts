/**
 * FIFO mutual exclusion for async work: each task starts only after the
 * previous one settled, whether it resolved or rejected.
 */
export class CallQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  public run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task, task);
    this.pending += 1;
    this.tail = result.then(
      () => this.release(),
      () => this.release()
    );
    return result;
  }

  public get size(): number {
    return this.pending;
  }

  private release(): void {
    this.pending -= 1;
  }
}
