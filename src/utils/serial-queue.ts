/**
 * Runs async tasks one at a time, in submission order.
 *
 * Shared mutable state (the cached key, the access-log list) is only
 * read-modify-written from inside a task, so two callers racing on the
 * same state observe each other's writes.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private depth = 0;

  constructor(private readonly label: string) {}

  run<T>(task: () => Promise<T>): Promise<T> {
    this.depth++;
    const result = this.tail.then(task);
    // the chain continues whether the task resolved or rejected
    this.tail = result.then(
      () => this.settle(),
      () => this.settle()
    );
    return result;
  }

  /**
   * Number of tasks queued or running
   */
  pending(): number {
    return this.depth;
  }

  toString(): string {
    return `[SerialQueue ${this.label}: ${this.depth} pending]`;
  }

  private settle(): void {
    this.depth--;
  }
}
