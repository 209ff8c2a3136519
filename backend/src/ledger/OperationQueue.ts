/**
 * FIFO lock around engine operations. Each `run` starts only after every
 * previously queued operation settled, whether it resolved or rejected.
 */
export class OperationQueue {
  private tail: Promise<void> = Promise.resolve();
  private depth = 0;

  get pending(): number {
    return this.depth;
  }

  run<T>(operation: () => Promise<T>): Promise<T> {
    this.depth += 1;
    const result = this.tail.then(operation);
    this.tail = result.then(
      () => this.release(),
      () => this.release(),
    );
    return result;
  }

  /** Resolves once everything queued so far has settled. */
  idle(): Promise<void> {
    return this.tail;
  }

  private release(): void {
    this.depth -= 1;
  }
}
