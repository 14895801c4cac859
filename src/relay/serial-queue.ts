/**
 * Runs tasks one at a time in submission order. A task starts only after the
 * previous one has settled.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run(task: () => Promise<void>): Promise<void> {
    const next = this.tail.then(task);
    // A rejected task must not block the ones queued behind it; the caller
    // still observes the rejection through `next`.
    this.tail = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  /** Resolves once every task submitted so far has settled. */
  idle(): Promise<void> {
    return this.tail;
  }
}
