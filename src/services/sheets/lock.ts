/**
 * Serializes store mutations. Reconciliation clears and rewrites the whole sheet,
 * so an append must never run in the middle of it.
 */
export class OperationLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
