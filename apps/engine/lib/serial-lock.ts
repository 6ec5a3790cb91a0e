/**
 * Serial Lock
 *
 * Promise-chain mutex: tasks passed to runExclusive run one at a time in call order.
 * A failing task releases the lock for the next one.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
