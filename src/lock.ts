/**
 * Runs async sections one at a time, in call order. A section that throws
 * does not block the ones queued behind it.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  run<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.tail.then(fn);
    // The caller observes failures through `result`; the chain only tracks order.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
