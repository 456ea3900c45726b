/**
 * Runs submitted jobs one at a time in submission order. A failed job rejects
 * only its own caller; later jobs still run.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  public run<T>(job: () => Promise<T>): Promise<T> {
    const next = this.tail.then(job);
    this.tail = next.catch(() => undefined);
    return next;
  }
}
