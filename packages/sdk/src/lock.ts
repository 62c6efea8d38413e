/**
 * In-process lock serializing operations that touch shared state
 */

export class SerialLock {
  #tail: Promise<void> = Promise.resolve();
  #pending = 0;

  /**
   * Run `fn` once every previously queued holder has finished
   *
   * A failing holder releases the lock like a successful one; its error
   * reaches only its own caller.
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    this.#pending++;
    const run = this.#tail.then(fn);
    this.#tail = run.then(
      () => undefined,
      () => undefined
    );
    try {
      return await run;
    } finally {
      this.#pending--;
    }
  }

  /** Holders queued or running */
  get pending(): number {
    return this.#pending;
  }
}
