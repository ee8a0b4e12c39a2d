/**
 * Single-slot gate
 *
 * Serializes async calls to a resource that cannot serve two requests at
 * once (a worker process handles one request at a time). Calls run in
 * arrival order; a rejected call does not block the ones queued after it.
 *
 * @module services/capabilities/gate
 */

export class SerialGate {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Calls queued or running */
  get size(): number {
    return this.pending;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result.finally(() => {
      this.pending--;
    });
  }
}
