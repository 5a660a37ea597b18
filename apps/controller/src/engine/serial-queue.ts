/**
 * FIFO serialisation point. Each task starts only after the previous one
 * settled, so async collaborator calls never interleave two operations.
 */

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
