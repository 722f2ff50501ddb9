/**
 * In-process serialization per key.
 *
 * Calls for the same key run one at a time in arrival order; calls for
 * different keys are independent. A failing call does not block the next.
 */

const noop = (): void => {};

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(fn);
    const tail = result.then(noop, noop);
    this.tails.set(key, tail);

    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Keys with queued or running work */
  pending(): number {
    return this.tails.size;
  }
}
