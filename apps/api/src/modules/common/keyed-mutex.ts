/**
 * Serializes async work per key. Tasks on different keys run concurrently;
 * tasks on the same key run one after another in submission order.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(() => task());
    const tail = current.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isBusy(key: string): boolean {
    return this.tails.has(key);
  }
}
