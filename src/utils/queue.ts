/**
 * Serialises async operations that share a key. Callers queued under the
 * same key run one after another, in call order; other keys are independent.
 */
export class KeyedQueue {
  private readonly chains = new Map<string, Promise<void>>();

  async run<T>(key: string, operation: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => next);
    this.chains.set(key, tail);
    await previous;

    try {
      return await operation();
    } finally {
      release();
      if (this.chains.get(key) === tail) {
        this.chains.delete(key);
      }
    }
  }
}
