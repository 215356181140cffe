/**
 * Serializes async work per key. Work queued under one key runs strictly one
 * after another; different keys run independently.
 */
export class KeyedQueue {
  private chains: Map<string, Promise<void>> = new Map();

  run<T>(key: string, work: () => T | Promise<T>): Promise<T> {
    const previous = this.chains.get(key) ?? Promise.resolve();
    const result = previous.then(work);

    // The chain only tracks completion; failures reach the caller through `result`
    const tail: Promise<void> = result.then(
      () => this.release(key, tail),
      () => this.release(key, tail)
    );
    this.chains.set(key, tail);

    return result;
  }

  private release(key: string, tail: Promise<void>): void {
    if (this.chains.get(key) === tail) {
      this.chains.delete(key);
    }
  }
}
