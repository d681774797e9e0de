/** FIFO async mutex built on a promise chain. */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  run<T>(fn: () => Promise<T> | T): Promise<T> {
    const result = this.tail.then(fn);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

/** One mutex per key; idle keys are dropped. */
export class KeyedMutex {
  private readonly locks = new Map<string, { mutex: Mutex; pending: number }>();

  async run<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), pending: 0 };
      this.locks.set(key, entry);
    }
    entry.pending++;
    try {
      return await entry.mutex.run(fn);
    } finally {
      entry.pending--;
      if (entry.pending === 0) this.locks.delete(key);
    }
  }
}
