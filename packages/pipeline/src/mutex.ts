/**
 * In-process locks. `acquire()` resolves to a release function once every
 * earlier holder has released, in FIFO order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  acquire(): Promise<() => void> {
    const previous = this.tail;
    let unlock: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    this.tail = previous.then(() => current);

    return previous.then(() => {
      let released = false;
      return () => {
        if (released) return;
        released = true;
        unlock();
      };
    });
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

/**
 * One Mutex per key, created on first use and dropped when idle.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, { mutex: Mutex; users: number }>();

  async runExclusive<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), users: 0 };
      this.locks.set(key, entry);
    }
    entry.users += 1;

    try {
      return await entry.mutex.runExclusive(fn);
    } finally {
      entry.users -= 1;
      if (entry.users === 0) {
        this.locks.delete(key);
      }
    }
  }

  get size(): number {
    return this.locks.size;
  }
}
