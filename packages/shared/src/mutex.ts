/**
 * Simple FIFO mutex for serialising async read-modify-write cycles within one
 * process. Offers no protection across processes.
 */
export class Mutex {
  private locked = false;
  private queue: Array<() => void> = [];

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }
}

const keyedMutexes = new Map<string, Mutex>();

/** One mutex per key (e.g. an absolute file path) for the lifetime of the process. */
export function mutexFor(key: string): Mutex {
  let mutex = keyedMutexes.get(key);
  if (!mutex) {
    mutex = new Mutex();
    keyedMutexes.set(key, mutex);
  }
  return mutex;
}
