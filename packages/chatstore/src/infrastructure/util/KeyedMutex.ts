/** FIFO lock per key; a key is locked while it has a queue. */
export class KeyedMutex {
  private queues = new Map<string, Array<() => void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    await this.acquire(key);
    try {
      return await task();
    } finally {
      this.release(key);
    }
  }

  private acquire(key: string): Promise<void> {
    const queue = this.queues.get(key);
    if (!queue) {
      this.queues.set(key, []);
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      queue.push(resolve);
    });
  }

  private release(key: string) {
    const next = this.queues.get(key)?.shift();
    if (next) {
      next();
    } else {
      this.queues.delete(key);
    }
  }
}
