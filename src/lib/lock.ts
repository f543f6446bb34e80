// src/lib/lock.ts
type Pending = { exclusive: boolean; grant: () => void };

/**
 * FIFO read/write lock. Readers share, a writer is exclusive, and a queued
 * writer blocks readers that arrive after it.
 */
export class RwLock {
  private readers = 0;
  private writer = false;
  private readonly queue: Pending[] = [];

  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire(false);
    try {
      return await fn();
    } finally {
      this.readers--;
      this.drain();
    }
  }

  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire(true);
    try {
      return await fn();
    } finally {
      this.writer = false;
      this.drain();
    }
  }

  get isWriteLocked(): boolean {
    return this.writer;
  }

  get activeReaders(): number {
    return this.readers;
  }

  private acquire(exclusive: boolean): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(exclusive)) {
      this.take(exclusive);
      return Promise.resolve();
    }
    return new Promise<void>(resolve => {
      this.queue.push({ exclusive, grant: resolve });
    });
  }

  private canGrant(exclusive: boolean): boolean {
    return exclusive ? !this.writer && this.readers === 0 : !this.writer;
  }

  private take(exclusive: boolean) {
    if (exclusive) this.writer = true;
    else this.readers++;
  }

  private drain() {
    while (this.queue.length > 0) {
      const head = this.queue[0];
      if (!head || !this.canGrant(head.exclusive)) return;
      this.queue.shift();
      this.take(head.exclusive);
      head.grant();
      if (head.exclusive) return;
    }
  }
}

/** Exclusive-only lock for callers that never share. */
export class Mutex {
  private readonly inner = new RwLock();

  run<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.inner.write(fn);
  }
}
