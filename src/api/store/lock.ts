/**
 * Store-wide readers-writer lock.
 *
 * Readers share the lock; a writer holds it alone. Waiters are granted in
 * arrival order, so a queued writer is not starved by a stream of readers.
 */

type LockMode = 'read' | 'write';

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

export class ReadWriteLock {
  private activeReaders = 0;
  private writerActive = false;
  private readonly waiters: Waiter[] = [];

  /** Run `fn` while holding the shared (read) side of the lock. */
  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('read');
    try {
      return await fn();
    } finally {
      this.release('read');
    }
  }

  /** Run `fn` while holding the exclusive (write) side of the lock. */
  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('write');
    try {
      return await fn();
    } finally {
      this.release('write');
    }
  }

  get readers(): number {
    return this.activeReaders;
  }

  get writing(): boolean {
    return this.writerActive;
  }

  private canGrant(mode: LockMode): boolean {
    if (this.writerActive) return false;
    return mode === 'read' || this.activeReaders === 0;
  }

  private take(mode: LockMode): void {
    if (mode === 'read') {
      this.activeReaders++;
    } else {
      this.writerActive = true;
    }
  }

  private acquire(mode: LockMode): Promise<void> {
    if (this.waiters.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push({ mode, grant: resolve });
    });
  }

  private release(mode: LockMode): void {
    if (mode === 'read') {
      this.activeReaders--;
    } else {
      this.writerActive = false;
    }

    while (this.waiters.length > 0) {
      const next = this.waiters[0];
      if (!next || !this.canGrant(next.mode)) break;
      this.waiters.shift();
      this.take(next.mode);
      next.grant();
    }
  }
}
