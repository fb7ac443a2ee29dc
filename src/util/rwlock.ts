// src/util/rwlock.ts
// What: Async readers-writer lock guarding the (index, registry) pair.
// How: Readers share the lock; a writer holds it alone. Requests queue in arrival order, so a reader that
//      arrives behind a waiting writer waits too and never observes a half-applied mutation.

type LockKind = 'read' | 'write';

interface Waiter {
  kind: LockKind;
  grant: () => void;
}

export class ReadWriteLock {
  private readers = 0;
  private writer = false;
  private readonly queue: Waiter[] = [];

  async read<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire('read');
    try {
      return await fn();
    } finally {
      this.release('read');
    }
  }

  async write<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire('write');
    try {
      return await fn();
    } finally {
      this.release('write');
    }
  }

  /** Snapshot of the lock state, for status reporting and tests. */
  state(): { readers: number; writer: boolean; waiting: number } {
    return { readers: this.readers, writer: this.writer, waiting: this.queue.length };
  }

  private acquire(kind: LockKind): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(kind)) {
      this.take(kind);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queue.push({ kind, grant: resolve });
    });
  }

  private release(kind: LockKind): void {
    if (kind === 'read') this.readers -= 1;
    else this.writer = false;
    this.drain();
  }

  private canGrant(kind: LockKind): boolean {
    if (this.writer) return false;
    return kind === 'read' || this.readers === 0;
  }

  private take(kind: LockKind): void {
    if (kind === 'read') this.readers += 1;
    else this.writer = true;
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (!this.canGrant(next.kind)) return;
      this.queue.shift();
      this.take(next.kind);
      next.grant();
      if (next.kind === 'write') return;
    }
  }
}
