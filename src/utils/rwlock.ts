type Mode = 'read' | 'write';

interface Waiter {
  mode: Mode;
  grant: () => void;
}

export type Release = () => void;

/**
 * Async readers-writer lock.
 *
 * Any number of readers may hold the lock together; a writer holds it alone.
 * Waiters are served in arrival order, and a queued writer holds back readers
 * that arrive after it.
 */
export class ReadWriteLock {
  private activeReaders = 0;
  private writerActive = false;
  private waiters: Waiter[] = [];

  acquireRead(): Promise<Release> {
    if (!this.writerActive && this.waiters.length === 0) {
      this.activeReaders++;
      return Promise.resolve(this.releaser('read'));
    }
    return this.enqueue('read');
  }

  acquireWrite(): Promise<Release> {
    if (!this.writerActive && this.activeReaders === 0 && this.waiters.length === 0) {
      this.writerActive = true;
      return Promise.resolve(this.releaser('write'));
    }
    return this.enqueue('write');
  }

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get readers(): number {
    return this.activeReaders;
  }

  get writing(): boolean {
    return this.writerActive;
  }

  get pending(): number {
    return this.waiters.length;
  }

  private enqueue(mode: Mode): Promise<Release> {
    return new Promise((resolve) => {
      this.waiters.push({ mode, grant: () => resolve(this.releaser(mode)) });
    });
  }

  private releaser(mode: Mode): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      if (mode === 'write') {
        this.writerActive = false;
      } else {
        this.activeReaders--;
      }
      this.drain();
    };
  }

  private drain(): void {
    while (this.waiters.length > 0 && !this.writerActive) {
      const next = this.waiters[0];
      if (next.mode === 'write') {
        if (this.activeReaders > 0) return;
        this.waiters.shift();
        this.writerActive = true;
        next.grant();
        return;
      }
      this.waiters.shift();
      this.activeReaders++;
      next.grant();
    }
  }
}
