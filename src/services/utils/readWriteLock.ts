interface Waiter {
  exclusive: boolean;
  grant: () => void;
}

/**
 * Async read/write lock. Any number of readers or one writer; waiters are
 * served in arrival order, so a queued writer holds back later readers.
 * Not reentrant: a holder must not acquire again.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readonly waiters: Waiter[] = [];

  async read<T>(operation: () => Promise<T>): Promise<T> {
    await this.acquire(false);
    try {
      return await operation();
    } finally {
      this.release(false);
    }
  }

  async write<T>(operation: () => Promise<T>): Promise<T> {
    await this.acquire(true);
    try {
      return await operation();
    } finally {
      this.release(true);
    }
  }

  get activeReaders(): number {
    return this.readers;
  }

  get isWriting(): boolean {
    return this.writing;
  }

  private canGrant(exclusive: boolean): boolean {
    return exclusive ? !this.writing && this.readers === 0 : !this.writing;
  }

  private take(exclusive: boolean): void {
    if (exclusive) {
      this.writing = true;
    } else {
      this.readers++;
    }
  }

  private acquire(exclusive: boolean): Promise<void> {
    if (this.waiters.length === 0 && this.canGrant(exclusive)) {
      this.take(exclusive);
      return Promise.resolve();
    }
    return new Promise<void>(resolve => {
      this.waiters.push({ exclusive, grant: resolve });
    });
  }

  private release(exclusive: boolean): void {
    if (exclusive) {
      this.writing = false;
    } else {
      this.readers--;
    }

    while (this.waiters.length > 0) {
      const next = this.waiters[0];
      if (!this.canGrant(next.exclusive)) break;
      this.waiters.shift();
      this.take(next.exclusive);
      next.grant();
    }
  }
}
