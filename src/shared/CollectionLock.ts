type LockMode = 'shared' | 'exclusive';

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

/** 單一 collection 的讀寫鎖：FIFO 排隊，連續的 shared 請求可同時持有 */
class ReadWriteLock {
  private readers = 0;
  private writer = false;
  private readonly queue: Waiter[] = [];

  get idle(): boolean {
    return this.readers === 0 && !this.writer && this.queue.length === 0;
  }

  acquire(mode: LockMode): Promise<void> {
    return new Promise((resolve) => {
      this.queue.push({ mode, grant: resolve });
      this.drain();
    });
  }

  release(mode: LockMode): void {
    if (mode === 'exclusive') {
      this.writer = false;
    } else {
      this.readers--;
    }
    this.drain();
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (next.mode === 'exclusive') {
        if (this.writer || this.readers > 0) return;
        this.writer = true;
      } else {
        if (this.writer) return;
        this.readers++;
      }
      this.queue.shift();
      next.grant();
    }
  }
}

/**
 * 以 collection 名稱分區的讀寫鎖
 *
 * 重建（刪除 → 重建 → 寫入）持有 exclusive；查詢與擴展持有 shared，
 * 因此查詢不會看到重建到一半的 collection。不同 collection 互不阻塞。
 */
export class CollectionLock {
  private readonly locks = new Map<string, ReadWriteLock>();

  runShared<T>(collectionName: string, fn: () => T | Promise<T>): Promise<T> {
    return this.run(collectionName, 'shared', fn);
  }

  runExclusive<T>(collectionName: string, fn: () => T | Promise<T>): Promise<T> {
    return this.run(collectionName, 'exclusive', fn);
  }

  /** 目前仍有持有者或等待者的 collection 數量 */
  get activeCount(): number {
    return this.locks.size;
  }

  private async run<T>(collectionName: string, mode: LockMode, fn: () => T | Promise<T>): Promise<T> {
    let lock = this.locks.get(collectionName);
    if (!lock) {
      lock = new ReadWriteLock();
      this.locks.set(collectionName, lock);
    }

    await lock.acquire(mode);
    try {
      return await fn();
    } finally {
      lock.release(mode);
      if (lock.idle) this.locks.delete(collectionName);
    }
  }
}
