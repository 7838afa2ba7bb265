type LockMode = 'read' | 'write';

interface Waiter {
  readonly mode: LockMode;
  readonly grant: () => void;
}

export interface ReaderWriterLock {
  withReadLock<T>(fn: () => Promise<T>): Promise<T>;
  withWriteLock<T>(fn: () => Promise<T>): Promise<T>;
}

/**
 * Store-wide lock: any number of concurrent readers, or a single writer.
 * Waiters are granted in arrival order, so a queued writer holds back
 * readers that arrive after it. Not reentrant.
 */
export function createReaderWriterLock(): ReaderWriterLock {
  const queue: Waiter[] = [];
  let activeReaders = 0;
  let writerActive = false;

  function grantWaiting(): void {
    while (queue.length > 0) {
      const next = queue[0];

      if (next.mode === 'write') {
        if (writerActive || activeReaders > 0) {
          return;
        }
        queue.shift();
        writerActive = true;
        next.grant();
        return;
      }

      if (writerActive) {
        return;
      }
      queue.shift();
      activeReaders++;
      next.grant();
    }
  }

  function acquire(mode: LockMode): Promise<void> {
    return new Promise((resolve) => {
      queue.push({ mode, grant: resolve });
      grantWaiting();
    });
  }

  function release(mode: LockMode): void {
    if (mode === 'write') {
      writerActive = false;
    } else {
      activeReaders--;
    }
    grantWaiting();
  }

  async function run<T>(mode: LockMode, fn: () => Promise<T>): Promise<T> {
    await acquire(mode);
    try {
      return await fn();
    } finally {
      release(mode);
    }
  }

  return {
    withReadLock: <T>(fn: () => Promise<T>): Promise<T> => run('read', fn),
    withWriteLock: <T>(fn: () => Promise<T>): Promise<T> => run('write', fn),
  };
}
