// In-process serialization for avatar operations.
//
// Keyed operations (one user, the pool list) run FIFO per key and hold the
// gate shared; maintenance passes hold it exclusively, so they never observe
// a half-finished bind or removal.

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(() => undefined, () => undefined);
    this.tails.set(key, tail);
    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

export class ReadWriteGate {
  private readers = 0;
  private writer: Promise<void> | null = null;
  private drainWaiters: Array<() => void> = [];

  async shared<T>(task: () => Promise<T>): Promise<T> {
    while (this.writer) {
      await this.writer;
    }
    this.readers++;
    try {
      return await task();
    } finally {
      this.readers--;
      if (this.readers === 0) {
        this.drainWaiters.splice(0).forEach(wake => wake());
      }
    }
  }

  async exclusive<T>(task: () => Promise<T>): Promise<T> {
    while (this.writer) {
      await this.writer;
    }
    const run = this.waitForReaders().then(task);
    const gate = run.then(() => undefined, () => undefined);
    this.writer = gate;
    try {
      return await run;
    } finally {
      if (this.writer === gate) {
        this.writer = null;
      }
    }
  }

  get activeReaders(): number {
    return this.readers;
  }

  private waitForReaders(): Promise<void> {
    if (this.readers === 0) return Promise.resolve();
    return new Promise<void>(resolve => {
      this.drainWaiters.push(resolve);
    });
  }
}

export class OperationLocks {
  private mutex = new KeyedMutex();
  private gate = new ReadWriteGate();

  forUser<T>(userId: string, task: () => Promise<T>): Promise<T> {
    return this.gate.shared(() => this.mutex.runExclusive(`user:${userId}`, task));
  }

  forPool<T>(task: () => Promise<T>): Promise<T> {
    return this.gate.shared(() => this.mutex.runExclusive('pool', task));
  }

  forMaintenance<T>(task: () => Promise<T>): Promise<T> {
    return this.gate.exclusive(task);
  }
}
