/**
 * Writer-preferring read/write lock for one store instance
 *
 * Readers share the lock; a writer holds it alone. Once a writer is waiting,
 * new readers queue behind it. Acquisition is scoped: the lock is released on
 * every exit path of the callback.
 */

type Waiter = () => void;

export class ReadWriteLock {
  #readers = 0;
  #writing = false;
  #waitingWriters: Waiter[] = [];
  #waitingReaders: Waiter[] = [];

  /** Number of callbacks currently holding a read lock */
  get readers(): number {
    return this.#readers;
  }

  /** Whether a writer holds the lock */
  get writing(): boolean {
    return this.#writing;
  }

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.#acquireRead();
    try {
      return await fn();
    } finally {
      this.#releaseRead();
    }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.#acquireWrite();
    try {
      return await fn();
    } finally {
      this.#releaseWrite();
    }
  }

  async #acquireRead(): Promise<void> {
    if (!this.#writing && this.#waitingWriters.length === 0) {
      this.#readers++;
      return;
    }

    await new Promise<void>((resolve) => {
      this.#waitingReaders.push(resolve);
    });
  }

  async #acquireWrite(): Promise<void> {
    if (!this.#writing && this.#readers === 0) {
      this.#writing = true;
      return;
    }

    await new Promise<void>((resolve) => {
      this.#waitingWriters.push(resolve);
    });
  }

  #releaseRead(): void {
    this.#readers--;
    if (this.#readers === 0) {
      this.#handOff();
    }
  }

  #releaseWrite(): void {
    this.#writing = false;
    this.#handOff();
  }

  /**
   * Grant the lock to the next waiter: one writer first, otherwise every queued reader
   */
  #handOff(): void {
    const writer = this.#waitingWriters.shift();
    if (writer) {
      this.#writing = true;
      writer();
      return;
    }

    const readers = this.#waitingReaders;
    this.#waitingReaders = [];
    this.#readers += readers.length;
    for (const reader of readers) {
      reader();
    }
  }
}
