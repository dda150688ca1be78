const UNLOCKED = 0;
const LOCKED = 1;

/**
 * Blocking mutual-exclusion lock over a SharedArrayBuffer. Instances built
 * from the same buffer (for example one posted to a worker thread) share the
 * lock state. Not reentrant: locking twice from one thread never returns.
 */
export class SharedMutex {
  private readonly state: Int32Array;

  constructor(readonly buffer: SharedArrayBuffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT)) {
    this.state = new Int32Array(buffer);
  }

  lock(): void {
    while (Atomics.compareExchange(this.state, 0, UNLOCKED, LOCKED) !== UNLOCKED) {
      Atomics.wait(this.state, 0, LOCKED);
    }
  }

  unlock(): void {
    Atomics.store(this.state, 0, UNLOCKED);
    Atomics.notify(this.state, 0, 1);
  }

  /** Runs `fn` while holding the lock; the lock is released on every exit path. */
  runExclusive<T>(fn: () => T): T {
    this.lock();
    try {
      return fn();
    } finally {
      this.unlock();
    }
  }
}
