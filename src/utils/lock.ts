// CHANGE: Serialise async work per key with reference-counted mutexes.
// WHY: Record writes lock a single record; different keys proceed independently.

import { Mutex } from "async-mutex";

/**
 * Keyed mutex map; a key's mutex is dropped once no caller holds or waits on it.
 */
export class KeyedMutex {
  private readonly mutexes = new Map<string, { mutex: Mutex; refCount: number }>();

  private acquireRef(key: string): Mutex {
    let entry = this.mutexes.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), refCount: 0 };
      this.mutexes.set(key, entry);
    }
    entry.refCount++;
    return entry.mutex;
  }

  private releaseRef(key: string): void {
    const entry = this.mutexes.get(key);
    if (entry) {
      entry.refCount--;
      if (entry.refCount === 0) {
        this.mutexes.delete(key);
      }
    }
  }

  /**
   * Run `task` once every earlier task for `key` has settled.
   */
  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const mutex = this.acquireRef(key);
    try {
      return await mutex.runExclusive(task);
    } finally {
      this.releaseRef(key);
    }
  }

  /**
   * Number of keys with a holder or waiter.
   */
  get size(): number {
    return this.mutexes.size;
  }
}
