import { StoreLockedError } from '../types/index.js';

/**
 * Releases a writer lock taken with `ByteStore.lock`
 */
export type Unlock = () => Promise<void>;

/**
 * Minimal keyed storage the snapshot store writes through. `put` must
 * replace the value atomically: a reader sees the old value or the new one,
 * never a mix.
 */
export interface ByteStore {
  get(key: string): Promise<string | null>;
  put(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
  /**
   * Take the exclusive writer lock for a key. Rejects with StoreLockedError
   * while another writer holds it; readers are never blocked.
   */
  lock(key: string): Promise<Unlock>;
  close?(): Promise<void>;
}

/**
 * In-process store for tests and dry runs
 */
export class MemoryByteStore implements ByteStore {
  private readonly values = new Map<string, string>();
  private readonly locks = new Set<string>();

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async put(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.values.delete(key);
  }

  async lock(key: string): Promise<Unlock> {
    if (this.locks.has(key)) {
      throw new StoreLockedError(`Snapshot "${key}" is locked by another monitor`, { key });
    }
    this.locks.add(key);
    return async () => {
      this.locks.delete(key);
    };
  }
}
