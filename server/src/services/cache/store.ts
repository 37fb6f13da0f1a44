export interface CacheRecord {
  payload: string;
  createdAt: number; // epoch ms
}

/** Key-value backend for the subtitle cache. Operations are atomic per key only. */
export interface CacheStore {
  get(key: string): Promise<CacheRecord | undefined>;
  set(key: string, record: CacheRecord): Promise<void>;
  delete(key: string): Promise<boolean>;
  /** Removes every entry present when the call starts; returns how many went. */
  clear(): Promise<number>;
}

export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, CacheRecord>();

  constructor(private readonly maxEntries = 1000) {}

  get size() {
    return this.entries.size;
  }

  async get(key: string) {
    return this.entries.get(key);
  }

  async set(key: string, record: CacheRecord) {
    // Re-insert so overwritten keys move to the back of the eviction order
    this.entries.delete(key);
    this.entries.set(key, record);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  async delete(key: string) {
    return this.entries.delete(key);
  }

  async clear() {
    let removed = 0;
    for (const key of Array.from(this.entries.keys())) {
      if (this.entries.delete(key)) removed++;
    }
    return removed;
  }
}
