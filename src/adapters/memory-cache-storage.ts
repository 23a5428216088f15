import type { PersistentCacheStorage } from "../interfaces/storage.js";
import type { PersistedCacheRecord } from "../types/cache.js";

/**
 * In-memory persistent-tier storage for tests and ephemeral use.
 * Records are deep-cloned on the way in and out, mirroring a serialize/parse round trip.
 */
export class MemoryCacheStorage implements PersistentCacheStorage {
  private readonly records = new Map<string, PersistedCacheRecord>();
  /** For testing: make the next writes reject. */
  failWrites = false;

  async list(): Promise<PersistedCacheRecord[]> {
    return [...this.records.values()].map(clone);
  }

  async read(key: string): Promise<PersistedCacheRecord | null> {
    const record = this.records.get(key);
    return record ? clone(record) : null;
  }

  async write(record: PersistedCacheRecord): Promise<void> {
    if (this.failWrites) {
      throw new Error(`Simulated write failure for ${record.key}`);
    }
    this.records.set(record.key, clone(record));
  }

  async remove(key: string): Promise<boolean> {
    return this.records.delete(key);
  }

  /** For testing: get the number of stored records. */
  get size(): number {
    return this.records.size;
  }

  /** For testing: clear all stored data. */
  clear(): void {
    this.records.clear();
  }
}

function clone(record: PersistedCacheRecord): PersistedCacheRecord {
  return structuredClone(record);
}
