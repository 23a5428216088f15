import type { PersistedCacheRecord } from "../types/cache.js";

/**
 * Durable backing store for the persistent cache tier.
 * A missing store or an empty one is a cold start, never an error.
 */
export interface PersistentCacheStorage {
  /** Every readable record; unreadable ones are skipped. */
  list(): Promise<PersistedCacheRecord[]>;
  read(key: string): Promise<PersistedCacheRecord | null>;
  /** Replace the record for `record.key` in full, or reject leaving the previous one intact. */
  write(record: PersistedCacheRecord): Promise<void>;
  /** Returns false when there was nothing to remove. */
  remove(key: string): Promise<boolean>;
}
