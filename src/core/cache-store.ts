/**
 * CacheStore: two-tier key/value cache in front of the remote service.
 *
 * The volatile tier is an in-process Map with short lifetimes. The persistent
 * tier is mirrored in memory and written through to a PersistentCacheStorage,
 * so it survives restarts and can serve stale data during an outage.
 *
 * Writes for one key are serialized; a failed persistent write changes
 * neither tier. When the index cannot be listed at startup, persistent
 * lookups read through to the storage one key at a time.
 *
 * @module Cache
 */

import { errorMessage, StorageError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { PersistentCacheStorage } from "../interfaces/storage.js";
import type {
  CacheEntry,
  CacheLookup,
  CachePolicy,
  CacheSource,
  CacheStats,
  PersistedCacheRecord,
} from "../types/cache.js";
import { KeyedLock } from "../utils/keyed-lock.js";
import { noopLogger } from "../utils/noop-logger.js";

export type CacheWriteResult = { ok: true } | { ok: false; error: StorageError };

export interface CacheStoreOptions {
  storage: PersistentCacheStorage;
  /** Volatile lifetime when a policy gives none. */
  volatileTtlMs: number;
  logger?: Logger;
}

/** An entry is expired once strictly more than `ttlMs` has passed since it was stored. */
export function isExpired(
  entry: { storedAt: number; ttlMs: number | null },
  now = Date.now(),
): boolean {
  return entry.ttlMs !== null && now - entry.storedAt > entry.ttlMs;
}

/** Milliseconds left before expiry; null for entries that never expire. */
function remainingLife(record: PersistedCacheRecord, now: number): number | null {
  return record.ttlMs === null ? null : record.ttlMs - (now - record.storedAt);
}

function writesVolatile(policy: CachePolicy): boolean {
  return policy.tier !== "persistent";
}

function writesPersistent(policy: CachePolicy): boolean {
  return policy.tier !== "volatile";
}

export class CacheStore {
  private readonly volatile = new Map<string, CacheEntry>();
  private readonly persistent = new Map<string, PersistedCacheRecord>();
  private readonly locks = new KeyedLock();
  private readonly storage: PersistentCacheStorage;
  private readonly volatileTtlMs: number;
  private readonly logger: Logger;
  private opening: Promise<number> | null = null;
  private indexed = false;
  /** Keys whose persistent state this process already knows, for read-through mode. */
  private readonly settled = new Set<string>();

  private hits = 0;
  private misses = 0;
  private writes = 0;
  private invalidations = 0;

  constructor(options: CacheStoreOptions) {
    this.storage = options.storage;
    this.volatileTtlMs = options.volatileTtlMs;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Load the persistent index. Called lazily by every other operation, so an
   * explicit call only moves the cost to startup. Resolves to the number of
   * entries loaded; a storage that cannot be listed is a cold start.
   */
  open(): Promise<number> {
    if (!this.opening) {
      this.opening = this.loadIndex();
    }
    return this.opening;
  }

  async get(key: string): Promise<CacheLookup> {
    await this.open();
    const now = Date.now();

    const hot = this.volatile.get(key);
    if (hot && !isExpired(hot, now)) {
      this.hits++;
      this.logger.debug?.("Cache hit", { key, tier: "volatile" });
      return { hit: true, value: hot.value, entry: hot };
    }

    const record = await this.persistentRecord(key);
    if (record && !isExpired(record, now)) {
      this.hits++;
      this.backfill(record, now);
      this.logger.debug?.("Cache hit", { key, tier: "persistent" });
      const entry = toEntry(record);
      return { hit: true, value: entry.value, entry };
    }

    this.misses++;
    this.logger.debug?.("Cache miss", { key });
    return { hit: false };
  }

  /** The persistent entry for `key` even when it has expired, for serving during outages. */
  async getStale(key: string): Promise<CacheEntry | null> {
    await this.open();
    const record = await this.persistentRecord(key);
    return record ? toEntry(record) : null;
  }

  put(
    key: string,
    value: unknown,
    policy: CachePolicy,
    source: CacheSource = "live",
  ): Promise<CacheWriteResult> {
    return this.locks.run(key, async () => {
      await this.open();
      const now = Date.now();

      // Persistent side first: if it fails nothing else has changed
      let persistentTtlMs: number | null = null;
      try {
        if (writesPersistent(policy)) {
          persistentTtlMs = policy.persistentTtlMs ?? null;
          const record: PersistedCacheRecord = {
            key,
            value,
            storedAt: now,
            ttlMs: persistentTtlMs,
            source,
          };
          await this.storage.write(record);
          this.persistent.set(key, record);
        } else if (this.persistent.has(key)) {
          await this.storage.remove(key);
          this.persistent.delete(key);
        }
      } catch (err) {
        const error =
          err instanceof StorageError
            ? err
            : new StorageError(`Failed to persist cache entry ${key}: ${errorMessage(err)}`, {
                cause: err,
              });
        this.logger.error("Cache write failed", { key, error });
        return { ok: false, error };
      }
      this.settled.add(key);

      if (writesVolatile(policy)) {
        let ttlMs = policy.volatileTtlMs ?? this.volatileTtlMs;
        if (persistentTtlMs !== null) ttlMs = Math.min(ttlMs, persistentTtlMs);
        this.volatile.set(key, { key, value, storedAt: now, ttlMs, tier: "volatile", source });
      } else {
        this.volatile.delete(key);
      }

      this.writes++;
      this.logger.debug?.("Cache write", { key, tier: policy.tier });
      return { ok: true };
    });
  }

  /**
   * Remove every entry in both tiers whose key starts with `prefix`.
   * Resolves to the number of keys removed; a second call finds nothing.
   * In read-through mode only keys this process has seen are matched.
   */
  async invalidate(prefix: string): Promise<number> {
    await this.open();
    const keys = this.keysMatching((key) => key.startsWith(prefix));
    const removed = await Promise.all(keys.map((key) => this.removeKey(key)));
    const count = removed.filter(Boolean).length;
    this.invalidations += count;
    if (count > 0) {
      this.logger.debug?.("Cache invalidated", { prefix, count });
    }
    return count;
  }

  /**
   * Drop expired entries from both tiers. Persistent entries are otherwise
   * kept past expiry for stale fallback, so this is the only eviction.
   * Resolves to the number of persistent entries removed.
   */
  async cleanExpired(): Promise<number> {
    await this.open();
    const now = Date.now();
    for (const [key, entry] of this.volatile) {
      if (isExpired(entry, now)) this.volatile.delete(key);
    }

    const expired = [...this.persistent.values()]
      .filter((record) => isExpired(record, now))
      .map((record) => record.key);
    const removed = await Promise.all(expired.map((key) => this.removeKey(key)));
    const count = removed.filter(Boolean).length;
    if (count > 0) {
      this.logger.info("Removed expired cache entries", { count });
    }
    return count;
  }

  /** Remove every key except `preserveKeys`. Resolves to the number removed. */
  async clear(preserveKeys: readonly string[] = []): Promise<number> {
    await this.open();
    const keep = new Set(preserveKeys);
    const keys = this.keysMatching((key) => !keep.has(key));
    const removed = await Promise.all(keys.map((key) => this.removeKey(key)));
    const count = removed.filter(Boolean).length;
    this.logger.info("Cache cleared", { removed: count, preserved: keep.size });
    return count;
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      writes: this.writes,
      invalidations: this.invalidations,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
      volatileEntries: this.volatile.size,
      persistentEntries: this.persistent.size,
    };
  }

  private async loadIndex(): Promise<number> {
    let records: PersistedCacheRecord[];
    try {
      records = await this.storage.list();
    } catch (err) {
      this.logger.warn("Persistent cache unreadable, starting cold", { error: err });
      return 0;
    }
    for (const record of records) {
      this.persistent.set(record.key, record);
    }
    this.indexed = true;
    this.logger.info("Persistent cache loaded", { entries: records.length });
    return records.length;
  }

  /**
   * The persistent record for `key`. Without a loaded index, a key not yet
   * seen by this process is read from storage once and remembered.
   */
  private async persistentRecord(key: string): Promise<PersistedCacheRecord | undefined> {
    const known = this.persistent.get(key);
    if (known || this.indexed || this.settled.has(key)) return known;

    return this.locks.run(key, async () => {
      if (this.settled.has(key)) return this.persistent.get(key);
      try {
        const record = await this.storage.read(key);
        this.settled.add(key);
        if (!record) return undefined;
        this.persistent.set(key, record);
        return record;
      } catch (err) {
        this.logger.warn("Persistent cache read failed", { key, error: err });
        return undefined;
      }
    });
  }

  /** Copy a live persistent record into the volatile tier without outliving it. */
  private backfill(record: PersistedCacheRecord, now: number): void {
    const remaining = remainingLife(record, now);
    const ttlMs = remaining === null ? this.volatileTtlMs : Math.min(this.volatileTtlMs, remaining);
    this.volatile.set(record.key, {
      key: record.key,
      value: record.value,
      storedAt: now,
      ttlMs,
      tier: "volatile",
      source: record.source,
    });
  }

  private keysMatching(predicate: (key: string) => boolean): string[] {
    const keys = new Set([...this.volatile.keys(), ...this.persistent.keys()]);
    return [...keys].filter(predicate);
  }

  /**
   * Remove one key from both tiers under its lock. When the storage refuses,
   * the entry still leaves memory so this process stops serving it.
   */
  private removeKey(key: string): Promise<boolean> {
    return this.locks.run(key, async () => {
      this.settled.add(key);
      let removed = this.volatile.delete(key);
      if (this.persistent.delete(key)) {
        removed = true;
        try {
          await this.storage.remove(key);
        } catch (err) {
          this.logger.error("Failed to remove persistent cache entry", { key, error: err });
        }
      }
      return removed;
    });
  }
}

function toEntry(record: PersistedCacheRecord): CacheEntry {
  return {
    key: record.key,
    value: record.value,
    storedAt: record.storedAt,
    ttlMs: record.ttlMs,
    tier: "persistent",
    source: record.source,
  };
}
