export type CacheTier = "volatile" | "persistent";

/** Whether a value came from a live remote call or was stored as a fallback. */
export type CacheSource = "live" | "fallback";

export interface CacheEntry<T = unknown> {
  key: string;
  value: T;
  /** Epoch ms. */
  storedAt: number;
  /** null = no expiry. */
  ttlMs: number | null;
  tier: CacheTier;
  source: CacheSource;
}

export interface CachePolicy {
  tier: CacheTier | "both";
  /** Volatile lifetime; falls back to the store's default. */
  volatileTtlMs?: number;
  /** Persistent lifetime; null = no expiry. */
  persistentTtlMs?: number | null;
}

export type CacheLookup<T = unknown> =
  | { hit: true; value: T; entry: CacheEntry<T> }
  | { hit: false };

/** Record shape handed to persistent storage. */
export interface PersistedCacheRecord {
  key: string;
  value: unknown;
  storedAt: number;
  ttlMs: number | null;
  source: CacheSource;
}

export interface CacheStats {
  hits: number;
  misses: number;
  writes: number;
  invalidations: number;
  hitRate: number;
  volatileEntries: number;
  persistentEntries: number;
}
