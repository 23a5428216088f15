import type { CallError } from "../errors.js";
import type { CacheEntry, CachePolicy } from "./cache.js";

export type CallOutcome<T> =
  | { ok: true; value: T; source: "live" | "cache" }
  | { ok: false; error: CallError; fallback?: CacheEntry<T> };

interface CallDescriptorBase<T> {
  /** Logical remote operation; one breaker per key. */
  endpointKey: string;
  /** Cache key prefixes removed after a successful call. */
  invalidates?: readonly string[];
  timeoutMs?: number;
  signal?: AbortSignal;
  operation: (signal: AbortSignal) => Promise<T>;
}

/** Uncached call, typically a mutation. */
export interface UncachedCallDescriptor<T> extends CallDescriptorBase<T> {
  cacheKey?: undefined;
}

export interface CachedCallDescriptor<T> extends CallDescriptorBase<T> {
  cacheKey: string;
  /**
   * Turns a stored value back into `T`. Persistent entries come back from disk,
   * so every cached read passes through here; throwing counts as a miss.
   */
  decode: (value: unknown) => T;
  /** A policy or the name of one from config (default: "default"). */
  cachePolicy?: CachePolicy | string;
  /** Skip the cache read and overwrite the entry on success. */
  forceRefresh?: boolean;
}

export type CallDescriptor<T> = UncachedCallDescriptor<T> | CachedCallDescriptor<T>;
