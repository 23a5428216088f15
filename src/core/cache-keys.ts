/**
 * Cache key helpers shared by the dispatcher's callers.
 *
 * Keys are plain text: the endpoint and the canonical JSON of the params,
 * so distinct calls never share a key. File storage hashes keys for its
 * file names.
 */

/** JSON with object keys sorted at every level, so equal params give equal text. */
function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, nested: unknown) => {
    if (nested === null || typeof nested !== "object" || Array.isArray(nested)) return nested;
    return Object.fromEntries(
      Object.entries(nested).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
    );
  });
}

/**
 * Prefix shared by every key built from `endpoint` or a path below it; pass it
 * to `invalidate()` to drop the list and detail entries of a resource family.
 */
export function cacheKeyPrefix(endpoint: string): string {
  return `api:${endpoint}`;
}

/**
 * Deterministic key for `endpoint` called with `params`.
 *
 * @example makeCacheKey("/api/alarms", { limit: 5 }) // 'api:/api/alarms:{"limit":5}'
 */
export function makeCacheKey(endpoint: string, params: Record<string, unknown> = {}): string {
  return `${cacheKeyPrefix(endpoint)}:${canonicalJson(params)}`;
}
