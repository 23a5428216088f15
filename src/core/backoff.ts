export interface BackoffSettings {
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
}

/** Delay before retry number `retry` (1-based): base · factor^(retry-1), capped at maxDelayMs. */
export function backoffDelay(retry: number, settings: BackoffSettings): number {
  const exponential = settings.baseDelayMs * settings.factor ** Math.max(0, retry - 1);
  return Math.min(exponential, settings.maxDelayMs);
}

/**
 * Resolve after `ms`, or as soon as `signal` aborts. Never rejects; callers
 * check `signal.aborted` afterwards.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Parse a Retry-After header: delta-seconds or an HTTP date.
 * Returns milliseconds from `now`, or null when absent or unparseable.
 */
export function parseRetryAfter(value: string | null | undefined, now = Date.now()): number | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1000;
  }
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return null;
  return Math.max(0, at - now);
}
