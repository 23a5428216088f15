/**
 * Transport over the global fetch, attaching the session's cookies.
 */

import type { Transport, TransportRequest, TransportResponse } from "../interfaces/transport.js";

export interface FetchTransportOptions {
  /** Cookie header value for the authenticated session. */
  cookies?: () => string | Promise<string>;
  /** Headers sent with every request; request headers win. */
  defaultHeaders?: Record<string, string>;
  fetch?: typeof globalThis.fetch;
}

function headersToRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, name) => {
    record[name] = value;
  });
  return record;
}

/** One signal that aborts on the request timeout or when `external` aborts. */
function requestSignal(
  timeoutMs: number,
  external?: AbortSignal,
): { signal: AbortSignal; cleanup: () => void } {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new DOMException(`Request timed out after ${timeoutMs}ms`, "TimeoutError"));
  }, timeoutMs);
  const onAbort = () => controller.abort(external?.reason);

  if (external?.aborted) {
    onAbort();
  } else {
    external?.addEventListener("abort", onAbort, { once: true });
  }

  return {
    signal: controller.signal,
    cleanup: () => {
      clearTimeout(timer);
      external?.removeEventListener("abort", onAbort);
    },
  };
}

export function createFetchTransport(options: FetchTransportOptions = {}): Transport {
  const doFetch = options.fetch ?? globalThis.fetch;

  return async (request: TransportRequest): Promise<TransportResponse> => {
    const headers: Record<string, string> = { ...options.defaultHeaders, ...request.headers };
    const cookie = options.cookies ? await options.cookies() : "";
    if (cookie) headers.Cookie = cookie;

    const { signal, cleanup } = requestSignal(request.timeoutMs, request.signal);
    try {
      const res = await doFetch(request.url, {
        method: request.method,
        headers,
        body: request.body,
        signal,
      });
      return {
        status: res.status,
        headers: headersToRecord(res.headers),
        body: await res.text(),
      };
    } finally {
      cleanup();
    }
  };
}
