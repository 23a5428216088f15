/**
 * Builds dispatcher operations for JSON requests against the remote service.
 *
 * @module Session
 */

import { HttpStatusError, PermanentError } from "../errors.js";
import type { HttpMethod, SessionProvider } from "../interfaces/transport.js";
import type { AntiForgeryTokenCache } from "./anti-forgery-token.js";
import { parseRetryAfter } from "./backoff.js";

export interface RequestContext {
  session: SessionProvider;
  tokens: AntiForgeryTokenCache;
  baseUrl: string;
  timeoutMs: number;
  /** Header carrying the anti-forgery token (default: "csrf"). */
  tokenHeader?: string;
  defaultHeaders?: Record<string, string>;
}

export type QueryValue = string | number | boolean | undefined;

export interface HttpRequest {
  method: HttpMethod;
  /** Path resolved against the context's base URL. */
  path: string;
  query?: Record<string, QueryValue>;
  /** Serialized as JSON. */
  body?: unknown;
  headers?: Record<string, string>;
}

const MUTATING: ReadonlySet<HttpMethod> = new Set(["POST", "PUT", "PATCH", "DELETE"]);

export function buildUrl(
  baseUrl: string,
  path: string,
  query: Record<string, QueryValue> = {},
): string {
  const url = new URL(path, baseUrl);
  for (const [name, value] of Object.entries(query)) {
    if (value !== undefined) url.searchParams.set(name, String(value));
  }
  return url.toString();
}

function parseBody(text: string): unknown {
  if (!text.trim()) return null;
  return JSON.parse(text);
}

/** An unparseable error body is kept as text. */
function errorBody(text: string): unknown {
  try {
    return parseBody(text);
  } catch {
    return text;
  }
}

/**
 * Operation for `execute()`: sends `req` through the session's transport and
 * resolves to the decoded JSON body (null for an empty one). A non-2xx
 * response rejects with HttpStatusError for the dispatcher to classify.
 */
export function createRequestOperation(
  context: RequestContext,
  req: HttpRequest,
): (signal: AbortSignal) => Promise<unknown> {
  const url = buildUrl(context.baseUrl, req.path, req.query);

  return async (signal) => {
    const headers: Record<string, string> = {
      Accept: "application/json",
      "Content-Type": "application/json; charset=UTF-8",
      ...context.defaultHeaders,
      ...req.headers,
    };
    if (MUTATING.has(req.method)) {
      headers[context.tokenHeader ?? "csrf"] = await context.tokens.get();
    }

    const transport = context.session.getTransport();
    const res = await transport({
      method: req.method,
      url,
      headers,
      body: req.body === undefined ? undefined : JSON.stringify(req.body),
      timeoutMs: context.timeoutMs,
      signal,
    });

    if (res.status < 200 || res.status >= 300) {
      throw new HttpStatusError(res.status, {
        retryAfterMs: parseRetryAfter(res.headers["retry-after"]),
        body: errorBody(res.body),
      });
    }

    try {
      return parseBody(res.body);
    } catch (err) {
      throw new PermanentError(`Response from ${req.path} is not valid JSON`, res.status, {
        cause: err,
      });
    }
  };
}
