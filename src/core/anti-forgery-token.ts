/**
 * AntiForgeryTokenCache: holds the short-lived token the remote requires on
 * mutating requests, so every mutation does not go back to the session for it.
 *
 * @module Session
 */

import { AuthExpiredError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";

export interface AntiForgeryTokenCacheOptions {
  /** Usually `SessionProvider.getAntiForgeryToken`. */
  fetchToken: () => Promise<string>;
  ttlMs: number;
  minLength?: number; // default: 10
  logger?: Logger;
}

/** Printable ASCII without spaces: anything else cannot go into a header. */
const HEADER_SAFE = /^[\x21-\x7e]+$/;

export class AntiForgeryTokenCache {
  private token: string | null = null;
  private fetchedAt = 0;
  private pending: Promise<string> | null = null;

  private readonly fetchToken: () => Promise<string>;
  private readonly ttlMs: number;
  private readonly minLength: number;
  private readonly logger: Logger;

  constructor(options: AntiForgeryTokenCacheOptions) {
    this.fetchToken = options.fetchToken;
    this.ttlMs = options.ttlMs;
    this.minLength = options.minLength ?? 10;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * The cached token, fetching a new one once it is older than the TTL.
   * An invalid token rejects with AuthExpiredError so the dispatcher refreshes
   * the session.
   */
  get(): Promise<string> {
    if (this.token !== null && Date.now() - this.fetchedAt <= this.ttlMs) {
      return Promise.resolve(this.token);
    }
    if (!this.pending) {
      this.pending = this.fetchFresh().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  isValid(token: string): boolean {
    return token.length >= this.minLength && HEADER_SAFE.test(token);
  }

  /** Drop the cached token; the next `get()` fetches again. */
  invalidate(): void {
    this.token = null;
    this.fetchedAt = 0;
    this.logger.debug?.("Anti-forgery token invalidated");
  }

  private async fetchFresh(): Promise<string> {
    const token = await this.fetchToken();
    if (!this.isValid(token)) {
      this.invalidate();
      this.logger.warn("Session returned an invalid anti-forgery token", { length: token.length });
      throw new AuthExpiredError(false, {
        cause: new Error(`Anti-forgery token rejected (length ${token.length})`),
      });
    }
    this.token = token;
    this.fetchedAt = Date.now();
    this.logger.debug?.("Anti-forgery token refreshed", { ttlMs: this.ttlMs });
    return token;
  }
}
