/**
 * createCallguard: composition root. Resolves the configuration once and
 * wires the cache, breaker registry, connection state machine, token cache
 * and dispatcher into a single set of handles.
 *
 * @module Session
 */

import { FileCacheStorage } from "../adapters/file-cache-storage.js";
import { MemoryCacheStorage } from "../adapters/memory-cache-storage.js";
import { StructuredLogger } from "../adapters/structured-logger.js";
import type { Logger } from "../interfaces/logger.js";
import type { PersistentCacheStorage } from "../interfaces/storage.js";
import type { SessionProvider } from "../interfaces/transport.js";
import { type CallguardConfig, resolveConfig, type ResolvedConfig } from "../types/config.js";
import { AntiForgeryTokenCache } from "./anti-forgery-token.js";
import { BreakerRegistry } from "./breaker-registry.js";
import { CacheStore } from "./cache-store.js";
import { CallDispatcher, type CredentialRefresher } from "./call-dispatcher.js";
import { ConnectionStateMachine } from "./connection-state-machine.js";
import type { RequestContext } from "./request-operation.js";

export interface CallguardOptions {
  session: SessionProvider;
  /** Base URL request paths are resolved against. */
  baseUrl: string;
  config?: CallguardConfig;
  /** Default: a StructuredLogger writing to stderr. */
  logger?: Logger;
  /** Overrides the storage chosen from `config.cache.directory`. */
  storage?: PersistentCacheStorage;
  /** Header carrying the anti-forgery token (default: "csrf"). */
  tokenHeader?: string;
  defaultHeaders?: Record<string, string>;
}

export interface Callguard {
  readonly config: ResolvedConfig;
  readonly logger: Logger;
  readonly cache: CacheStore;
  readonly breakers: BreakerRegistry;
  readonly connection: ConnectionStateMachine;
  readonly tokens: AntiForgeryTokenCache;
  readonly dispatcher: CallDispatcher;
  /** Shared context for `createRequestOperation` and ResourceClient subclasses. */
  readonly request: RequestContext;
  /** Load the persistent cache index now instead of on the first call. */
  start(): Promise<number>;
  dispose(): void;
}

function componentLogger(logger: Logger, component: string): Logger {
  return logger instanceof StructuredLogger ? logger.child(component) : logger;
}

export function createCallguard(options: CallguardOptions): Callguard {
  const config = resolveConfig(options.config);
  const logger = options.logger ?? new StructuredLogger({ component: "callguard" });
  const { session } = options;

  const storage =
    options.storage ??
    (config.cache.directory
      ? new FileCacheStorage({
          directory: config.cache.directory,
          compress: config.cache.compress,
          logger: componentLogger(logger, "cache-storage"),
        })
      : new MemoryCacheStorage());

  const cache = new CacheStore({
    storage,
    volatileTtlMs: config.cache.volatileTtlMs,
    logger: componentLogger(logger, "cache"),
  });
  const breakers = new BreakerRegistry({
    defaults: config.breaker,
    profiles: config.breakerProfiles,
    logger: componentLogger(logger, "breakers"),
  });
  const connection = new ConnectionStateMachine({
    historyLimit: config.stateHistoryLimit,
    logger: componentLogger(logger, "connection"),
  });
  const tokens = new AntiForgeryTokenCache({
    fetchToken: () => session.getAntiForgeryToken(),
    ttlMs: config.antiForgeryTokenTtlMs,
    logger: componentLogger(logger, "tokens"),
  });

  // A refresh replaces the session, so the token bound to the old one is dropped
  const credentials: CredentialRefresher = {
    refresh: async () => {
      try {
        return await session.refresh();
      } finally {
        tokens.invalidate();
      }
    },
  };

  const dispatcher = new CallDispatcher({
    cache,
    breakers,
    connection,
    credentials,
    config,
    logger: componentLogger(logger, "dispatcher"),
  });

  const request: RequestContext = {
    session,
    tokens,
    baseUrl: options.baseUrl,
    timeoutMs: config.requestTimeoutMs,
    tokenHeader: options.tokenHeader,
    defaultHeaders: options.defaultHeaders,
  };

  return {
    config,
    logger,
    cache,
    breakers,
    connection,
    tokens,
    dispatcher,
    request,
    start: () => cache.open(),
    dispose: () => {
      dispatcher.dispose();
      connection.dispose();
    },
  };
}
