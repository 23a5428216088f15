/**
 * Callguard public API barrel.
 *
 * Re-exports the composition root, core components, contracts, adapters and
 * types that make up the public surface area of the `callguard` package.
 * @module
 */

// Adapters
export type { ConsecutiveFailureBreakerOptions } from "./adapters/consecutive-failure-breaker.js";
export { ConsecutiveFailureBreaker } from "./adapters/consecutive-failure-breaker.js";
export { ConsoleLogger } from "./adapters/console-logger.js";
export type { FetchTransportOptions } from "./adapters/fetch-transport.js";
export { createFetchTransport } from "./adapters/fetch-transport.js";
export type { FileCacheStorageOptions } from "./adapters/file-cache-storage.js";
export { CACHE_SCHEMA_VERSION, FileCacheStorage } from "./adapters/file-cache-storage.js";
export { MemoryCacheStorage } from "./adapters/memory-cache-storage.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, parseLogLevel, StructuredLogger } from "./adapters/structured-logger.js";
// Configuration
export { callguardConfigSchema } from "./config/config-schema.js";
// Core
export type { AntiForgeryTokenCacheOptions } from "./core/anti-forgery-token.js";
export { AntiForgeryTokenCache } from "./core/anti-forgery-token.js";
export type { BackoffSettings } from "./core/backoff.js";
export { backoffDelay, parseRetryAfter } from "./core/backoff.js";
export type {
  BreakerRegistryEvents,
  BreakerRegistryOptions,
  BreakerStateChange,
} from "./core/breaker-registry.js";
export { BreakerRegistry, endpointFamily } from "./core/breaker-registry.js";
export { cacheKeyPrefix, makeCacheKey } from "./core/cache-keys.js";
export type { CacheStoreOptions, CacheWriteResult } from "./core/cache-store.js";
export { CacheStore, isExpired } from "./core/cache-store.js";
export type {
  CallDispatcherOptions,
  CredentialRefresher,
  DispatcherConfig,
} from "./core/call-dispatcher.js";
export { CallDispatcher } from "./core/call-dispatcher.js";
export type { Callguard, CallguardOptions } from "./core/callguard.js";
export { createCallguard } from "./core/callguard.js";
export type {
  ConnectionStateChange,
  ConnectionStateEvents,
  ConnectionStateMachineOptions,
} from "./core/connection-state-machine.js";
export { ConnectionStateMachine, nextConnectionState } from "./core/connection-state-machine.js";
export type { FailureClass } from "./core/failure-classifier.js";
export { classifyFailure } from "./core/failure-classifier.js";
export type { HttpRequest, QueryValue, RequestContext } from "./core/request-operation.js";
export { buildUrl, createRequestOperation } from "./core/request-operation.js";
export type {
  MutateOptions,
  ReadOptions,
  ResourceClientOptions,
} from "./core/resource-client.js";
export { ResourceClient } from "./core/resource-client.js";
export { TypedEventEmitter } from "./core/typed-emitter.js";
// Errors
export type { CallError, CallErrorKind, TransientReason } from "./errors.js";
export {
  AuthExpiredError,
  CallguardError,
  CircuitOpenError,
  ConfigError,
  errorMessage,
  HttpStatusError,
  NotReadyError,
  PermanentError,
  StateTransitionError,
  StorageError,
  ThrottledError,
  toCallguardError,
  TransientError,
} from "./errors.js";
// Interfaces
export type {
  BreakerSnapshot,
  BreakerState,
  CircuitBreaker,
} from "./interfaces/circuit-breaker.js";
export type { LogContext, Logger } from "./interfaces/logger.js";
export type { PersistentCacheStorage } from "./interfaces/storage.js";
export type {
  HttpMethod,
  SessionProvider,
  Transport,
  TransportRequest,
  TransportResponse,
} from "./interfaces/transport.js";
// Types
export type {
  CacheEntry,
  CacheLookup,
  CachePolicy,
  CacheSource,
  CacheStats,
  CacheTier,
  PersistedCacheRecord,
} from "./types/cache.js";
export type {
  CachedCallDescriptor,
  CallDescriptor,
  CallOutcome,
  UncachedCallDescriptor,
} from "./types/call.js";
export type { BreakerSettings, CallguardConfig, ResolvedConfig } from "./types/config.js";
export { DEFAULT_CONFIG, resolveConfig } from "./types/config.js";
export type { ConnectionEvent, ConnectionState } from "./types/connection.js";
export { CONNECTION_EVENTS, CONNECTION_STATES } from "./types/connection.js";
// Utilities
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
