/**
 * Structured logger contract shared by every component of the access layer.
 * StructuredLogger and ConsoleLogger implement it; the cache store, breaker
 * registry, state machine and dispatcher only ever see this interface.
 * @module
 */

export type LogContext = Record<string, unknown>;

/** `debug` is optional so thin sinks can skip it. */
export interface Logger {
  debug?(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}
