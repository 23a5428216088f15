import type { Logger } from "../interfaces/logger.js";

/** Discards everything; the default wherever no logger is injected. */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export const noopLogger: Logger = new NoopLogger();
