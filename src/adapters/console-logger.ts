/**
 * Console-based Logger implementation.
 * Prefixes all output with a configurable tag (default: "callguard").
 */

import type { LogContext, Logger } from "../interfaces/logger.js";

type ConsoleMethod = "debug" | "log" | "warn" | "error";

export class ConsoleLogger implements Logger {
  private readonly prefix: string;

  constructor(prefix = "callguard") {
    this.prefix = prefix;
  }

  debug(msg: string, ctx?: LogContext): void {
    this.write("debug", msg, ctx);
  }

  info(msg: string, ctx?: LogContext): void {
    this.write("log", msg, ctx);
  }

  warn(msg: string, ctx?: LogContext): void {
    this.write("warn", msg, ctx);
  }

  error(msg: string, ctx?: LogContext): void {
    this.write("error", msg, ctx);
  }

  private write(method: ConsoleMethod, msg: string, ctx?: LogContext): void {
    const line = `[${this.prefix}] ${msg}`;
    if (ctx && Object.keys(ctx).length > 0) {
      console[method](line, ctx);
    } else {
      console[method](line);
    }
  }
}
