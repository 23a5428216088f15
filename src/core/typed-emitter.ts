import { EventEmitter } from "node:events";

/**
 * Type-safe event emitter built on node:events.
 *
 * Usage:
 * ```ts
 * interface RegistryEvents {
 *   "breaker:state": { endpointKey: string; from: BreakerState; to: BreakerState };
 * }
 * class Registry extends TypedEventEmitter<RegistryEvents> {}
 * ```
 */
// biome-ignore lint/suspicious/noExplicitAny: generic constraint must accept any event payload shape
export class TypedEventEmitter<TEvents extends Record<string, any>> {
  private readonly emitter = new EventEmitter();

  constructor() {
    // Every business client built on one dispatcher may subscribe
    this.emitter.setMaxListeners(100);
  }

  on<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
    if (event) {
      this.emitter.removeAllListeners(event);
    } else {
      this.emitter.removeAllListeners();
    }
    return this;
  }

  listenerCount<K extends keyof TEvents & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }

  protected emit<K extends keyof TEvents & string>(event: K, payload: TEvents[K]): boolean {
    return this.emitter.emit(event, payload);
  }
}
