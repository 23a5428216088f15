/**
 * ResourceClient: base class for business clients of one remote resource
 * family (alarms, devices, routines...). Subclasses describe requests; every
 * call goes through the shared dispatcher.
 *
 * @module Session
 */

import type { z } from "zod";
import type { CachePolicy } from "../types/cache.js";
import type { CallOutcome } from "../types/call.js";
import type { CallDispatcher } from "./call-dispatcher.js";
import { cacheKeyPrefix, makeCacheKey } from "./cache-keys.js";
import {
  createRequestOperation,
  type HttpRequest,
  type QueryValue,
  type RequestContext,
} from "./request-operation.js";

export interface ResourceClientOptions {
  dispatcher: CallDispatcher;
  request: RequestContext;
  /** Breaker family: endpoint keys are "<family>:<operation>". */
  family: string;
  /** Path whose cached entries are dropped after a successful mutation. */
  resourcePath: string;
  /** Default policy for reads (default: the dispatcher's "default"). */
  cachePolicy?: CachePolicy | string;
}

export interface ReadOptions {
  query?: Record<string, QueryValue>;
  cachePolicy?: CachePolicy | string;
  forceRefresh?: boolean;
  signal?: AbortSignal;
}

export interface MutateOptions {
  /** Extra cache prefixes to drop on success, besides the resource path's. */
  invalidates?: readonly string[];
  signal?: AbortSignal;
}

export abstract class ResourceClient {
  protected readonly dispatcher: CallDispatcher;
  protected readonly family: string;
  private readonly request: RequestContext;
  private readonly resourcePath: string;
  private readonly cachePolicy: CachePolicy | string | undefined;

  constructor(options: ResourceClientOptions) {
    this.dispatcher = options.dispatcher;
    this.request = options.request;
    this.family = options.family;
    this.resourcePath = options.resourcePath;
    this.cachePolicy = options.cachePolicy;
  }

  protected endpointKey(operation: string): string {
    return `${this.family}:${operation}`;
  }

  /** Cached GET of `path`, validated against `schema` both live and from cache. */
  protected read<T>(
    operation: string,
    path: string,
    schema: z.ZodType<T>,
    options: ReadOptions = {},
  ): Promise<CallOutcome<T>> {
    const send = createRequestOperation(this.request, {
      method: "GET",
      path,
      query: options.query,
    });
    return this.dispatcher.execute({
      endpointKey: this.endpointKey(operation),
      cacheKey: makeCacheKey(path, options.query),
      cachePolicy: options.cachePolicy ?? this.cachePolicy,
      forceRefresh: options.forceRefresh,
      decode: (value) => schema.parse(value),
      signal: options.signal,
      operation: async (signal) => schema.parse(await send(signal)),
    });
  }

  /** Uncached call; on success the resource family's cached reads are dropped. */
  protected mutate<T>(
    operation: string,
    req: HttpRequest,
    schema: z.ZodType<T>,
    options: MutateOptions = {},
  ): Promise<CallOutcome<T>> {
    const send = createRequestOperation(this.request, req);
    return this.dispatcher.execute({
      endpointKey: this.endpointKey(operation),
      invalidates: [cacheKeyPrefix(this.resourcePath), ...(options.invalidates ?? [])],
      signal: options.signal,
      operation: async (signal) => schema.parse(await send(signal)),
    });
  }
}
