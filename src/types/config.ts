import { callguardConfigSchema } from "../config/config-schema.js";
import { ConfigError } from "../errors.js";
import type { CachePolicy } from "./cache.js";

export type BreakerSettings = {
  failureThreshold: number;
  recoveryTimeoutMs: number;
};

/** Callguard configuration; every field is optional and merged over defaults. */
export interface CallguardConfig {
  // Circuit breakers
  breaker?: Partial<BreakerSettings>; // default: 3 failures, 30000 ms recovery
  /** Overrides keyed by endpoint family (the part of an endpoint key before the first ":"). */
  breakerProfiles?: Record<string, BreakerSettings>;

  // Retries for transient failures
  retry?: {
    maxAttempts?: number; // default: 3
    baseDelayMs?: number; // default: 200
    maxDelayMs?: number; // default: 2000
    factor?: number; // default: 2
  };

  // Timeouts
  requestTimeoutMs?: number; // default: 10000
  throttleCooldownMs?: number; // default: 30000, when the remote sends no Retry-After
  antiForgeryTokenTtlMs?: number; // default: 1800000 (30 min)

  // Cache
  cache?: {
    volatileTtlMs?: number; // default: 60000
    directory?: string; // default: none (memory-backed persistent tier)
    compress?: boolean; // default: true
    policies?: Record<string, CachePolicy>;
  };

  stateHistoryLimit?: number; // default: 100
}

/** Fully resolved configuration with defaults applied. */
export type ResolvedConfig = {
  breaker: BreakerSettings;
  breakerProfiles: Record<string, BreakerSettings>;
  retry: Required<NonNullable<CallguardConfig["retry"]>>;
  requestTimeoutMs: number;
  throttleCooldownMs: number;
  antiForgeryTokenTtlMs: number;
  cache: {
    volatileTtlMs: number;
    directory: string | undefined;
    compress: boolean;
    policies: Record<string, CachePolicy>;
  };
  stateHistoryLimit: number;
};

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Record<string, unknown> ? DeepPartial<T[K]> : T[K];
};

export const DEFAULT_CONFIG: ResolvedConfig = {
  breaker: {
    failureThreshold: 3,
    recoveryTimeoutMs: 30000,
  },
  breakerProfiles: {
    music: { failureThreshold: 2, recoveryTimeoutMs: 20000 },
    device: { failureThreshold: 4, recoveryTimeoutMs: 60000 },
    alarm: { failureThreshold: 3, recoveryTimeoutMs: 30000 },
    routine: { failureThreshold: 3, recoveryTimeoutMs: 40000 },
  },
  retry: {
    maxAttempts: 3,
    baseDelayMs: 200,
    maxDelayMs: 2000,
    factor: 2,
  },
  requestTimeoutMs: 10000,
  throttleCooldownMs: 30000,
  antiForgeryTokenTtlMs: 1800000,
  cache: {
    volatileTtlMs: 60000,
    directory: undefined,
    compress: true,
    policies: {
      short: { tier: "volatile", volatileTtlMs: 60000 },
      default: { tier: "both", volatileTtlMs: 60000, persistentTtlMs: 300000 },
      routines: { tier: "both", volatileTtlMs: 60000, persistentTtlMs: 600000 },
      reference: { tier: "both", volatileTtlMs: 300000, persistentTtlMs: null },
    },
  },
  stateHistoryLimit: 100,
};

/** Deep merge objects, with user config taking precedence over defaults. */
function deepMerge<T extends Record<string, unknown>>(
  defaults: T,
  userConfig?: DeepPartial<T>,
): T {
  if (!userConfig) return defaults;

  const result = { ...defaults };
  for (const key in userConfig) {
    const userValue = userConfig[key];
    const defaultValue = defaults[key];
    if (userValue === undefined) continue;

    // Recursively merge nested objects
    if (
      userValue &&
      typeof userValue === "object" &&
      !Array.isArray(userValue) &&
      defaultValue &&
      typeof defaultValue === "object" &&
      !Array.isArray(defaultValue)
    ) {
      result[key] = deepMerge(
        defaultValue as Record<string, unknown>,
        userValue as Record<string, unknown>,
      ) as T[Extract<keyof T, string>];
    } else {
      result[key] = userValue as T[Extract<keyof T, string>];
    }
  }
  return result;
}

export function resolveConfig(config: CallguardConfig = {}): ResolvedConfig {
  // Validate user-provided config before merging
  const validation = callguardConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`, {
      cause: validation.error,
    });
  }

  const resolved = deepMerge(DEFAULT_CONFIG, config);

  if (resolved.retry.maxDelayMs < resolved.retry.baseDelayMs) {
    throw new ConfigError("Invalid configuration: retry.maxDelayMs is below retry.baseDelayMs");
  }
  return resolved;
}
