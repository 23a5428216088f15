import { z } from "zod";

const positiveMs = z.number().int().positive();
const nonNegativeMs = z.number().int().min(0);

const breakerSettings = z.object({
  failureThreshold: z.number().int().min(1),
  recoveryTimeoutMs: positiveMs,
});

export const cachePolicySchema = z
  .object({
    tier: z.enum(["volatile", "persistent", "both"]),
    volatileTtlMs: positiveMs.optional(),
    persistentTtlMs: positiveMs.nullable().optional(),
  })
  .refine((p) => p.tier === "volatile" || p.persistentTtlMs !== undefined, {
    message: "persistentTtlMs is required when the persistent tier is written",
  });

export const callguardConfigSchema = z
  .object({
    // Circuit breakers
    breaker: breakerSettings.partial().optional(),
    breakerProfiles: z.record(z.string().min(1), breakerSettings).optional(),

    // Retries for transient failures
    retry: z
      .object({
        maxAttempts: z.number().int().min(1).max(10),
        baseDelayMs: nonNegativeMs,
        maxDelayMs: nonNegativeMs,
        factor: z.number().min(1),
      })
      .partial()
      .optional(),

    // Timeouts
    requestTimeoutMs: positiveMs.optional(),
    throttleCooldownMs: positiveMs.optional(),
    antiForgeryTokenTtlMs: positiveMs.optional(),

    // Cache
    cache: z
      .object({
        volatileTtlMs: positiveMs,
        directory: z.string().min(1),
        compress: z.boolean(),
        policies: z.record(z.string().min(1), cachePolicySchema),
      })
      .partial()
      .optional(),

    // State machine
    stateHistoryLimit: z.number().int().min(1).optional(),
  })
  .strict();
