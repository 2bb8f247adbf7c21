/**
 * @snipledger/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod,
 * and maps it onto ledger options.
 */

import { z } from "zod";
import type { LedgerLimits, LedgerOptions } from "@snipledger/ledger";

// =============================================================================
// Schema
// =============================================================================

const Integer = z.string().regex(/^\d+$/, "Expected a non-negative integer");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Role identities (engine defaults when unset)
  CURATOR_ADDRESS: z.string().optional(),
  TREASURY_ADDRESS: z.string().optional(),
  FULFILLER_ADDRESS: z.string().optional(),

  // Limits (engine defaults when unset)
  MAX_SNIPPET_BYTES: z.coerce.number().int().min(1).optional(),
  MIN_TIP_UNIT: Integer.transform((v) => BigInt(v)).optional(),
  TREASURY_FEE_BPS: Integer.transform((v) => BigInt(v))
    .refine((v) => v <= 10_000n, "Must be at most 10000")
    .optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/** Ledger options for the configured roles and limits. */
export function toLedgerOptions(config: AppConfig): LedgerOptions {
  const limits: Partial<LedgerLimits> = {
    maxSnippetBytes: config.MAX_SNIPPET_BYTES,
    minTipUnit: config.MIN_TIP_UNIT,
    treasuryFeeBps: config.TREASURY_FEE_BPS,
  };
  return {
    curator: config.CURATOR_ADDRESS,
    treasury: config.TREASURY_ADDRESS,
    fulfiller: config.FULFILLER_ADDRESS,
    limits,
  };
}
