/**
 * @settlekit/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Command-line flags take precedence over the environment.
 */

import { z } from "zod";
import type { DisputePolicy } from "@settlekit/ledger";
import { DEFAULT_DECIMALS } from "@settlekit/ledger";

// =============================================================================
// Schema
// =============================================================================

const PolicyDecisionSchema = z.enum(["reject", "allow"]);

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production"),

  // Amounts
  AMOUNT_DECIMALS: z.coerce.number().int().min(0).max(18).default(DEFAULT_DECIMALS),

  // Dispute policy
  LOCKED_ACCOUNT_DISPUTES: PolicyDecisionSchema.default("reject"),
  REDISPUTE_AFTER_CHARGEBACK: PolicyDecisionSchema.default("reject"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Flags as handed over by the command line parser.
 */
export const CliOptionsSchema = z.object({
  decimals: z.number().int().min(0).max(18).optional(),
  allowLockedDisputes: z.boolean().optional(),
  allowRedispute: z.boolean().optional(),
  strict: z.boolean().optional(),
  summary: z.boolean().optional(),
  digest: z.boolean().optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export interface ReplaySettings {
  readonly decimals: number;
  readonly policy: DisputePolicy;
  /** Abort on the first malformed row */
  readonly strict: boolean;
  /** Print an applied/rejected summary to stderr */
  readonly summary: boolean;
  /** Log the final state hash */
  readonly digest: boolean;
}

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

export function resolveSettings(config: AppConfig, options: CliOptions): ReplaySettings {
  return {
    decimals: options.decimals ?? config.AMOUNT_DECIMALS,
    policy: {
      lockedAccountDisputes:
        options.allowLockedDisputes === true ? "allow" : config.LOCKED_ACCOUNT_DISPUTES,
      redisputeAfterChargeback:
        options.allowRedispute === true ? "allow" : config.REDISPUTE_AFTER_CHARGEBACK,
    },
    strict: options.strict === true,
    summary: options.summary === true,
    digest: options.digest === true,
  };
}
