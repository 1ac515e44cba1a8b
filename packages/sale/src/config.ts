/**
 * @vestline/sale — Configuration.
 *
 * Loads and validates sale terms from environment variables using Zod.
 * Amounts are decimal integer strings and come out as bigint.
 */

import { z } from "zod";
import { isAccountId, isAmountString } from "@vestline/types";

// =============================================================================
// Field types
// =============================================================================

const amount = z
  .string()
  .trim()
  .refine(isAmountString, { message: "Expected a non-negative integer amount" })
  .transform((value) => BigInt(value));

const unixSeconds = z.coerce.number().int().min(0);

const accountId = z.string().trim().refine(isAccountId, { message: "Expected an account id" });

// =============================================================================
// Schema
// =============================================================================

export const SaleConfigSchema = z
  .object({
    SALE_START: unixSeconds,
    SALE_END: unixSeconds,
    SALE_CAPACITY: amount,
    SALE_MIN_CONTRIBUTION: amount.default("1"),
    SALE_MAX_CONTRIBUTION: amount,
    SALE_RATE: amount,
    SALE_ADMINISTRATOR_RATE: amount.default("0"),
    SALE_BONUS_PERCENT: z.coerce.number().int().min(0).max(100).default(0),
    SALE_ADMINISTRATOR: accountId,
    SALE_ACCOUNT: accountId.default("sale"),

    // Vesting
    VESTING_UNLOCK_DATE: unixSeconds,
    VESTING_INTERVAL_SECONDS: z.coerce.number().int().min(1).default(2_592_000),
    VESTING_INTERVALS: z.coerce.number().int().min(1).default(4),

    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  })
  .superRefine((config, ctx) => {
    if (config.SALE_END <= config.SALE_START) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SALE_END"],
        message: "SALE_END must be after SALE_START",
      });
    }
    if (config.SALE_CAPACITY === 0n) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SALE_CAPACITY"],
        message: "SALE_CAPACITY must be positive",
      });
    }
    if (config.SALE_RATE === 0n) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SALE_RATE"],
        message: "SALE_RATE must be positive",
      });
    }
    if (config.SALE_MIN_CONTRIBUTION > config.SALE_MAX_CONTRIBUTION) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SALE_MAX_CONTRIBUTION"],
        message: "SALE_MAX_CONTRIBUTION must be at least SALE_MIN_CONTRIBUTION",
      });
    }
    if (config.VESTING_UNLOCK_DATE <= config.SALE_START) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["VESTING_UNLOCK_DATE"],
        message: "VESTING_UNLOCK_DATE must be after SALE_START",
      });
    }
  });

export type SaleConfig = z.infer<typeof SaleConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate sale configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadSaleConfig(
  env: Record<string, string | undefined> = process.env,
): SaleConfig {
  return SaleConfigSchema.parse(env);
}
