/**
 * Financial Types
 *
 * Primitives shared by the reward ledger, the vesting ledger and the sale.
 *
 * Rules:
 * - Amounts are bigint integers in the smallest reward unit (no decimals)
 * - Amounts are never negative and never exceed MAX_AMOUNT
 * - Times are whole unix seconds
 */

/**
 * Opaque account identifier (wallet address, user id, service id...).
 */
export type AccountId = string;

/**
 * A non-negative integer quantity of reward units or contribution units.
 */
export type Amount = bigint;

/**
 * Whole seconds since the unix epoch.
 */
export type UnixSeconds = number;

/**
 * Largest representable amount: 2^256 - 1.
 * Any arithmetic result above this bound is an overflow.
 */
export const MAX_AMOUNT: Amount = (1n << 256n) - 1n;

/**
 * Wire form of an amount: a base-10 integer string.
 * Used in snapshots and event payloads, where bigint cannot travel as JSON.
 */
export type AmountString = string;
