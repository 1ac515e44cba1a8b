/**
 * @vestline/ledger — Internal types for the reward ledger.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { AccountId, AmountString } from "@vestline/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for checked amount arithmetic. */
export type AmountErrorCode =
  | "OVERFLOW"
  | "UNDERFLOW"
  | "DIVISION_BY_ZERO"
  | "INVALID_AMOUNT";

/**
 * Structured error from amount arithmetic.
 * Always thrown — results never wrap or truncate silently.
 */
export class AmountError extends Error {
  public readonly code: AmountErrorCode;

  constructor(code: AmountErrorCode, message: string) {
    super(message);
    this.name = "AmountError";
    this.code = code;
  }
}

/** Error codes for administrator capability checks. */
export type AccessErrorCode =
  | "UNAUTHORIZED"
  | "NO_PENDING_TRANSFER"
  | "INVALID_ACCOUNT";

export class AccessError extends Error {
  public readonly code: AccessErrorCode;

  constructor(code: AccessErrorCode, message: string) {
    super(message);
    this.name = "AccessError";
    this.code = code;
  }
}

/** Error codes for the in-memory reward ledger. */
export type RewardLedgerErrorCode =
  | "ISSUANCE_FROZEN"
  | "NO_ISSUING_AGENT"
  | "INVALID_ACCOUNT"
  | "INVALID_SNAPSHOT";

export class RewardLedgerError extends Error {
  public readonly code: RewardLedgerErrorCode;

  constructor(code: RewardLedgerErrorCode, message: string) {
    super(message);
    this.name = "RewardLedgerError";
    this.code = code;
  }
}

// ─── Records ─────────────────────────────────────────────────────────────

/**
 * One call to issue(), kept in order of issuance.
 */
export interface IssuanceRecord {
  readonly sequence: number;
  readonly agent: AccountId;
  readonly account: AccountId;
  readonly amount: bigint;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the reward ledger.
 * Amounts are decimal strings so the snapshot survives JSON.
 */
export interface RewardLedgerSnapshot {
  readonly version: 1;
  readonly balances: readonly (readonly [AccountId, AmountString])[];
  readonly totalSupply: AmountString;
  readonly issuanceFrozen: boolean;
  readonly agent?: AccountId | undefined;
}
