/**
 * @vestline/vesting — Types for the vesting ledger.
 *
 * Rules:
 * - Public views are readonly copies; the ledger owns the live records
 * - Amounts are bigint in memory, decimal strings in snapshots
 */

import type { AccountId, Amount, AmountString, UnixSeconds } from "@vestline/types";

// =============================================================================
// Errors
// =============================================================================

export type VestingErrorCode =
  | "INVALID_SCHEDULE"
  | "SCHEDULE_CLOSED"
  | "INVALID_AMOUNT"
  | "INDEX_OUT_OF_RANGE"
  | "INVALID_SNAPSHOT";

export class VestingError extends Error {
  public readonly code: VestingErrorCode;

  constructor(code: VestingErrorCode, message: string) {
    super(message);
    this.name = "VestingError";
    this.code = code;
  }
}

// =============================================================================
// Schedule
// =============================================================================

/**
 * When vesting unlocks and how it is split.
 *
 * Interval k (1-based) becomes due once `now > unlockDate + (k - 1) * intervalDuration`.
 */
export interface VestingSchedule {
  readonly unlockDate: UnixSeconds;
  /** Seconds between intervals. Must be > 0 */
  readonly intervalDuration: number;
  /** Number of release intervals. Must be >= 1 */
  readonly numIntervals: number;
}

// =============================================================================
// Allocations
// =============================================================================

export interface Allocation {
  readonly beneficiary: AccountId;
  readonly totalAllocation: Amount;
  readonly remainingBalance: Amount;
  /** Interval at which the beneficiary last claimed (0 = never) */
  readonly lastClaimedInterval: number;
  /** Reward due for the current interval */
  readonly currentReward: Amount;
}

/**
 * Outcome of a claim. `shouldRelease` is false when the allocation was
 * already claimed for the current interval; nothing changed in that case.
 */
export interface ClaimResult {
  readonly shouldRelease: boolean;
  readonly beneficiary: AccountId;
  readonly amount: Amount;
}

// =============================================================================
// Snapshot
// =============================================================================

export interface AllocationSnapshot {
  readonly beneficiary: AccountId;
  readonly totalAllocation: AmountString;
  readonly remainingBalance: AmountString;
  readonly lastClaimedInterval: number;
  readonly currentReward: AmountString;
}

export interface VestingLedgerSnapshot {
  readonly version: 1;
  readonly administrator: AccountId;
  readonly schedule: VestingSchedule;
  readonly currentInterval: number;
  readonly allocations: readonly AllocationSnapshot[];
}
