/**
 * @vestline/sale — Sale types.
 */

import type { AccountId, Amount, UnixSeconds } from "@vestline/types";

// =============================================================================
// Errors
// =============================================================================

export type SaleErrorCode =
  | "ADMISSION_REJECTED"
  | "SALE_FINALIZED"
  | "ALREADY_FINALIZED"
  | "SALE_NOT_ENDED"
  | "SALE_ALREADY_STARTED"
  | "INVALID_CONFIGURATION"
  | "TRANSFER_FAILED";

/**
 * Why a contribution was turned away, in the order the checks run.
 */
export type AdmissionRejection =
  | "SALE_NOT_OPEN"
  | "CAP_EXCEEDED"
  | "NOT_AUTHORIZED"
  | "BELOW_MINIMUM"
  | "ABOVE_MAXIMUM";

export class SaleError extends Error {
  public readonly code: SaleErrorCode;
  /** Set when code is ADMISSION_REJECTED */
  public readonly reason: AdmissionRejection | undefined;

  constructor(code: SaleErrorCode, message: string, reason?: AdmissionRejection) {
    super(message);
    this.name = "SaleError";
    this.code = code;
    this.reason = reason;
  }
}

// =============================================================================
// State
// =============================================================================

export interface SaleWindow {
  readonly start: UnixSeconds;
  readonly end: UnixSeconds;
}

export type SaleStatus = "not-started" | "open" | "cap-reached" | "time-expired" | "finalized";

export interface SaleState {
  readonly window: SaleWindow;
  readonly capacity: Amount;
  readonly minContribution: Amount;
  readonly maxContribution: Amount;
  /** Reward units per contribution unit */
  readonly rate: Amount;
  /** Administrator reward units per contribution unit */
  readonly administratorRate: Amount;
  /** Share of a bonus allocation that vests, in whole percent */
  readonly bonusPercent: number;
  readonly totalRaised: Amount;
  readonly isFinalized: boolean;
}

// =============================================================================
// Results
// =============================================================================

export type AdmissionResult =
  | { readonly admitted: true }
  | {
      readonly admitted: false;
      readonly reason: AdmissionRejection;
      readonly message: string;
    };

export interface ContributionReceipt {
  readonly contributor: AccountId;
  readonly amount: Amount;
  readonly rewardUnits: Amount;
  readonly administratorUnits: Amount;
  readonly totalRaised: Amount;
}

export interface DirectIssueReceipt {
  readonly beneficiary: AccountId;
  readonly rewardUnits: Amount;
  readonly administratorUnits: Amount;
  readonly contributionEquivalent: Amount;
  readonly totalRaised: Amount;
}

export interface BonusAllocationReceipt {
  readonly beneficiary: AccountId;
  readonly allocationIndex: number;
  readonly administratorUnits: Amount;
  /** Held by the sale account and released through vesting */
  readonly vestedUnits: Amount;
  /** Issued to the beneficiary straight away */
  readonly immediateUnits: Amount;
}
