/**
 * @vestline/event-store — Audit event definitions.
 *
 * The catalogue of every audit record the sale core emits.
 *
 * Naming convention: `<subsystem>.<entity>.<action>`
 * Amounts are decimal strings; bigint does not survive JSON.
 */

import type { AccountId, AmountString } from "@vestline/types";

export const SALE_EVENTS = {
  // Vesting
  ALLOCATION_CREATED: "vesting.allocation.created",
  INTERVAL_ADVANCED: "vesting.interval.advanced",
  REWARD_CLAIMED: "vesting.reward.claimed",

  // Sale
  CONTRIBUTION_ACCEPTED: "sale.contribution.accepted",
  REWARD_ISSUED: "sale.reward.issued",
  BONUS_ALLOCATED: "sale.bonus.allocated",
  VESTING_RELEASED: "sale.vesting.released",
  SALE_FINALIZED: "sale.finalized",
  SETTING_CHANGED: "sale.setting.changed",

  // Shared
  ADMINISTRATOR_TRANSFERRED: "admin.transferred",
} as const;

export type SaleEventType = (typeof SALE_EVENTS)[keyof typeof SALE_EVENTS];

// =============================================================================
// Vesting Events
// =============================================================================

export type AllocationCreatedPayload = {
  readonly index: number;
  readonly beneficiary: AccountId;
  readonly amount: AmountString;
};

export type IntervalAdvancedPayload = {
  readonly interval: number;
  readonly numIntervals: number;
};

export type RewardClaimedPayload = {
  readonly index: number;
  readonly beneficiary: AccountId;
  readonly amount: AmountString;
  readonly interval: number;
};

// =============================================================================
// Sale Events
// =============================================================================

export type ContributionAcceptedPayload = {
  readonly contributor: AccountId;
  readonly amount: AmountString;
  readonly rewardUnits: AmountString;
  readonly administratorUnits: AmountString;
  readonly totalRaised: AmountString;
};

export type RewardIssuedPayload = {
  readonly beneficiary: AccountId;
  readonly rewardUnits: AmountString;
  readonly administratorUnits: AmountString;
  readonly contributionEquivalent: AmountString;
};

export type BonusAllocatedPayload = {
  readonly beneficiary: AccountId;
  readonly allocationIndex: number;
  readonly rewardUnits: AmountString;
  readonly administratorUnits: AmountString;
  readonly vestedUnits: AmountString;
  readonly immediateUnits: AmountString;
};

export type VestingReleasedPayload = {
  readonly interval: number;
  readonly releasedCount: number;
  readonly releasedUnits: AmountString;
};

export type SaleFinalizedPayload = {
  readonly totalRaised: AmountString;
  readonly vestingAdvanced: boolean;
};

export type SettingChangedPayload = {
  readonly setting: string;
  readonly value: string;
};

export type AdministratorTransferredPayload = {
  readonly from: AccountId;
  readonly to: AccountId;
};

/**
 * Payload type for each event type.
 */
export type SaleEventPayloads = {
  readonly "vesting.allocation.created": AllocationCreatedPayload;
  readonly "vesting.interval.advanced": IntervalAdvancedPayload;
  readonly "vesting.reward.claimed": RewardClaimedPayload;
  readonly "sale.contribution.accepted": ContributionAcceptedPayload;
  readonly "sale.reward.issued": RewardIssuedPayload;
  readonly "sale.bonus.allocated": BonusAllocatedPayload;
  readonly "sale.vesting.released": VestingReleasedPayload;
  readonly "sale.finalized": SaleFinalizedPayload;
  readonly "sale.setting.changed": SettingChangedPayload;
  readonly "admin.transferred": AdministratorTransferredPayload;
};

