/**
 * @vestline/vesting — Multi-interval vesting bookkeeping.
 *
 * @packageDocumentation
 */

export { VestingLedger } from "./vesting-ledger.js";
export type { VestingLedgerOptions } from "./vesting-ledger.js";

export type {
  VestingErrorCode,
  VestingSchedule,
  Allocation,
  ClaimResult,
  AllocationSnapshot,
  VestingLedgerSnapshot,
} from "./types.js";
export { VestingError } from "./types.js";
