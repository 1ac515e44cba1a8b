/**
 * @vestline/ledger — Reward-unit accounting primitives.
 *
 * - Checked bigint arithmetic (no wrap, no silent truncation)
 * - AdminCapability: a single administrator with two-step transfer
 * - InMemoryRewardLedger: the reference RewardLedger
 *
 * Design rules:
 * - All amounts are bigint
 * - Fail-closed: invalid operations throw, never silently succeed
 * - Zero runtime dependencies
 */

// Reward ledger
export { InMemoryRewardLedger } from "./reward-ledger.js";

// Access control
export { AdminCapability } from "./admin-capability.js";

// Amount arithmetic
export {
  assertAmount,
  checkedAdd,
  checkedSub,
  checkedMul,
  checkedDiv,
  mulDiv,
  toAmountString,
  parseAmountString,
  formatUnits,
} from "./amount-math.js";

// Types
export type {
  AmountErrorCode,
  AccessErrorCode,
  RewardLedgerErrorCode,
  IssuanceRecord,
  RewardLedgerSnapshot,
} from "./types.js";

export { AmountError, AccessError, RewardLedgerError } from "./types.js";
