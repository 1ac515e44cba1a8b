/**
 * @vestline/types — Shared domain types for the vested sale stack.
 *
 * These types are used across all packages:
 * - Financial primitives (accounts, amounts, time)
 * - Collaborator contracts (clock, authorization, reward ledger)
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Financial types
export type {
  AccountId,
  Amount,
  AmountString,
  UnixSeconds,
} from "./financial.js";
export { MAX_AMOUNT } from "./financial.js";

// Collaborators
export type {
  Clock,
  AuthorizationOracle,
  RewardLedger,
  UnitOfWork,
  Transactional,
} from "./collaborators.js";
export { SystemClock, ManualClock } from "./clock.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isAccountId,
  isAmountString,
  isTransactional,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
