/**
 * Collaborator Interfaces
 *
 * The sale core talks to its surroundings only through these contracts.
 * Reference in-process implementations live in @vestline/ledger and
 * @vestline/sale; production deployments plug in their own.
 */

import type { AccountId, Amount, UnixSeconds } from "./financial.js";

/**
 * Source of "now". Read once per operation.
 */
export interface Clock {
  now(): UnixSeconds;
}

/**
 * Decides which accounts may contribute. Pure query.
 */
export interface AuthorizationOracle {
  isAuthorized(account: AccountId): boolean;
}

/**
 * Reward-unit ledger: balances, issuance and transfers.
 */
export interface RewardLedger {
  /** Mint `amount` new units to `account`. Throws once issuance is frozen. */
  issue(account: AccountId, amount: Amount): void;

  /** Move units between accounts. Returns false on insufficient balance. */
  transfer(from: AccountId, to: AccountId, amount: Amount): boolean;

  balanceOf(account: AccountId): Amount;

  /** One-way: no further issuance after this call. */
  freezeIssuance(): void;

  /** Bind the account on whose behalf issuance is performed. */
  setLedgerReference(account: AccountId): void;
}

// =============================================================================
// Units of work
// =============================================================================

/**
 * A pending set of changes on one component.
 */
export interface UnitOfWork {
  commit(): void;
  rollback(): void;
}

/**
 * A component whose mutations can be grouped and undone as a whole.
 */
export interface Transactional {
  begin(): UnitOfWork;
}
