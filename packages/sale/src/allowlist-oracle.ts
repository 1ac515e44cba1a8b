/**
 * AllowlistOracle — an AuthorizationOracle backed by an explicit allowlist.
 *
 * The list has a single owner. Only the owner may add or remove accounts.
 */

import { isAccountId } from "@vestline/types";
import type { AccountId, AuthorizationOracle } from "@vestline/types";
import { AccessError, AdminCapability } from "@vestline/ledger";

export class AllowlistOracle implements AuthorizationOracle {
  private readonly owner: AdminCapability;
  private readonly allowed = new Set<AccountId>();

  constructor(owner: AccountId, initial: Iterable<AccountId> = []) {
    this.owner = new AdminCapability(owner);
    for (const account of initial) {
      this.allowed.add(requireAccount(account));
    }
  }

  isAuthorized(account: AccountId): boolean {
    return this.allowed.has(account);
  }

  add(caller: AccountId, account: AccountId): void {
    this.owner.assert(caller, "edit the allowlist");
    this.allowed.add(requireAccount(account));
  }

  /**
   * Add several accounts. Either all are added or, on an invalid id, none.
   */
  addMany(caller: AccountId, accounts: readonly AccountId[]): void {
    this.owner.assert(caller, "edit the allowlist");
    const valid = accounts.map(requireAccount);
    for (const account of valid) {
      this.allowed.add(account);
    }
  }

  /**
   * @returns whether the account was on the list
   */
  remove(caller: AccountId, account: AccountId): boolean {
    this.owner.assert(caller, "edit the allowlist");
    return this.allowed.delete(account);
  }

  get size(): number {
    return this.allowed.size;
  }

  accounts(): readonly AccountId[] {
    return [...this.allowed];
  }
}

function requireAccount(account: AccountId): AccountId {
  if (!isAccountId(account)) {
    throw new AccessError("INVALID_ACCOUNT", `Invalid account id: "${account}"`);
  }
  return account;
}
