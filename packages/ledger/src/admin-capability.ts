/**
 * Administrator capability — a single fixed administrator identity.
 *
 * Every gated operation calls `assert(caller)` before touching state.
 * Handing the capability to another account is explicit and two-step:
 *
 *   propose(admin, next) → accept(next)
 *
 * Until `accept` runs, the current administrator keeps full control
 * and may `cancel` the proposal.
 */

import { isAccountId } from "@vestline/types";
import type { AccountId } from "@vestline/types";
import { AccessError } from "./types.js";

export class AdminCapability {
  private _admin: AccountId;
  private _pending: AccountId | undefined;

  constructor(admin: AccountId) {
    this._admin = AdminCapability.validated(admin);
  }

  get admin(): AccountId {
    return this._admin;
  }

  get pending(): AccountId | undefined {
    return this._pending;
  }

  isAdmin(caller: AccountId): boolean {
    return caller === this._admin;
  }

  /**
   * Throw UNAUTHORIZED unless `caller` holds the capability.
   */
  assert(caller: AccountId, action?: string): void {
    if (!this.isAdmin(caller)) {
      const what = action !== undefined ? ` to ${action}` : "";
      throw new AccessError(
        "UNAUTHORIZED",
        `'${caller}' is not authorized${what}`,
      );
    }
  }

  /**
   * Nominate the next administrator. Replaces any earlier proposal.
   */
  propose(caller: AccountId, next: AccountId): void {
    this.assert(caller, "transfer administration");
    this._pending = AdminCapability.validated(next);
  }

  /**
   * Complete a transfer. Only the nominated account may accept.
   */
  accept(caller: AccountId): void {
    if (this._pending === undefined) {
      throw new AccessError("NO_PENDING_TRANSFER", "No administrator transfer is pending");
    }
    if (caller !== this._pending) {
      throw new AccessError(
        "UNAUTHORIZED",
        `'${caller}' is not the proposed administrator`,
      );
    }
    this._admin = this._pending;
    this._pending = undefined;
  }

  cancel(caller: AccountId): void {
    this.assert(caller, "cancel an administrator transfer");
    if (this._pending === undefined) {
      throw new AccessError("NO_PENDING_TRANSFER", "No administrator transfer is pending");
    }
    this._pending = undefined;
  }

  private static validated(account: AccountId): AccountId {
    if (!isAccountId(account)) {
      throw new AccessError("INVALID_ACCOUNT", "Administrator must be a non-empty account id");
    }
    return account;
  }
}
