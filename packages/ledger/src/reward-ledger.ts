/**
 * @vestline/ledger — In-memory RewardLedger.
 *
 * Holds reward-unit balances for a single process. Suitable for tests,
 * the demo and hosts that persist state through snapshots.
 *
 * API surface:
 * - setLedgerReference() — bind the issuing agent
 * - issue() — mint units (until issuance is frozen)
 * - transfer() — move units; false on insufficient balance
 * - freezeIssuance() — one-way stop on minting
 * - begin() — unit of work for all-or-nothing composite operations
 * - snapshot() / fromSnapshot()
 */

import { isAccountId } from "@vestline/types";
import type {
  AccountId,
  Amount,
  RewardLedger,
  Transactional,
  UnitOfWork,
} from "@vestline/types";
import {
  assertAmount,
  checkedAdd,
  checkedSub,
  parseAmountString,
  toAmountString,
} from "./amount-math.js";
import type { IssuanceRecord, RewardLedgerSnapshot } from "./types.js";
import { RewardLedgerError } from "./types.js";

export class InMemoryRewardLedger implements RewardLedger, Transactional {
  private _balances = new Map<AccountId, Amount>();
  private _totalSupply: Amount = 0n;
  private _issuanceFrozen = false;
  private _agent: AccountId | undefined;
  private readonly _issuances: IssuanceRecord[] = [];

  // ─── Wiring ──────────────────────────────────────────────────────────

  setLedgerReference(account: AccountId): void {
    this.requireAccount(account);
    this._agent = account;
  }

  get agent(): AccountId | undefined {
    return this._agent;
  }

  // ─── Issuance ────────────────────────────────────────────────────────

  /**
   * Mint `amount` units to `account` on behalf of the bound agent.
   * Supply and balance are both checked before either is written.
   */
  issue(account: AccountId, amount: Amount): void {
    if (this._issuanceFrozen) {
      throw new RewardLedgerError("ISSUANCE_FROZEN", "Issuance has been frozen");
    }
    const agent = this._agent;
    if (agent === undefined) {
      throw new RewardLedgerError(
        "NO_ISSUING_AGENT",
        "No issuing agent is bound; call setLedgerReference first",
      );
    }
    this.requireAccount(account);
    assertAmount(amount);

    const supply = checkedAdd(this._totalSupply, amount);
    const balance = checkedAdd(this.balanceOf(account), amount);

    this._totalSupply = supply;
    this._balances.set(account, balance);
    this._issuances.push({
      sequence: this._issuances.length + 1,
      agent,
      account,
      amount,
    });
  }

  freezeIssuance(): void {
    this._issuanceFrozen = true;
  }

  get issuanceFrozen(): boolean {
    return this._issuanceFrozen;
  }

  /**
   * Issuance history in order. Not carried through snapshots.
   */
  issuances(): readonly IssuanceRecord[] {
    return [...this._issuances];
  }

  // ─── Balances ────────────────────────────────────────────────────────

  transfer(from: AccountId, to: AccountId, amount: Amount): boolean {
    this.requireAccount(from);
    this.requireAccount(to);
    assertAmount(amount);

    const fromBalance = this.balanceOf(from);
    if (fromBalance < amount) {
      return false;
    }
    if (from === to) {
      return true;
    }

    const toBalance = checkedAdd(this.balanceOf(to), amount);
    this._balances.set(from, checkedSub(fromBalance, amount));
    this._balances.set(to, toBalance);
    return true;
  }

  balanceOf(account: AccountId): Amount {
    return this._balances.get(account) ?? 0n;
  }

  get totalSupply(): Amount {
    return this._totalSupply;
  }

  /**
   * Accounts holding a non-zero balance.
   */
  holders(): readonly AccountId[] {
    return [...this._balances.entries()]
      .filter(([, balance]) => balance > 0n)
      .map(([account]) => account);
  }

  // ─── Unit of work ────────────────────────────────────────────────────

  begin(): UnitOfWork {
    const balances = new Map(this._balances);
    const totalSupply = this._totalSupply;
    const issuanceFrozen = this._issuanceFrozen;
    const agent = this._agent;
    const issuanceCount = this._issuances.length;

    return {
      commit: () => undefined,
      rollback: () => {
        this._balances = balances;
        this._totalSupply = totalSupply;
        this._issuanceFrozen = issuanceFrozen;
        this._agent = agent;
        this._issuances.length = issuanceCount;
      },
    };
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): RewardLedgerSnapshot {
    return {
      version: 1,
      balances: [...this._balances.entries()].map(
        ([account, balance]) => [account, toAmountString(balance)] as const,
      ),
      totalSupply: toAmountString(this._totalSupply),
      issuanceFrozen: this._issuanceFrozen,
      agent: this._agent,
    };
  }

  static fromSnapshot(snapshot: RewardLedgerSnapshot): InMemoryRewardLedger {
    const ledger = new InMemoryRewardLedger();
    let sum = 0n;
    for (const [account, balance] of snapshot.balances) {
      ledger.requireAccount(account);
      if (ledger._balances.has(account)) {
        throw new RewardLedgerError("INVALID_SNAPSHOT", `Account '${account}' appears twice`);
      }
      const value = parseAmountString(balance);
      ledger._balances.set(account, value);
      sum = checkedAdd(sum, value);
    }
    const totalSupply = parseAmountString(snapshot.totalSupply);
    if (sum !== totalSupply) {
      throw new RewardLedgerError(
        "INVALID_SNAPSHOT",
        `Snapshot balances sum to ${sum.toString()} but total supply is ${snapshot.totalSupply}`,
      );
    }
    ledger._totalSupply = totalSupply;
    ledger._issuanceFrozen = snapshot.issuanceFrozen;
    if (snapshot.agent !== undefined) {
      ledger.setLedgerReference(snapshot.agent);
    }
    return ledger;
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private requireAccount(account: AccountId): void {
    if (!isAccountId(account)) {
      throw new RewardLedgerError("INVALID_ACCOUNT", `Invalid account id: "${account}"`);
    }
  }
}
