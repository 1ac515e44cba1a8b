/**
 * SaleController — capped, time-boxed contribution sale with vested bonuses.
 *
 * Accepts contributions from authorized accounts during the sale window,
 * issues reward units at a fixed rate, pays the administrator a share of
 * every issuance, and routes bonus allocations through a VestingLedger
 * whose units it holds until each interval is released.
 *
 * Lifecycle:
 *
 *   not-started → open → { cap-reached | time-expired } → finalized
 *
 * Every mutating operation is all-or-nothing: it runs inside a unit of
 * work spanning the controller, the vesting ledger, the reward ledger and
 * the audit trail (each that supports one). Any throw rolls all of them back.
 */

import { isAccountId, isTransactional } from "@vestline/types";
import type {
  AccountId,
  Amount,
  AuthorizationOracle,
  Clock,
  RewardLedger,
  Transactional,
  UnitOfWork,
  UnixSeconds,
} from "@vestline/types";
import {
  AdminCapability,
  assertAmount,
  checkedAdd,
  checkedDiv,
  checkedMul,
  checkedSub,
  mulDiv,
  toAmountString,
} from "@vestline/ledger";
import { SALE_EVENTS } from "@vestline/event-store";
import type { AuditTrail, SaleEventPayloads, SaleEventType } from "@vestline/event-store";
import type { VestingLedger } from "@vestline/vesting";
import type { Logger } from "pino";
import { silentLogger } from "./logger.js";
import { TimedWindow } from "./timed-window.js";
import type {
  AdmissionResult,
  BonusAllocationReceipt,
  ContributionReceipt,
  DirectIssueReceipt,
  SaleState,
  SaleStatus,
  SaleWindow,
} from "./types.js";
import { SaleError } from "./types.js";

export interface SaleControllerOptions {
  readonly administrator: AccountId;
  /** The controller's own identity: issuing agent, vesting administrator, bonus holder */
  readonly account: AccountId;
  readonly window: SaleWindow;
  readonly capacity: Amount;
  readonly minContribution: Amount;
  readonly maxContribution: Amount;
  readonly rate: Amount;
  readonly administratorRate: Amount;
  readonly bonusPercent: number;
  /** Receives the administrator share. Default: administrator */
  readonly administratorWallet?: AccountId | undefined;
  readonly clock: Clock;
  readonly authorizationOracle: AuthorizationOracle;
  readonly rewardLedger: RewardLedger;
  readonly vestingLedger: VestingLedger;
  readonly audit?: AuditTrail | undefined;
  readonly logger?: Logger | undefined;
  /** Called once, when the sale is finalized */
  readonly onFinalize?: ((state: SaleState) => void) | undefined;
}

export class SaleController {
  private readonly _admin: AdminCapability;
  private readonly _account: AccountId;
  private readonly _administratorWallet: AccountId;
  private readonly _minContribution: Amount;
  private readonly _rate: Amount;
  private readonly _administratorRate: Amount;
  private readonly _bonusPercent: number;
  private readonly _clock: Clock;
  private readonly _audit: AuditTrail | undefined;
  private readonly _logger: Logger;
  private readonly _onFinalize: ((state: SaleState) => void) | undefined;

  private _window: TimedWindow;
  private _capacity: Amount;
  private _maxContribution: Amount;
  private _oracle: AuthorizationOracle;
  private _rewards: RewardLedger;
  private _vesting: VestingLedger;
  private _totalRaised: Amount = 0n;
  private _finalized = false;

  constructor(options: SaleControllerOptions) {
    validateTerms(options);
    this._admin = new AdminCapability(options.administrator);
    if (!isAccountId(options.account)) {
      throw new SaleError("INVALID_CONFIGURATION", "Sale account must be a non-empty account id");
    }
    this._account = options.account;
    this._administratorWallet = options.administratorWallet ?? options.administrator;
    if (!isAccountId(this._administratorWallet)) {
      throw new SaleError("INVALID_CONFIGURATION", "Administrator wallet must be a non-empty account id");
    }

    this._window = new TimedWindow(options.window);
    this._capacity = options.capacity;
    this._minContribution = options.minContribution;
    this._maxContribution = options.maxContribution;
    this._rate = options.rate;
    this._administratorRate = options.administratorRate;
    this._bonusPercent = options.bonusPercent;

    this._clock = options.clock;
    this._oracle = options.authorizationOracle;
    this._vesting = this.requireVestingLedger(options.vestingLedger);
    this._rewards = options.rewardLedger;
    this._rewards.setLedgerReference(this._account);
    this._audit = options.audit;
    this._logger = options.logger ?? silentLogger();
    this._onFinalize = options.onFinalize;
  }

  // ─── Admission ───────────────────────────────────────────────────────

  /**
   * Would `contributor` be allowed to contribute `amount` right now?
   * Pure query. The first failing condition is reported.
   */
  checkAdmission(contributor: AccountId, amount: Amount): AdmissionResult {
    return this.admission(this._clock.now(), contributor, amount);
  }

  // ─── Contributions ───────────────────────────────────────────────────

  /**
   * Accept a contribution and issue its rewards.
   *
   * @throws SaleError ADMISSION_REJECTED, with the rejection reason, when not admitted
   */
  acceptContribution(contributor: AccountId, amount: Amount): ContributionReceipt {
    return this.atomically(() => {
      const admission = this.admission(this._clock.now(), contributor, amount);
      if (!admission.admitted) {
        this._logger.debug(
          { contributor, amount: amount.toString(), reason: admission.reason },
          "Contribution rejected",
        );
        throw new SaleError("ADMISSION_REJECTED", admission.message, admission.reason);
      }

      const rewardUnits = checkedMul(amount, this._rate);
      const administratorUnits = checkedMul(amount, this._administratorRate);
      const totalRaised = checkedAdd(this._totalRaised, amount);

      this._rewards.issue(contributor, rewardUnits);
      this.issueAdministratorShare(administratorUnits);
      this._totalRaised = totalRaised;

      this.record(contributor, SALE_EVENTS.CONTRIBUTION_ACCEPTED, {
        contributor,
        amount: toAmountString(amount),
        rewardUnits: toAmountString(rewardUnits),
        administratorUnits: toAmountString(administratorUnits),
        totalRaised: toAmountString(totalRaised),
      });
      this._logger.info(
        {
          contributor,
          amount: amount.toString(),
          rewardUnits: rewardUnits.toString(),
          totalRaised: totalRaised.toString(),
        },
        "Contribution accepted",
      );

      return { contributor, amount, rewardUnits, administratorUnits, totalRaised };
    });
  }

  /**
   * Issue rewards without a contribution, e.g. for payment received elsewhere.
   * Counts `rewardAmount / rate` toward the amount raised. No admission checks.
   */
  directIssue(caller: AccountId, beneficiary: AccountId, rewardAmount: Amount): DirectIssueReceipt {
    return this.atomically(() => {
      this._admin.assert(caller, "issue rewards");
      this.requireNotFinalized();
      assertAmount(rewardAmount, "reward amount");

      const contributionEquivalent = checkedDiv(rewardAmount, this._rate);
      const administratorUnits = mulDiv(this._administratorRate, rewardAmount, this._rate);
      const totalRaised = checkedAdd(this._totalRaised, contributionEquivalent);

      this._rewards.issue(beneficiary, rewardAmount);
      this.issueAdministratorShare(administratorUnits);
      this._totalRaised = totalRaised;

      this.record(caller, SALE_EVENTS.REWARD_ISSUED, {
        beneficiary,
        rewardUnits: toAmountString(rewardAmount),
        administratorUnits: toAmountString(administratorUnits),
        contributionEquivalent: toAmountString(contributionEquivalent),
      });
      this._logger.info(
        { beneficiary, rewardUnits: rewardAmount.toString() },
        "Rewards issued directly",
      );

      return {
        beneficiary,
        rewardUnits: rewardAmount,
        administratorUnits,
        contributionEquivalent,
        totalRaised,
      };
    });
  }

  /**
   * Grant rewards of which `bonusPercent` vests over the vesting schedule.
   *
   *   administrator share = administratorRate × reward / rate
   *   vested share        = bonusPercent × reward / 100 (held by the sale account)
   *   immediate share     = reward − vested share
   *
   * The amount raised is unchanged.
   */
  createBonusAllocation(
    caller: AccountId,
    beneficiary: AccountId,
    rewardAmount: Amount,
  ): BonusAllocationReceipt {
    return this.atomically(() => {
      this._admin.assert(caller, "create bonus allocations");
      this.requireNotFinalized();
      assertAmount(rewardAmount, "reward amount");

      const administratorUnits = mulDiv(this._administratorRate, rewardAmount, this._rate);
      const vestedUnits = mulDiv(BigInt(this._bonusPercent), rewardAmount, 100n);
      const immediateUnits = checkedSub(rewardAmount, vestedUnits);

      this.issueAdministratorShare(administratorUnits);
      this._rewards.issue(this._account, vestedUnits);
      const allocationIndex = this._vesting.createAllocation(this._account, beneficiary, vestedUnits);
      this._rewards.issue(beneficiary, immediateUnits);

      this.record(caller, SALE_EVENTS.BONUS_ALLOCATED, {
        beneficiary,
        allocationIndex,
        rewardUnits: toAmountString(rewardAmount),
        administratorUnits: toAmountString(administratorUnits),
        vestedUnits: toAmountString(vestedUnits),
        immediateUnits: toAmountString(immediateUnits),
      });
      this._logger.info(
        {
          beneficiary,
          allocationIndex,
          vestedUnits: vestedUnits.toString(),
          immediateUnits: immediateUnits.toString(),
        },
        "Bonus allocated",
      );

      return { beneficiary, allocationIndex, administratorUnits, vestedUnits, immediateUnits };
    });
  }

  // ─── Vesting ─────────────────────────────────────────────────────────

  /**
   * Advance the vesting interval and pay out everything due.
   *
   * @returns false when no interval was due; nothing changes then
   * @throws SaleError TRANSFER_FAILED if the sale account cannot cover a release
   */
  releaseVestedRewards(caller: AccountId): boolean {
    return this.atomically(() => {
      this._admin.assert(caller, "release vested rewards");
      return this.release(caller);
    });
  }

  // ─── Finalization ────────────────────────────────────────────────────

  /**
   * Close the sale for good: freeze issuance and run one last release.
   */
  finalize(caller: AccountId): void {
    this.atomically(() => {
      this._admin.assert(caller, "finalize the sale");
      if (this._finalized) {
        throw new SaleError("ALREADY_FINALIZED", "The sale has already been finalized");
      }
      if (!this.endedAt(this._clock.now())) {
        throw new SaleError(
          "SALE_NOT_ENDED",
          "The sale can only be finalized after it ends or reaches its cap",
        );
      }

      this._rewards.freezeIssuance();
      const vestingAdvanced = this.release(caller);
      this._finalized = true;
      this._onFinalize?.(this.state());

      this.record(caller, SALE_EVENTS.SALE_FINALIZED, {
        totalRaised: toAmountString(this._totalRaised),
        vestingAdvanced,
      });
      this._logger.info(
        { totalRaised: this._totalRaised.toString(), vestingAdvanced },
        "Sale finalized",
      );
    });
  }

  // ─── Settings ────────────────────────────────────────────────────────

  setAuthorizationOracle(caller: AccountId, oracle: AuthorizationOracle): void {
    this.atomically(() => {
      this._admin.assert(caller, "replace the authorization oracle");
      this.requireNotStarted("authorization oracle");
      this._oracle = oracle;
      this.recordSetting(caller, "authorizationOracle", "replaced");
    });
  }

  setVestingLedger(caller: AccountId, ledger: VestingLedger): void {
    this.atomically(() => {
      this._admin.assert(caller, "replace the vesting ledger");
      this.requireNotStarted("vesting ledger");
      this._vesting = this.requireVestingLedger(ledger);
      this.recordSetting(caller, "vestingLedger", "replaced");
    });
  }

  /**
   * Swap the reward ledger and bind it to the sale account.
   */
  setRewardLedger(caller: AccountId, ledger: RewardLedger): void {
    this.atomically(() => {
      this._admin.assert(caller, "replace the reward ledger");
      this.requireNotStarted("reward ledger");
      this._rewards = ledger;
      this.recordSetting(caller, "rewardLedger", "replaced");
    });
    // Bound only once the swap has committed; a rejected swap leaves the ledger untouched.
    ledger.setLedgerReference(this._account);
  }

  setCapacity(caller: AccountId, capacity: Amount): void {
    this.atomically(() => {
      this._admin.assert(caller, "change the capacity");
      if (capacity <= 0n) {
        throw new SaleError("INVALID_CONFIGURATION", "Capacity must be positive");
      }
      assertAmount(capacity, "capacity");
      this._capacity = capacity;
      this.recordSetting(caller, "capacity", capacity.toString());
    });
  }

  setMaxContribution(caller: AccountId, maxContribution: Amount): void {
    this.atomically(() => {
      this._admin.assert(caller, "change the maximum contribution");
      if (maxContribution < this._minContribution) {
        throw new SaleError(
          "INVALID_CONFIGURATION",
          `Maximum contribution must be at least the minimum (${this._minContribution.toString()})`,
        );
      }
      assertAmount(maxContribution, "maximum contribution");
      this._maxContribution = maxContribution;
      this.recordSetting(caller, "maxContribution", maxContribution.toString());
    });
  }

  setEndTime(caller: AccountId, end: UnixSeconds): void {
    this.atomically(() => {
      this._admin.assert(caller, "change the end time");
      this.requireNotFinalized();
      this._window = this._window.withEnd(end);
      this.recordSetting(caller, "endTime", String(end));
    });
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  status(): SaleStatus {
    const now = this._clock.now();
    if (this._finalized) return "finalized";
    if (!this._window.hasStarted(now)) return "not-started";
    if (this.capReached()) return "cap-reached";
    if (this._window.hasExpired(now)) return "time-expired";
    return "open";
  }

  hasStarted(): boolean {
    return this._window.hasStarted(this._clock.now());
  }

  /**
   * Past the end time, or out of capacity.
   */
  hasEnded(): boolean {
    return this.endedAt(this._clock.now());
  }

  capReached(): boolean {
    return this._totalRaised >= this._capacity;
  }

  remainingCapacity(): Amount {
    return this._capacity > this._totalRaised ? this._capacity - this._totalRaised : 0n;
  }

  get totalRaised(): Amount {
    return this._totalRaised;
  }

  get isFinalized(): boolean {
    return this._finalized;
  }

  get account(): AccountId {
    return this._account;
  }

  get administratorWallet(): AccountId {
    return this._administratorWallet;
  }

  get rewardLedger(): RewardLedger {
    return this._rewards;
  }

  get vestingLedger(): VestingLedger {
    return this._vesting;
  }

  state(): SaleState {
    return {
      window: this._window.toJSON(),
      capacity: this._capacity,
      minContribution: this._minContribution,
      maxContribution: this._maxContribution,
      rate: this._rate,
      administratorRate: this._administratorRate,
      bonusPercent: this._bonusPercent,
      totalRaised: this._totalRaised,
      isFinalized: this._finalized,
    };
  }

  // ─── Administration ──────────────────────────────────────────────────

  get administrator(): AccountId {
    return this._admin.admin;
  }

  proposeAdministrator(caller: AccountId, next: AccountId): void {
    this._admin.propose(caller, next);
  }

  acceptAdministrator(caller: AccountId): void {
    this.atomically(() => {
      const previous = this._admin.admin;
      this._admin.accept(caller);
      this.record(caller, SALE_EVENTS.ADMINISTRATOR_TRANSFERRED, { from: previous, to: caller });
    });
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private admission(now: UnixSeconds, contributor: AccountId, amount: Amount): AdmissionResult {
    if (this._finalized || !this._window.isOpen(now)) {
      return { admitted: false, reason: "SALE_NOT_OPEN", message: "The sale is not open" };
    }
    if (this._totalRaised + amount > this._capacity) {
      return {
        admitted: false,
        reason: "CAP_EXCEEDED",
        message: `Contribution would exceed the cap; ${this.remainingCapacity().toString()} remaining`,
      };
    }
    if (!this._oracle.isAuthorized(contributor)) {
      return {
        admitted: false,
        reason: "NOT_AUTHORIZED",
        message: `'${contributor}' is not authorized to contribute`,
      };
    }
    if (amount <= 0n || amount < this._minContribution) {
      return {
        admitted: false,
        reason: "BELOW_MINIMUM",
        message: `Contribution is below the minimum of ${this._minContribution.toString()}`,
      };
    }
    const contributed = checkedDiv(this._rewards.balanceOf(contributor), this._rate);
    if (amount + contributed > this._maxContribution) {
      return {
        admitted: false,
        reason: "ABOVE_MAXIMUM",
        message: `Contribution would exceed the maximum of ${this._maxContribution.toString()} per account`,
      };
    }
    return { admitted: true };
  }

  private release(actor: AccountId): boolean {
    const vesting = this._vesting;
    if (!vesting.advanceInterval(this._account)) {
      return false;
    }

    let releasedCount = 0;
    let releasedUnits = 0n;
    for (let index = 0; index < vesting.count(); index++) {
      const claim = vesting.claim(this._account, index);
      if (!claim.shouldRelease) continue;

      if (!this._rewards.transfer(this._account, claim.beneficiary, claim.amount)) {
        throw new SaleError(
          "TRANSFER_FAILED",
          `Could not release ${claim.amount.toString()} to '${claim.beneficiary}'`,
        );
      }
      releasedCount++;
      releasedUnits = checkedAdd(releasedUnits, claim.amount);
    }

    const interval = vesting.currentInterval;
    this.record(actor, SALE_EVENTS.VESTING_RELEASED, {
      interval,
      releasedCount,
      releasedUnits: toAmountString(releasedUnits),
    });
    this._logger.info(
      { interval, releasedCount, releasedUnits: releasedUnits.toString() },
      "Vested rewards released",
    );
    return true;
  }

  private endedAt(now: UnixSeconds): boolean {
    return this._window.hasExpired(now) || this.capReached();
  }

  private issueAdministratorShare(units: Amount): void {
    if (units > 0n) {
      this._rewards.issue(this._administratorWallet, units);
    }
  }

  private requireNotFinalized(): void {
    if (this._finalized) {
      throw new SaleError("SALE_FINALIZED", "The sale has been finalized");
    }
  }

  private requireNotStarted(what: string): void {
    if (this._window.hasStarted(this._clock.now())) {
      throw new SaleError(
        "SALE_ALREADY_STARTED",
        `The ${what} cannot be replaced once the sale has started`,
      );
    }
  }

  private requireVestingLedger(ledger: VestingLedger): VestingLedger {
    if (ledger.administrator !== this._account) {
      throw new SaleError(
        "INVALID_CONFIGURATION",
        `Vesting ledger must be administered by the sale account '${this._account}'`,
      );
    }
    return ledger;
  }

  private record<T extends SaleEventType>(
    actor: AccountId,
    type: T,
    payload: SaleEventPayloads[T],
  ): void {
    this._audit?.record("sale", actor, type, payload);
  }

  private recordSetting(actor: AccountId, setting: string, value: string): void {
    this.record(actor, SALE_EVENTS.SETTING_CHANGED, { setting, value });
    this._logger.info({ setting, value }, "Sale setting changed");
  }

  // ─── Units of work ───────────────────────────────────────────────────

  private atomically<T>(work: () => T): T {
    const participants: Transactional[] = [{ begin: () => this.beginState() }];
    for (const collaborator of [this._vesting, this._rewards]) {
      if (isTransactional(collaborator)) participants.push(collaborator);
    }
    if (this._audit !== undefined) participants.push(this._audit);

    const units = participants.map((p) => p.begin());
    try {
      const result = work();
      // Audit flush first: if the store refuses the batch, nothing else has committed yet.
      for (const unit of [...units].reverse()) unit.commit();
      return result;
    } catch (err) {
      for (const unit of [...units].reverse()) unit.rollback();
      throw err;
    }
  }

  private beginState(): UnitOfWork {
    const saved = {
      window: this._window,
      capacity: this._capacity,
      maxContribution: this._maxContribution,
      oracle: this._oracle,
      rewards: this._rewards,
      vesting: this._vesting,
      totalRaised: this._totalRaised,
      finalized: this._finalized,
    };
    return {
      commit: () => undefined,
      rollback: () => {
        this._window = saved.window;
        this._capacity = saved.capacity;
        this._maxContribution = saved.maxContribution;
        this._oracle = saved.oracle;
        this._rewards = saved.rewards;
        this._vesting = saved.vesting;
        this._totalRaised = saved.totalRaised;
        this._finalized = saved.finalized;
      },
    };
  }
}

function validateTerms(options: SaleControllerOptions): void {
  const fail = (message: string): never => {
    throw new SaleError("INVALID_CONFIGURATION", message);
  };

  if (options.rate <= 0n) fail("Rate must be positive");
  if (options.capacity <= 0n) fail("Capacity must be positive");
  if (options.minContribution < 0n || options.administratorRate < 0n) {
    fail("Minimum contribution and administrator rate must not be negative");
  }
  if (options.minContribution > options.maxContribution) {
    fail("Minimum contribution must not exceed the maximum contribution");
  }
  const { bonusPercent } = options;
  if (!Number.isInteger(bonusPercent) || bonusPercent < 0 || bonusPercent > 100) {
    fail(`Bonus percent must be an integer between 0 and 100, got ${bonusPercent}`);
  }
  for (const [label, value] of [
    ["capacity", options.capacity],
    ["maximum contribution", options.maxContribution],
    ["rate", options.rate],
    ["administrator rate", options.administratorRate],
  ] as const) {
    assertAmount(value, label);
  }
}
