/**
 * VestingLedger — gradual release of held-back rewards.
 *
 * Owns a dense array of allocations (index = identity) and a single
 * interval counter shared by all of them. Each advancement sets every
 * allocation's reward for the new interval:
 *
 *   interval < numIntervals  → totalAllocation / numIntervals (truncated)
 *   interval = numIntervals  → whatever remains
 *
 * so the sum released over the whole schedule is exactly the allocation.
 *
 * The ledger only does bookkeeping. Moving units is the caller's job:
 * a claim reports what should be released and to whom.
 *
 * Rules:
 * - Every mutating operation is administrator-only
 * - Allocations are created before unlock, never deleted, only drained
 * - The interval counter is monotonic and never exceeds numIntervals
 */

import { MAX_AMOUNT, isAccountId } from "@vestline/types";
import type {
  AccountId,
  Amount,
  Clock,
  Transactional,
  UnitOfWork,
  UnixSeconds,
} from "@vestline/types";
import {
  AccessError,
  AdminCapability,
  checkedDiv,
  checkedSub,
  parseAmountString,
  toAmountString,
} from "@vestline/ledger";
import { SALE_EVENTS } from "@vestline/event-store";
import type { AuditTrail } from "@vestline/event-store";
import type {
  Allocation,
  ClaimResult,
  VestingLedgerSnapshot,
  VestingSchedule,
} from "./types.js";
import { VestingError } from "./types.js";

export interface VestingLedgerOptions {
  readonly administrator: AccountId;
  readonly schedule: VestingSchedule;
  readonly clock: Clock;
  readonly audit?: AuditTrail | undefined;
}

interface AllocationRecord {
  beneficiary: AccountId;
  totalAllocation: Amount;
  remainingBalance: Amount;
  lastClaimedInterval: number;
  currentReward: Amount;
}

export class VestingLedger implements Transactional {
  private readonly _admin: AdminCapability;
  private readonly _schedule: VestingSchedule;
  private readonly _clock: Clock;
  private readonly _audit: AuditTrail | undefined;
  private _allocations: AllocationRecord[] = [];
  private _currentInterval = 0;

  constructor(options: VestingLedgerOptions) {
    this._schedule = validateSchedule(options.schedule);
    this._admin = new AdminCapability(options.administrator);
    this._clock = options.clock;
    this._audit = options.audit;
  }

  // ─── Allocations ─────────────────────────────────────────────────────

  /**
   * Register a new allocation. Only possible before the unlock date.
   *
   * @returns The allocation's index
   */
  createAllocation(caller: AccountId, beneficiary: AccountId, amount: Amount): number {
    this._admin.assert(caller, "create allocations");

    if (this._clock.now() >= this._schedule.unlockDate) {
      throw new VestingError(
        "SCHEDULE_CLOSED",
        "Allocations can only be created before the unlock date",
      );
    }
    if (amount < 0n || amount > MAX_AMOUNT) {
      throw new VestingError("INVALID_AMOUNT", `Invalid allocation amount: ${amount.toString()}`);
    }
    if (!isAccountId(beneficiary)) {
      throw new AccessError("INVALID_ACCOUNT", `Invalid beneficiary: "${beneficiary}"`);
    }

    const index = this._allocations.length;
    this._allocations.push({
      beneficiary,
      totalAllocation: amount,
      remainingBalance: amount,
      lastClaimedInterval: 0,
      currentReward: 0n,
    });

    this._audit?.record("vesting", caller, SALE_EVENTS.ALLOCATION_CREATED, {
      index,
      beneficiary,
      amount: toAmountString(amount),
    });
    return index;
  }

  // ─── Intervals ───────────────────────────────────────────────────────

  /**
   * Move to the next interval if it is due.
   *
   * @returns false when not due (or all intervals are processed); nothing changes then
   */
  advanceInterval(caller: AccountId): boolean {
    this._admin.assert(caller, "advance the vesting interval");

    const { unlockDate, intervalDuration, numIntervals } = this._schedule;
    const elapsed = this._clock.now() - unlockDate;
    if (
      elapsed <= 0 ||
      elapsed <= this._currentInterval * intervalDuration ||
      this._currentInterval >= numIntervals
    ) {
      return false;
    }

    const interval = this._currentInterval + 1;
    const divisor = BigInt(numIntervals);
    const last = interval === numIntervals;
    for (const allocation of this._allocations) {
      allocation.currentReward = last
        ? allocation.remainingBalance
        : checkedDiv(allocation.totalAllocation, divisor);
    }
    this._currentInterval = interval;

    this._audit?.record("vesting", caller, SALE_EVENTS.INTERVAL_ADVANCED, {
      interval,
      numIntervals,
    });
    return true;
  }

  /**
   * Claim the current interval's reward for one allocation.
   */
  claim(caller: AccountId, index: number): ClaimResult {
    this._admin.assert(caller, "claim vested rewards");
    const allocation = this.record(index);

    if (allocation.lastClaimedInterval >= this._currentInterval) {
      return {
        shouldRelease: false,
        beneficiary: allocation.beneficiary,
        amount: allocation.currentReward,
      };
    }

    const amount = allocation.currentReward;
    allocation.remainingBalance = checkedSub(allocation.remainingBalance, amount);
    allocation.lastClaimedInterval = this._currentInterval;

    this._audit?.record("vesting", caller, SALE_EVENTS.REWARD_CLAIMED, {
      index,
      beneficiary: allocation.beneficiary,
      amount: toAmountString(amount),
      interval: this._currentInterval,
    });
    return { shouldRelease: true, beneficiary: allocation.beneficiary, amount };
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  count(): number {
    return this._allocations.length;
  }

  allocationAmount(index: number): Amount {
    return this.record(index).totalAllocation;
  }

  allocation(index: number): Allocation {
    return { ...this.record(index) };
  }

  allocations(): readonly Allocation[] {
    return this._allocations.map((a) => ({ ...a }));
  }

  get currentInterval(): number {
    return this._currentInterval;
  }

  get schedule(): VestingSchedule {
    return this._schedule;
  }

  isUnlocked(): boolean {
    return this._clock.now() >= this._schedule.unlockDate;
  }

  /**
   * The unix second after which the next interval becomes due,
   * or undefined once every interval has been processed.
   */
  nextIntervalAt(): UnixSeconds | undefined {
    const { unlockDate, intervalDuration, numIntervals } = this._schedule;
    if (this._currentInterval >= numIntervals) {
      return undefined;
    }
    return unlockDate + this._currentInterval * intervalDuration;
  }

  // ─── Administration ──────────────────────────────────────────────────

  get administrator(): AccountId {
    return this._admin.admin;
  }

  proposeAdministrator(caller: AccountId, next: AccountId): void {
    this._admin.propose(caller, next);
  }

  acceptAdministrator(caller: AccountId): void {
    const previous = this._admin.admin;
    this._admin.accept(caller);
    this._audit?.record("vesting", caller, SALE_EVENTS.ADMINISTRATOR_TRANSFERRED, {
      from: previous,
      to: caller,
    });
  }

  // ─── Unit of work ────────────────────────────────────────────────────

  begin(): UnitOfWork {
    const allocations = this._allocations.map((a) => ({ ...a }));
    const currentInterval = this._currentInterval;

    return {
      commit: () => undefined,
      rollback: () => {
        this._allocations = allocations;
        this._currentInterval = currentInterval;
      },
    };
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): VestingLedgerSnapshot {
    return {
      version: 1,
      administrator: this._admin.admin,
      schedule: { ...this._schedule },
      currentInterval: this._currentInterval,
      allocations: this._allocations.map((a) => ({
        beneficiary: a.beneficiary,
        totalAllocation: toAmountString(a.totalAllocation),
        remainingBalance: toAmountString(a.remainingBalance),
        lastClaimedInterval: a.lastClaimedInterval,
        currentReward: toAmountString(a.currentReward),
      })),
    };
  }

  static fromSnapshot(
    snapshot: VestingLedgerSnapshot,
    options: { readonly clock: Clock; readonly audit?: AuditTrail | undefined },
  ): VestingLedger {
    const ledger = new VestingLedger({
      administrator: snapshot.administrator,
      schedule: snapshot.schedule,
      clock: options.clock,
      audit: options.audit,
    });

    const { currentInterval } = snapshot;
    if (
      !Number.isSafeInteger(currentInterval) ||
      currentInterval < 0 ||
      currentInterval > ledger._schedule.numIntervals
    ) {
      throw new VestingError("INVALID_SNAPSHOT", `Invalid current interval: ${currentInterval}`);
    }

    ledger._currentInterval = currentInterval;
    ledger._allocations = snapshot.allocations.map((a, index) => {
      const record: AllocationRecord = {
        beneficiary: a.beneficiary,
        totalAllocation: parseAmountString(a.totalAllocation),
        remainingBalance: parseAmountString(a.remainingBalance),
        lastClaimedInterval: a.lastClaimedInterval,
        currentReward: parseAmountString(a.currentReward),
      };
      const unclaimed = record.lastClaimedInterval < currentInterval;
      if (
        !isAccountId(record.beneficiary) ||
        record.remainingBalance > record.totalAllocation ||
        record.currentReward > record.totalAllocation ||
        (unclaimed && record.currentReward > record.remainingBalance) ||
        !Number.isSafeInteger(record.lastClaimedInterval) ||
        record.lastClaimedInterval < 0 ||
        record.lastClaimedInterval > currentInterval
      ) {
        throw new VestingError("INVALID_SNAPSHOT", `Allocation ${index} is inconsistent`);
      }
      return record;
    });
    return ledger;
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private record(index: number): AllocationRecord {
    const allocation = Number.isInteger(index) ? this._allocations[index] : undefined;
    if (allocation === undefined) {
      throw new VestingError(
        "INDEX_OUT_OF_RANGE",
        `No allocation at index ${index} (count ${this._allocations.length})`,
      );
    }
    return allocation;
  }
}

function validateSchedule(schedule: VestingSchedule): VestingSchedule {
  const { unlockDate, intervalDuration, numIntervals } = schedule;
  if (!Number.isSafeInteger(unlockDate) || unlockDate < 0) {
    throw new VestingError("INVALID_SCHEDULE", `Invalid unlock date: ${unlockDate}`);
  }
  if (!Number.isSafeInteger(intervalDuration) || intervalDuration <= 0) {
    throw new VestingError(
      "INVALID_SCHEDULE",
      `Interval duration must be a positive integer, got ${intervalDuration}`,
    );
  }
  if (!Number.isSafeInteger(numIntervals) || numIntervals < 1) {
    throw new VestingError(
      "INVALID_SCHEDULE",
      `Number of intervals must be at least 1, got ${numIntervals}`,
    );
  }
  const end = unlockDate + numIntervals * intervalDuration;
  if (!Number.isSafeInteger(end)) {
    throw new VestingError(
      "INVALID_SCHEDULE",
      `Schedule ends past the largest safe timestamp (${unlockDate} + ${numIntervals} × ${intervalDuration})`,
    );
  }
  return { unlockDate, intervalDuration, numIntervals };
}
