import { ManualClock } from "@vestline/types";
import type { DomainEvent } from "@vestline/types";
import { InMemoryRewardLedger } from "@vestline/ledger";
import { AuditTrail, InMemoryEventStore } from "@vestline/event-store";
import type {
  AppendResult,
  EventStore,
  EventStoreIntegrityResult,
  HashedStoredEvent,
} from "@vestline/event-store";
import { VestingLedger } from "@vestline/vesting";
import { AllowlistOracle } from "../src/allowlist-oracle.js";
import { SaleController } from "../src/sale-controller.js";
import type { SaleControllerOptions } from "../src/sale-controller.js";

export const START = 1_000_000;
export const END = 1_001_000;
export const UNLOCK = 1_002_000;
export const INTERVAL = 100;

/** Time at which vesting interval k (1-based) becomes due. */
export function dueAt(k: number): number {
  return UNLOCK + (k - 1) * INTERVAL + 1;
}

export function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

export interface Fixture {
  readonly clock: ManualClock;
  readonly store: InMemoryEventStore;
  readonly audit: AuditTrail;
  readonly rewards: InMemoryRewardLedger;
  readonly allowlist: AllowlistOracle;
  readonly vesting: VestingLedger;
  readonly sale: SaleController;
}

/**
 * A sale between START and END: cap 1000, contributions 1..100,
 * rate 5, administrator rate 1, half of each bonus vesting over 4 intervals.
 */
export function setup(overrides: Partial<SaleControllerOptions> = {}): Fixture {
  const clock = new ManualClock(START - 10);
  const store = new InMemoryEventStore({ clock });
  let next = 0;
  const audit = new AuditTrail({ store, clock, generateId: () => `id-${++next}` });
  const rewards = new InMemoryRewardLedger();
  const allowlist = new AllowlistOracle("admin", ["alice", "bob"]);
  const vesting = new VestingLedger({
    administrator: "sale",
    schedule: { unlockDate: UNLOCK, intervalDuration: INTERVAL, numIntervals: 4 },
    clock,
    audit,
  });

  const sale = new SaleController({
    administrator: "admin",
    account: "sale",
    window: { start: START, end: END },
    capacity: 1000n,
    minContribution: 1n,
    maxContribution: 100n,
    rate: 5n,
    administratorRate: 1n,
    bonusPercent: 50,
    administratorWallet: "treasury",
    clock,
    authorizationOracle: allowlist,
    rewardLedger: rewards,
    vestingLedger: vesting,
    audit,
    ...overrides,
  });

  return { clock, store, audit, rewards, allowlist, vesting, sale };
}

/**
 * An event store that can be told to refuse every append.
 */
export class RefusingStore implements EventStore {
  refuse = false;

  constructor(readonly inner: InMemoryEventStore = new InMemoryEventStore()) {}

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    if (this.refuse) {
      throw new Error("audit store unavailable");
    }
    return this.inner.append(streamId, events);
  }

  read(streamId: string): readonly HashedStoredEvent[] {
    return this.inner.read(streamId);
  }

  readAll(): readonly HashedStoredEvent[] {
    return this.inner.readAll();
  }

  streamVersion(streamId: string): number {
    return this.inner.streamVersion(streamId);
  }

  globalPosition(): number {
    return this.inner.globalPosition();
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.inner.verifyIntegrity();
  }
}
