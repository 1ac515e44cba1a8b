/**
 * Wires a complete in-process sale from configuration:
 * clock, hash-chained audit trail, reward ledger, allowlist,
 * vesting ledger and controller.
 */

import { SystemClock } from "@vestline/types";
import type { Clock } from "@vestline/types";
import { InMemoryRewardLedger } from "@vestline/ledger";
import { AuditTrail, InMemoryEventStore } from "@vestline/event-store";
import { VestingLedger } from "@vestline/vesting";
import type { Logger } from "pino";
import { AllowlistOracle } from "./allowlist-oracle.js";
import type { SaleConfig } from "./config.js";
import { SaleController } from "./sale-controller.js";
import type { SaleState } from "./types.js";

export interface CreateSaleOptions {
  /** Default: wall clock */
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly onFinalize?: (state: SaleState) => void;
  /** Event id source for the audit trail. Default: random UUIDs */
  readonly generateId?: (() => string) | undefined;
}

export interface Sale {
  readonly controller: SaleController;
  readonly vesting: VestingLedger;
  readonly rewards: InMemoryRewardLedger;
  /** Owned by the sale administrator */
  readonly allowlist: AllowlistOracle;
  readonly audit: AuditTrail;
  readonly store: InMemoryEventStore;
  readonly clock: Clock;
}

export function createSale(config: SaleConfig, options: CreateSaleOptions = {}): Sale {
  const clock = options.clock ?? new SystemClock();
  const store = new InMemoryEventStore({ clock });
  const audit = new AuditTrail({ store, clock, generateId: options.generateId });
  const rewards = new InMemoryRewardLedger();
  const allowlist = new AllowlistOracle(config.SALE_ADMINISTRATOR);

  const vesting = new VestingLedger({
    administrator: config.SALE_ACCOUNT,
    schedule: {
      unlockDate: config.VESTING_UNLOCK_DATE,
      intervalDuration: config.VESTING_INTERVAL_SECONDS,
      numIntervals: config.VESTING_INTERVALS,
    },
    clock,
    audit,
  });

  const controller = new SaleController({
    administrator: config.SALE_ADMINISTRATOR,
    account: config.SALE_ACCOUNT,
    window: { start: config.SALE_START, end: config.SALE_END },
    capacity: config.SALE_CAPACITY,
    minContribution: config.SALE_MIN_CONTRIBUTION,
    maxContribution: config.SALE_MAX_CONTRIBUTION,
    rate: config.SALE_RATE,
    administratorRate: config.SALE_ADMINISTRATOR_RATE,
    bonusPercent: config.SALE_BONUS_PERCENT,
    clock,
    authorizationOracle: allowlist,
    rewardLedger: rewards,
    vestingLedger: vesting,
    audit,
    logger: options.logger,
    onFinalize: options.onFinalize,
  });

  return { controller, vesting, rewards, allowlist, audit, store, clock };
}
