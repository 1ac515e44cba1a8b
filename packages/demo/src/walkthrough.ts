/**
 * The demo walkthrough: one full sale lifecycle against the in-process
 * collaborators, narrated step by step.
 *
 * configure → allowlist → bonus → contributions → finalize → vesting → audit
 */

import chalk from "chalk";
import { ManualClock } from "@vestline/types";
import type { AccountId } from "@vestline/types";
import { formatUnits } from "@vestline/ledger";
import { SaleError, createLogger, createSale, loadSaleConfig } from "@vestline/sale";
import type { Logger } from "pino";

// =============================================================================
// Defaults
// =============================================================================

/** 2026-01-01T00:00:00Z, a week-long sale, vesting daily from two weeks in. */
export const DEMO_ENV: Readonly<Record<string, string>> = {
  SALE_START: "1767225600",
  SALE_END: "1767830400",
  SALE_CAPACITY: "1000",
  SALE_MIN_CONTRIBUTION: "1",
  SALE_MAX_CONTRIBUTION: "100",
  SALE_RATE: "5",
  SALE_ADMINISTRATOR_RATE: "1",
  SALE_BONUS_PERCENT: "50",
  SALE_ADMINISTRATOR: "operator",
  SALE_ACCOUNT: "sale",
  VESTING_UNLOCK_DATE: "1768435200",
  VESTING_INTERVAL_SECONDS: "86400",
  VESTING_INTERVALS: "4",
  LOG_LEVEL: "silent",
  NODE_ENV: "production",
};

export interface WalkthroughOptions {
  /** Overrides on top of DEMO_ENV */
  readonly env?: Record<string, string | undefined>;
  readonly print?: (line: string) => void;
  readonly delayMs?: number;
  readonly logger?: Logger;
}

export interface WalkthroughSummary {
  readonly status: string;
  readonly totalRaised: string;
  readonly events: number;
  readonly integrityValid: boolean;
  readonly balances: Readonly<Record<AccountId, string>>;
}

const TOTAL_STEPS = 7;
const DEMO_ACCOUNTS = ["alice", "bob", "erin", "operator", "sale"] as const;

// =============================================================================
// Walkthrough
// =============================================================================

export async function runWalkthrough(options: WalkthroughOptions = {}): Promise<WalkthroughSummary> {
  const print = options.print ?? ((line: string) => console.log(line));
  const delayMs = options.delayMs ?? 0;
  const pause = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, delayMs));

  const ok = (msg: string): void => print(chalk.green("    ✓ ") + chalk.white(msg));
  const info = (label: string, value: string): void =>
    print(chalk.gray("    → ") + chalk.gray(label.padEnd(18)) + chalk.white(value));
  const warn = (msg: string): void => print(chalk.yellow("    ! ") + chalk.yellow(msg));
  const stepHeader = (step: number, title: string): void => {
    const prefix = chalk.cyan.bold(`  Step ${step}/${TOTAL_STEPS}`);
    const line = chalk.gray("─".repeat(Math.max(4, 50 - title.length)));
    print(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
  };

  // ─── Step 1: Configure ──────────────────────────────────────────────

  stepHeader(1, "Configure");

  const config = loadSaleConfig({ ...DEMO_ENV, ...options.env });
  const clock = new ManualClock(config.SALE_START - 3600);
  const logger =
    options.logger ??
    createLogger({
      level: config.LOG_LEVEL,
      pretty: config.NODE_ENV === "development" && config.LOG_LEVEL !== "silent",
    });
  const { controller, vesting, rewards, allowlist, audit, store } = createSale(config, {
    clock,
    logger,
  });
  const admin = config.SALE_ADMINISTRATOR;

  info("window", `${isoOf(config.SALE_START)} → ${isoOf(config.SALE_END)}`);
  info("cap", config.SALE_CAPACITY.toString());
  info("per account", `${config.SALE_MIN_CONTRIBUTION.toString()}..${config.SALE_MAX_CONTRIBUTION.toString()}`);
  info("rate", `${config.SALE_RATE.toString()} (+${config.SALE_ADMINISTRATOR_RATE.toString()} to ${admin})`);
  info("vesting", `${config.VESTING_INTERVALS} × ${config.VESTING_INTERVAL_SECONDS}s from ${isoOf(config.VESTING_UNLOCK_DATE)}`);
  ok(`Sale wired, status ${controller.status()}`);
  await pause();

  // ─── Step 2: Allowlist ──────────────────────────────────────────────

  stepHeader(2, "Allowlist");

  allowlist.addMany(admin, ["alice", "bob"]);
  ok(`${allowlist.size} contributors authorized: ${allowlist.accounts().join(", ")}`);
  await pause();

  // ─── Step 3: Bonus allocation ───────────────────────────────────────

  stepHeader(3, "Bonus Allocation");

  const bonus = controller.createBonusAllocation(admin, "erin", 1000n);
  info("immediate", bonus.immediateUnits.toString());
  info("vesting", `${bonus.vestedUnits.toString()} (allocation #${bonus.allocationIndex})`);
  info("administrator", bonus.administratorUnits.toString());
  ok("Bonus registered before unlock");
  await pause();

  // ─── Step 4: Contributions ──────────────────────────────────────────

  stepHeader(4, "Contributions");

  clock.set(config.SALE_START);
  info("status", controller.status());
  for (const [contributor, amount] of [
    ["alice", 10n],
    ["bob", 40n],
    ["carol", 25n],
  ] as const) {
    try {
      const receipt = controller.acceptContribution(contributor, amount);
      ok(`${contributor} contributed ${amount.toString()} → ${receipt.rewardUnits.toString()} reward units`);
    } catch (err) {
      if (!(err instanceof SaleError)) throw err;
      warn(`${contributor} rejected: ${err.reason ?? err.code}`);
    }
  }
  info("raised", `${controller.totalRaised.toString()} / ${config.SALE_CAPACITY.toString()}`);
  await pause();

  // ─── Step 5: Finalize ───────────────────────────────────────────────

  stepHeader(5, "Finalize");

  clock.set(config.SALE_END + 1);
  info("status", controller.status());
  controller.finalize(admin);
  ok(`Sale finalized, status ${controller.status()}`);
  await pause();

  // ─── Step 6: Vesting ────────────────────────────────────────────────

  stepHeader(6, "Vesting Releases");

  for (let k = 1; k <= config.VESTING_INTERVALS; k++) {
    clock.set(config.VESTING_UNLOCK_DATE + (k - 1) * config.VESTING_INTERVAL_SECONDS + 1);
    if (controller.releaseVestedRewards(admin)) {
      ok(`Interval ${vesting.currentInterval}: erin holds ${formatUnits(rewards.balanceOf("erin"), 0)}`);
    }
  }
  info("sale account", rewards.balanceOf(config.SALE_ACCOUNT).toString());
  await pause();

  // ─── Step 7: Audit ──────────────────────────────────────────────────

  stepHeader(7, "Audit Trail");

  const events = audit.history();
  for (const se of events) {
    print(chalk.gray("    ") + chalk.dim(`${se.globalPosition.toString().padStart(2)} ${se.event.type.padEnd(28)} ${se.hash.slice(0, 12)}...`));
  }
  const integrity = store.verifyIntegrity();
  if (integrity.valid) {
    ok(`Hash chain verified through position ${integrity.lastVerifiedPosition}`);
  } else {
    warn(`Hash chain broken: ${integrity.errors.map((e) => e.reason).join("; ")}`);
  }

  const balances: Record<AccountId, string> = {};
  for (const account of DEMO_ACCOUNTS) {
    balances[account] = rewards.balanceOf(account).toString();
  }

  print("");
  return {
    status: controller.status(),
    totalRaised: controller.totalRaised.toString(),
    events: events.length,
    integrityValid: integrity.valid,
    balances,
  };
}

function isoOf(seconds: number): string {
  return new Date(seconds * 1000).toISOString().slice(0, 10);
}
