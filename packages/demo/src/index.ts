/**
 * @vestline/demo — Terminal walkthrough of a vested sale.
 *
 * Uses the real packages directly with a manual clock; no network, no storage.
 * Environment variables override the demo's sale terms (see loadSaleConfig).
 */

import chalk from "chalk";
import { runWalkthrough } from "./walkthrough.js";

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                     VESTLINE DEMO                        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("          Capped sale with vested bonus rewards           ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

async function run(): Promise<void> {
  banner();
  const summary = await runWalkthrough({ env: process.env, delayMs: 400 });

  console.log(chalk.white("    Status:              ") + chalk.cyan.bold(summary.status));
  console.log(chalk.white("    Raised:              ") + chalk.cyan.bold(summary.totalRaised));
  console.log(chalk.white("    Audit events:        ") + chalk.cyan.bold(String(summary.events)));
  for (const [account, balance] of Object.entries(summary.balances)) {
    console.log(chalk.white(`    ${account.padEnd(21)}`) + chalk.yellow(balance));
  }
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
