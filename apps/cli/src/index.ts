/**
 * tapa CLI: command line client of a ledger node.
 *
 * Commands:
 *   quote <amount> <fee_type>        Marketplace fee split for an amount
 *   fee-tx <id>                      Show a processed fee transaction
 *   funds                            List treasury funds
 *   fund <fund_id>                   Show one fund
 *   deposit <amount> <description>   Deposit into the treasury
 *   transfer <recipient> <amount>    Tiered transfer into recipient's pending balance
 *   pending [address]                Pending balance
 *   withdraw                         Withdraw the caller's pending balance
 *   schedule <recipient> <amount> <interval>   Create a recurring transfer
 *   execute <schedule_id>            Execute a due recurring transfer
 *   stake <amount> <duration>        Stake PSF
 *   claim <stake_id>                 Claim staking rewards
 *   unstake <stake_id>               Withdraw an unlocked stake
 *   weight [address]                 Governance weight and tier
 *   config                           Show/set CLI configuration
 *
 * Amounts take ether decimals ("1.5") or a wei suffix ("1500wei").
 * Durations take s/m/h/d suffixes ("30d").
 */

import { Command } from "commander";
import { loadConfig, type CliConfig } from "./lib/config.js";
import { feeTxCommand, quoteCommand } from "./commands/fees.js";
import { depositCommand, fundCommand, fundsCommand } from "./commands/treasury.js";
import {
  executeCommand,
  pendingCommand,
  scheduleCommand,
  transferCommand,
  withdrawCommand,
} from "./commands/transfers.js";
import { claimCommand, stakeCommand, unstakeCommand, weightCommand } from "./commands/staking.js";
import { configCommand } from "./commands/config-cmd.js";

const program = new Command();

program
  .name("tapa")
  .description("Fee, treasury, transfer and staking ledger client")
  .version("0.1.0")
  .enablePositionalOptions()
  .option("-n, --node <url>", "Ledger node URL override")
  .option("-t, --token <token>", "Bearer token override");

/** Config with the global --node/--token overrides applied. */
async function resolved(): Promise<CliConfig> {
  const config = await loadConfig();
  const opts = program.opts<{ node?: string; token?: string }>();
  if (opts.node) config.node = opts.node.replace(/\/+$/, "");
  if (opts.token) config.token = opts.token;
  return config;
}

// ── fees ────────────────────────────────────────────────────────────

program
  .command("quote")
  .description("Fee split for a marketplace amount: POST /fees/quote")
  .argument("<amount>", "Sale amount")
  .argument("<fee_type>", "StandardSale, Auction, PremiumListing, PhysicalItem, DigitalContent, CrossCultural")
  .option("--payer <address>", "Payer (volume and staking discounts apply)")
  .option("--collection <name>", "Collection with a community-fund override")
  .action(async (amount: string, feeType: string, opts: { payer?: string; collection?: string }) => {
    await quoteCommand(amount, feeType, await resolved(), opts);
  });

program
  .command("fee-tx")
  .description("Show a processed fee transaction")
  .argument("<id>", "Fee transaction id")
  .action(async (id: string) => {
    await feeTxCommand(id, await resolved());
  });

// ── treasury ────────────────────────────────────────────────────────

program
  .command("funds")
  .description("List treasury funds with allocations and balances")
  .option("--all", "Include inactive funds")
  .action(async (opts: { all?: boolean }) => {
    await fundsCommand(await resolved(), opts);
  });

program
  .command("fund")
  .description("Show one treasury fund")
  .argument("<fund_id>", "Fund id (0x + 64 hex)")
  .action(async (fundId: string) => {
    await fundCommand(fundId, await resolved());
  });

program
  .command("deposit")
  .description("Deposit native value into the treasury")
  .argument("<amount>", "Amount")
  .argument("<description>", "What the deposit is for")
  .option("--fund <fund_id>", "Credit one fund instead of splitting by allocation")
  .action(async (amount: string, description: string, opts: { fund?: string }) => {
    await depositCommand(amount, description, await resolved(), opts);
  });

// ── transfers ───────────────────────────────────────────────────────

program
  .command("transfer")
  .description("Send value; the net lands in the recipient's pending balance")
  .argument("<recipient>", "Recipient address")
  .argument("<amount>", "Gross amount (fee included)")
  .option("-m, --memo <text>", "Memo")
  .action(async (recipient: string, amount: string, opts: { memo?: string }) => {
    await transferCommand(recipient, amount, await resolved(), opts);
  });

program
  .command("pending")
  .description("Pending (withdrawable) balance")
  .argument("[address]", "Account (default: configured account)")
  .action(async (address: string | undefined) => {
    await pendingCommand(address, await resolved());
  });

program
  .command("withdraw")
  .description("Withdraw the caller's pending balance")
  .action(async () => {
    await withdrawCommand(await resolved());
  });

program
  .command("schedule")
  .description("Create a recurring transfer (escrowed up front)")
  .argument("<recipient>", "Recipient address")
  .argument("<amount>", "Gross amount per run")
  .argument("<interval>", "Interval, at least 1h")
  .option("--times <n>", "Number of runs (0 or omitted: indefinite)")
  .option("--prefund <n>", "Runs to escrow for an indefinite schedule", "1")
  .action(async (recipient: string, amount: string, interval: string, opts: { times?: string; prefund?: string }) => {
    await scheduleCommand(recipient, amount, interval, await resolved(), opts);
  });

program
  .command("execute")
  .description("Execute a due recurring transfer")
  .argument("<schedule_id>", "Schedule id")
  .action(async (id: string) => {
    await executeCommand(id, await resolved());
  });

// ── staking ─────────────────────────────────────────────────────────

program
  .command("stake")
  .description("Stake PSF for a lock duration")
  .argument("<amount>", "PSF amount")
  .argument("<duration>", "Lock duration, e.g. 90d")
  .action(async (amount: string, duration: string) => {
    await stakeCommand(amount, duration, await resolved());
  });

program
  .command("claim")
  .description("Claim accrued staking rewards")
  .argument("<stake_id>", "Stake id")
  .action(async (id: string) => {
    await claimCommand(id, await resolved());
  });

program
  .command("unstake")
  .description("Withdraw an unlocked stake and its rewards")
  .argument("<stake_id>", "Stake id")
  .action(async (id: string) => {
    await unstakeCommand(id, await resolved());
  });

program
  .command("weight")
  .description("Governance weight, tier and fee discount")
  .argument("[address]", "Account (default: configured account)")
  .action(async (address: string | undefined) => {
    await weightCommand(address, await resolved());
  });

// ── config ──────────────────────────────────────────────────────────

program
  .command("config")
  .description("Show or update CLI configuration")
  .option("--node <url>", "Set ledger node URL")
  .option("--token <token>", "Set bearer token")
  .option("--account <address>", "Set default account")
  .action(async (opts: { node?: string; token?: string; account?: string }) => {
    await configCommand(opts);
  });

// ── Run ─────────────────────────────────────────────────────────────

program.parseAsync(process.argv).catch((err: Error) => {
  console.error(`\nError: ${err.message}`);
  process.exit(1);
});
