/**
 * tapa funds [--all]
 * tapa fund <fund_id>
 * tapa deposit <amount> <description> [--fund <fund_id>]
 */

import { Type, type Static } from "@sinclair/typebox";
import type { CliConfig } from "../lib/config.js";
import { httpGet, httpPost } from "../lib/http.js";
import { formatEther, parseAmount } from "../lib/units.js";

const Fund = Type.Object({
  id: Type.String(),
  name: Type.String(),
  allocation_bps: Type.String(),
  balance: Type.String(),
  active: Type.Boolean(),
});
type Fund = Static<typeof Fund>;

const FundList = Type.Object({
  funds: Type.Array(Fund),
  total_balance: Type.String(),
  allocation_total_bps: Type.String(),
});

const Deposit = Type.Object({
  id: Type.Integer(),
  amount: Type.String(),
  fund_id: Type.Union([Type.String(), Type.Null()]),
});

function checkFundId(fundId: string): void {
  if (!/^0x[0-9a-f]{64}$/.test(fundId)) {
    throw new Error(`Invalid fund id: must be 0x + 64 hex. Got: ${fundId}`);
  }
}

function fundLine(fund: Fund): string {
  const pct = (Number(fund.allocation_bps) / 100).toFixed(2);
  const status = fund.active ? "" : "  (inactive)";
  return `  ${fund.name.padEnd(20)} ${pct.padStart(6)}%  ${formatEther(fund.balance)}${status}`;
}

export async function fundsCommand(config: CliConfig, opts: { all?: boolean }): Promise<void> {
  const list = await httpGet(config, `/treasury/funds${opts.all ? "?all=true" : ""}`, FundList);
  console.log(`Treasury: ${formatEther(list.total_balance)} across ${list.funds.length} fund(s)\n`);
  for (const fund of list.funds) console.log(fundLine(fund));
  if (list.allocation_total_bps !== "10000") {
    console.log(`\n  warning: active allocations total ${list.allocation_total_bps} bps`);
  }
}

export async function fundCommand(fundId: string, config: CliConfig): Promise<void> {
  checkFundId(fundId);
  const fund = await httpGet(config, `/treasury/funds/${fundId}`, Fund);
  console.log(`${fund.name} (${fund.id})`);
  console.log(fundLine(fund));
}

export async function depositCommand(
  amountStr: string,
  description: string,
  config: CliConfig,
  opts: { fund?: string },
): Promise<void> {
  const amount = parseAmount(amountStr);
  if (opts.fund) checkFundId(opts.fund);
  const deposit = await httpPost(config, "/treasury/deposit", Deposit, {
    amount: amount.toString(),
    description,
    ...(opts.fund ? { fund_id: opts.fund } : {}),
  });
  const target = deposit.fund_id ? `fund ${deposit.fund_id.slice(0, 10)}..` : "all active funds";
  console.log(`Deposit #${deposit.id}: ${formatEther(deposit.amount)} → ${target}`);
}
