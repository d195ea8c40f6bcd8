/**
 * tapa quote <amount> <fee_type> [--payer] [--collection]
 * tapa fee-tx <id>
 *
 * POST /fees/quote, GET /fees/transactions/:id.
 */

import { Type } from "@sinclair/typebox";
import type { CliConfig } from "../lib/config.js";
import { httpGet, httpPost } from "../lib/http.js";
import { formatEther, parseAmount, parseId } from "../lib/units.js";

const ZERO_PAYER = "0x0000000000000000000000000000000000000000";

const FeeSplit = Type.Object({
  fee: Type.String(),
  royalty: Type.String(),
  community_fund: Type.String(),
  platform_fee: Type.String(),
  discount_bps: Type.String(),
});

const FeeTransaction = Type.Composite([
  FeeSplit,
  Type.Object({
    id: Type.Integer(),
    amount: Type.String(),
    fee_type: Type.String(),
    payer: Type.String(),
    creator: Type.Union([Type.String(), Type.Null()]),
    collection: Type.Union([Type.String(), Type.Null()]),
    timestamp: Type.Integer(),
    processed: Type.Boolean(),
  }),
]);

export async function quoteCommand(
  amountStr: string,
  feeType: string,
  config: CliConfig,
  opts: { payer?: string; collection?: string },
): Promise<void> {
  const amount = parseAmount(amountStr);
  const split = await httpPost(config, "/fees/quote", FeeSplit, {
    amount: amount.toString(),
    fee_type: feeType,
    payer: opts.payer ?? config.account ?? ZERO_PAYER,
    ...(opts.collection ? { collection: opts.collection } : {}),
  });

  console.log(`${feeType} fee on ${formatEther(amount)}`);
  console.log(`  fee:            ${formatEther(split.fee)}`);
  console.log(`  royalty:        ${formatEther(split.royalty)}`);
  console.log(`  community fund: ${formatEther(split.community_fund)}`);
  console.log(`  platform:       ${formatEther(split.platform_fee)}`);
  if (split.discount_bps !== "0") console.log(`  discount:       ${split.discount_bps} bps`);
}

export async function feeTxCommand(idStr: string, config: CliConfig): Promise<void> {
  const id = parseId(idStr, "transaction id");
  const tx = await httpGet(config, `/fees/transactions/${id}`, FeeTransaction);

  console.log(`Fee transaction #${tx.id} (${tx.fee_type})`);
  console.log(`  payer:     ${tx.payer}`);
  if (tx.creator) console.log(`  creator:   ${tx.creator}`);
  if (tx.collection) console.log(`  collection: ${tx.collection}`);
  console.log(`  amount:    ${formatEther(tx.amount)}`);
  console.log(`  fee:       ${formatEther(tx.fee)}`);
  console.log(`  processed: ${tx.processed ? "yes" : "no"}`);
  console.log(`  at:        ${new Date(tx.timestamp * 1000).toISOString()}`);
}
