/**
 * tapa stake <amount> <duration>
 * tapa claim <stake_id>
 * tapa unstake <stake_id>
 * tapa weight [address]
 *
 * Amounts are PSF.
 */

import { Type } from "@sinclair/typebox";
import type { CliConfig } from "../lib/config.js";
import { httpGet, httpPost } from "../lib/http.js";
import { formatEther, parseAmount, parseDuration, parseId } from "../lib/units.js";

const Stake = Type.Object({
  id: Type.Integer(),
  amount: Type.String(),
  tier: Type.String(),
  end_time: Type.Integer(),
  active: Type.Boolean(),
  claimed_rewards: Type.String(),
});

const Claim = Type.Object({ stake_id: Type.Integer(), claimed: Type.String() });

const Governance = Type.Object({
  account: Type.String(),
  governance_weight: Type.String(),
  highest_tier: Type.Union([Type.String(), Type.Null()]),
  fee_discount_bps: Type.String(),
  stakes: Type.Array(Stake),
});

export async function stakeCommand(
  amountStr: string,
  durationStr: string,
  config: CliConfig,
): Promise<void> {
  const stake = await httpPost(config, "/stakes", Stake, {
    amount: parseAmount(amountStr).toString(),
    duration_seconds: parseDuration(durationStr),
  });
  console.log(`Stake #${stake.id}: ${formatEther(stake.amount)} PSF, tier ${stake.tier}`);
  console.log(`  locked until ${new Date(stake.end_time * 1000).toISOString()}`);
}

export async function claimCommand(idStr: string, config: CliConfig): Promise<void> {
  const id = parseId(idStr, "stake id");
  const claim = await httpPost(config, `/stakes/${id}/claim`, Claim);
  console.log(`Claimed ${formatEther(claim.claimed)} PSF from stake #${claim.stake_id}`);
}

export async function unstakeCommand(idStr: string, config: CliConfig): Promise<void> {
  const id = parseId(idStr, "stake id");
  const stake = await httpPost(config, `/stakes/${id}/unstake`, Stake);
  console.log(`Unstaked #${stake.id}: ${formatEther(stake.amount)} PSF returned`);
  console.log(`  lifetime rewards: ${formatEther(stake.claimed_rewards)} PSF`);
}

export async function weightCommand(address: string | undefined, config: CliConfig): Promise<void> {
  const account = address ?? config.account;
  if (!account) throw new Error("No address given and no account configured (tapa config --account)");
  const gov = await httpGet(config, `/governance/${account}`, Governance);
  console.log(`${gov.account}`);
  console.log(`  governance weight: ${formatEther(gov.governance_weight)}`);
  console.log(`  highest tier:      ${gov.highest_tier ?? "(none)"}`);
  console.log(`  fee discount:      ${gov.fee_discount_bps} bps`);
  for (const stake of gov.stakes.filter((s) => s.active)) {
    console.log(`  #${stake.id} ${formatEther(stake.amount)} PSF ${stake.tier}`);
  }
}
