/**
 * tapa transfer <recipient> <amount> [--memo]
 * tapa pending [address]
 * tapa withdraw
 * tapa schedule <recipient> <amount> <interval> [--times n] [--prefund n]
 * tapa execute <schedule_id>
 *
 * Transfers credit the recipient's pending balance; `withdraw` pays it out.
 */

import { Type } from "@sinclair/typebox";
import type { CliConfig } from "../lib/config.js";
import { httpGet, httpPost } from "../lib/http.js";
import { formatEther, parseAmount, parseDuration, parseId } from "../lib/units.js";

const TransferRecord = Type.Object({
  id: Type.Integer(),
  recipient: Type.String(),
  amount: Type.String(),
  fee: Type.String(),
  net: Type.String(),
});

const Pending = Type.Object({ account: Type.String(), pending: Type.String() });

const Withdrawn = Type.Object({ account: Type.String(), withdrawn: Type.String() });

const Schedule = Type.Object({
  id: Type.Integer(),
  net_per_transfer: Type.String(),
  fee_per_transfer: Type.String(),
  interval_seconds: Type.Integer(),
  next_execution_time: Type.Integer(),
  remaining_transfers: Type.Integer(),
  escrowed: Type.String(),
  active: Type.Boolean(),
});

function requireAddress(address: string, what: string): string {
  if (!/^0x[0-9a-fA-F]{40}$/.test(address)) {
    throw new Error(`Invalid ${what}: must be 0x + 40 hex. Got: ${address}`);
  }
  return address;
}

export async function transferCommand(
  recipient: string,
  amountStr: string,
  config: CliConfig,
  opts: { memo?: string },
): Promise<void> {
  const amount = parseAmount(amountStr);
  const record = await httpPost(config, "/transfers", TransferRecord, {
    recipient: requireAddress(recipient, "recipient"),
    amount: amount.toString(),
    ...(opts.memo ? { memo: opts.memo } : {}),
  });
  console.log(`Transfer #${record.id} → ${record.recipient}`);
  console.log(`  amount: ${formatEther(record.amount)}`);
  console.log(`  fee:    ${formatEther(record.fee)}`);
  console.log(`  net:    ${formatEther(record.net)} (pending until withdrawn)`);
}

export async function pendingCommand(address: string | undefined, config: CliConfig): Promise<void> {
  const account = address ?? config.account;
  if (!account) throw new Error("No address given and no account configured (tapa config --account)");
  const result = await httpGet(config, `/transfers/pending/${requireAddress(account, "address")}`, Pending);
  console.log(`${result.account}: ${formatEther(result.pending)} pending`);
}

export async function withdrawCommand(config: CliConfig): Promise<void> {
  const result = await httpPost(config, "/transfers/withdraw", Withdrawn);
  console.log(`Withdrew ${formatEther(result.withdrawn)} to ${result.account}`);
}

function printSchedule(schedule: {
  id: number;
  net_per_transfer: string;
  remaining_transfers: number;
  next_execution_time: number;
  escrowed: string;
  active: boolean;
}): void {
  const remaining = schedule.remaining_transfers === 0 ? "indefinite" : String(schedule.remaining_transfers);
  console.log(`Schedule #${schedule.id}${schedule.active ? "" : " (inactive)"}`);
  console.log(`  net per run: ${formatEther(schedule.net_per_transfer)}`);
  console.log(`  remaining:   ${remaining}`);
  console.log(`  escrowed:    ${formatEther(schedule.escrowed)}`);
  if (schedule.active) {
    console.log(`  next run:    ${new Date(schedule.next_execution_time * 1000).toISOString()}`);
  }
}

export async function scheduleCommand(
  recipient: string,
  amountStr: string,
  intervalStr: string,
  config: CliConfig,
  opts: { times?: string; prefund?: string },
): Promise<void> {
  const repetitions = opts.times === undefined ? 0 : Number(opts.times);
  if (!Number.isSafeInteger(repetitions) || repetitions < 0) {
    throw new Error(`Invalid --times: must be a non-negative integer. Got: ${opts.times}`);
  }
  const schedule = await httpPost(config, "/transfers/scheduled", Schedule, {
    recipient: requireAddress(recipient, "recipient"),
    amount: parseAmount(amountStr).toString(),
    interval_seconds: parseDuration(intervalStr),
    repetitions,
    ...(opts.prefund ? { prefund_intervals: parseId(opts.prefund, "--prefund") } : {}),
  });
  printSchedule(schedule);
  console.log(`  fee per run: ${formatEther(schedule.fee_per_transfer)} (paid up front)`);
}

export async function executeCommand(idStr: string, config: CliConfig): Promise<void> {
  const id = parseId(idStr, "schedule id");
  const schedule = await httpPost(config, `/transfers/scheduled/${id}/execute`, Schedule);
  printSchedule(schedule);
}
