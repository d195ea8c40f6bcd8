/**
 * Peer-to-peer transfer fee schedule and daily caps.
 *
 * Three tiers: guest 1%, member 0.5%, node operator 0.25%. Node-operator
 * status is checked before membership. The fee is clamped to
 * [minFee, maxFee]; an account with a staking discount takes the discounted
 * tier fee instead, without the clamp.
 */

import {
  DAILY_LIMIT_GUEST_WEI,
  DAILY_LIMIT_MEMBER_WEI,
  DAILY_LIMIT_NODE_OPERATOR_WEI,
  DAILY_WINDOW_SECONDS,
  TRANSFER_FEE_GUEST_BPS,
  TRANSFER_FEE_MEMBER_BPS,
  TRANSFER_FEE_NODE_OPERATOR_BPS,
} from "./constants.js";
import { applyBps, discountBy } from "./bps.js";

export type TransferTier = "guest" | "member" | "nodeOperator";

export interface FeeBounds {
  minFee: bigint;
  maxFee: bigint;
}

export function transferTierOf(status: {
  nodeOperator: boolean;
  member: boolean;
}): TransferTier {
  if (status.nodeOperator) return "nodeOperator";
  if (status.member) return "member";
  return "guest";
}

export function transferFeeBps(tier: TransferTier): bigint {
  switch (tier) {
    case "nodeOperator":
      return TRANSFER_FEE_NODE_OPERATOR_BPS;
    case "member":
      return TRANSFER_FEE_MEMBER_BPS;
    case "guest":
      return TRANSFER_FEE_GUEST_BPS;
  }
}

export function dailyLimitFor(tier: TransferTier): bigint {
  switch (tier) {
    case "nodeOperator":
      return DAILY_LIMIT_NODE_OPERATOR_WEI;
    case "member":
      return DAILY_LIMIT_MEMBER_WEI;
    case "guest":
      return DAILY_LIMIT_GUEST_WEI;
  }
}

export function computeTransferFee(
  amount: bigint,
  tier: TransferTier,
  bounds: FeeBounds,
  discountBps: bigint = 0n,
): bigint {
  const tierFee = applyBps(amount, transferFeeBps(tier));
  if (discountBps > 0n) return discountBy(tierFee, discountBps);
  if (tierFee < bounds.minFee) return bounds.minFee;
  if (tierFee > bounds.maxFee) return bounds.maxFee;
  return tierFee;
}

// ── Daily window ───────────────────────────────────────────────────

export interface DailyUsage {
  windowStart: number;
  spent: bigint;
}

/**
 * Usage after spending `amount` at `now`. The window resets lazily: a
 * write more than 24h after windowStart opens a fresh window.
 * @returns null when the spend would exceed `limit`
 */
export function chargeDailyWindow(
  usage: DailyUsage | undefined,
  now: number,
  amount: bigint,
  limit: bigint,
): DailyUsage | null {
  let windowStart = now;
  let spent = amount;
  if (usage && now < usage.windowStart + DAILY_WINDOW_SECONDS) {
    windowStart = usage.windowStart;
    spent += usage.spent;
  }
  if (spent > limit) return null;
  return { windowStart, spent };
}
