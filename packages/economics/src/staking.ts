/**
 * Staking tier classification, reward accrual and governance weight.
 *
 * Tier: checked NodeOperator → Validator → Platinum → Gold → Silver → Basic;
 * the first enabled tier whose minimum amount AND minimum duration are met.
 *
 * Reward (linear, per second since last claim):
 *   effectiveRate = baseRate × tierMultiplier / 10000 × (10000 + durationBonus) / 10000
 *   reward        = amount × effectiveRate × elapsed / 1e18
 *
 * Duration bonus is the bonus of the highest threshold the duration meets,
 * not a sum of thresholds.
 *
 * Governance weight per stake:
 *   amount × governanceWeight × fraction / 10000
 *   fraction = 10000 once past end time, else (end − now) × 10000 / (end − start)
 */

import {
  BPS_DENOMINATOR,
  DEFAULT_DURATION_BONUSES,
  ONE_ETHER,
  SECONDS_PER_DAY,
  STAKING_TIERS,
  WAD,
} from "./constants.js";

export type StakingTier = (typeof STAKING_TIERS)[number];

export interface TierRequirement {
  minAmount: bigint;
  minDuration: number; // seconds
  rewardMultiplierBps: bigint;
  governanceWeight: bigint;
  /** Fee discount granted to holders of this tier (fee and transfer engines). */
  feeDiscountBps: bigint;
  enabled: boolean;
}

export type TierTable = ReadonlyMap<StakingTier, TierRequirement>;

/** duration threshold (seconds) → bonus bps */
export type DurationBonusTable = ReadonlyMap<number, bigint>;

export function isStakingTier(value: string): value is StakingTier {
  return (STAKING_TIERS as readonly string[]).includes(value);
}

export function defaultTierTable(): Map<StakingTier, TierRequirement> {
  const day = SECONDS_PER_DAY;
  const e = ONE_ETHER;
  return new Map<StakingTier, TierRequirement>([
    ["Basic", { minAmount: 100n * e, minDuration: 7 * day, rewardMultiplierBps: 10_000n, governanceWeight: 1n, feeDiscountBps: 0n, enabled: true }],
    ["Silver", { minAmount: 1_000n * e, minDuration: 30 * day, rewardMultiplierBps: 12_500n, governanceWeight: 2n, feeDiscountBps: 500n, enabled: true }],
    ["Gold", { minAmount: 5_000n * e, minDuration: 90 * day, rewardMultiplierBps: 15_000n, governanceWeight: 3n, feeDiscountBps: 1_000n, enabled: true }],
    ["Platinum", { minAmount: 10_000n * e, minDuration: 180 * day, rewardMultiplierBps: 20_000n, governanceWeight: 5n, feeDiscountBps: 1_500n, enabled: true }],
    ["Validator", { minAmount: 50_000n * e, minDuration: 365 * day, rewardMultiplierBps: 25_000n, governanceWeight: 8n, feeDiscountBps: 2_000n, enabled: true }],
    ["NodeOperator", { minAmount: 100_000n * e, minDuration: 365 * day, rewardMultiplierBps: 30_000n, governanceWeight: 10n, feeDiscountBps: 2_500n, enabled: true }],
  ]);
}

export function defaultDurationBonuses(): Map<number, bigint> {
  return new Map(DEFAULT_DURATION_BONUSES);
}

/** First enabled tier (highest → lowest) the stake qualifies for, or null. */
export function classifyTier(
  amount: bigint,
  duration: number,
  tiers: TierTable,
): StakingTier | null {
  for (const tier of STAKING_TIERS) {
    const req = tiers.get(tier);
    if (!req || !req.enabled) continue;
    if (amount >= req.minAmount && duration >= req.minDuration) return tier;
  }
  return null;
}

export function durationBonusFor(
  duration: number,
  bonuses: DurationBonusTable,
): bigint {
  let bestThreshold = -1;
  let bonus = 0n;
  for (const [threshold, bps] of bonuses) {
    if (duration >= threshold && threshold > bestThreshold) {
      bestThreshold = threshold;
      bonus = bps;
    }
  }
  return bonus;
}

/** Per-second reward rate at WAD scale. */
export function effectiveRewardRate(
  baseRate: bigint,
  tierMultiplierBps: bigint,
  durationBonusBps: bigint,
): bigint {
  return (
    (((baseRate * tierMultiplierBps) / BPS_DENOMINATOR) *
      (BPS_DENOMINATOR + durationBonusBps)) /
    BPS_DENOMINATOR
  );
}

export function accruedRewards(
  amount: bigint,
  ratePerSecond: bigint,
  elapsedSeconds: number,
): bigint {
  if (elapsedSeconds <= 0) return 0n;
  return (amount * ratePerSecond * BigInt(elapsedSeconds)) / WAD;
}

/** Remaining-time fraction in bps. */
export function remainingTimeFraction(
  startTime: number,
  endTime: number,
  now: number,
): bigint {
  if (now >= endTime || endTime <= startTime) return BPS_DENOMINATOR;
  return (BigInt(endTime - now) * BPS_DENOMINATOR) / BigInt(endTime - startTime);
}

export function stakeGovernanceWeight(
  amount: bigint,
  governanceWeight: bigint,
  startTime: number,
  endTime: number,
  now: number,
): bigint {
  return (
    (amount * governanceWeight * remainingTimeFraction(startTime, endTime, now)) /
    BPS_DENOMINATOR
  );
}
