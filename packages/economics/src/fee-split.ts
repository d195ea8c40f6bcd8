/**
 * Marketplace fee split: creator royalty / community fund / platform fee.
 *
 *   fee          = amount × baseFee / 10000, then × (10000 − discount) / 10000
 *   royalty      = amount × royalty / 10000
 *   communityFund = amount × (override ?? community) / 10000
 *   platformFee  = fee − royalty − communityFund
 *
 * Royalty and community are taken off the gross amount, not the discounted
 * fee, so a discount (or a community override) can push them above the fee.
 * In that case the platform gets nothing, royalty is scaled down
 * proportionally and communityFund absorbs the rounding slack, keeping
 * royalty + communityFund + platformFee == fee.
 */

import { BPS_DENOMINATOR, DEFAULT_FEE_PROFILES_BPS, FEE_TYPES, MAX_BASE_FEE_BPS } from "./constants.js";
import { applyBps, discountBy, isBps } from "./bps.js";

export type FeeType = (typeof FEE_TYPES)[number];

export interface FeeProfile {
  baseFeeBps: bigint;
  royaltyBps: bigint;
  communityFundBps: bigint;
  platformFeeBps: bigint;
  active: boolean;
}

export interface FeeSplit {
  fee: bigint;
  royalty: bigint;
  communityFund: bigint;
  platformFee: bigint;
  discountBps: bigint;
}

export function isFeeType(value: string): value is FeeType {
  return (FEE_TYPES as readonly string[]).includes(value);
}

/**
 * Check the profile invariant.
 * @returns null when valid, otherwise a short reason
 */
export function validateFeeProfile(
  profile: Omit<FeeProfile, "active">,
): string | null {
  const { baseFeeBps, royaltyBps, communityFundBps, platformFeeBps } = profile;
  for (const v of [baseFeeBps, royaltyBps, communityFundBps, platformFeeBps]) {
    if (!isBps(v)) return "percentages must be within 0-10000 bps";
  }
  if (baseFeeBps > MAX_BASE_FEE_BPS) {
    return `base fee must be <= ${MAX_BASE_FEE_BPS} bps`;
  }
  if (royaltyBps + communityFundBps + platformFeeBps !== baseFeeBps) {
    return "royalty + community fund + platform fee must equal base fee";
  }
  return null;
}

export function defaultFeeProfiles(): Map<FeeType, FeeProfile> {
  const profiles = new Map<FeeType, FeeProfile>();
  for (const type of FEE_TYPES) {
    const [baseFeeBps, royaltyBps, communityFundBps, platformFeeBps] =
      DEFAULT_FEE_PROFILES_BPS[type];
    profiles.set(type, {
      baseFeeBps,
      royaltyBps,
      communityFundBps,
      platformFeeBps,
      active: true,
    });
  }
  return profiles;
}

export function computeFeeSplit(
  amount: bigint,
  profile: Omit<FeeProfile, "active">,
  discountBps: bigint = 0n,
  communityOverrideBps?: bigint,
): FeeSplit {
  let fee = applyBps(amount, profile.baseFeeBps);
  if (discountBps > 0n) fee = discountBy(fee, discountBps);

  let royalty = applyBps(amount, profile.royaltyBps);
  let communityFund = applyBps(
    amount,
    communityOverrideBps ?? profile.communityFundBps,
  );

  let platformFee: bigint;
  const distributed = royalty + communityFund;
  if (distributed > fee) {
    platformFee = 0n;
    royalty = (royalty * fee * BPS_DENOMINATOR) / distributed / BPS_DENOMINATOR;
    communityFund = fee - royalty;
  } else {
    platformFee = fee - distributed;
  }

  return { fee, royalty, communityFund, platformFee, discountBps };
}
