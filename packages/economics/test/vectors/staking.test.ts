/**
 * Staking math tests: tier classification, duration bonus, accrual,
 * governance weight.
 */

import { describe, it, expect } from "vitest";
import {
  classifyTier,
  defaultTierTable,
  defaultDurationBonuses,
  durationBonusFor,
  effectiveRewardRate,
  accruedRewards,
  remainingTimeFraction,
  stakeGovernanceWeight,
  BASE_REWARD_RATE_PER_SECOND,
  ONE_ETHER,
  SECONDS_PER_DAY,
  WAD,
} from "../../src/index.js";

const DAY = SECONDS_PER_DAY;
const tiers = defaultTierTable();
const bonuses = defaultDurationBonuses();

describe("classifyTier", () => {
  it("1000e18 for 90 days is Silver", () => {
    expect(classifyTier(1_000n * ONE_ETHER, 90 * DAY, tiers)).toBe("Silver");
  });

  it("amount alone does not lift the tier: duration must also be met", () => {
    expect(classifyTier(10_000n * ONE_ETHER, 30 * DAY, tiers)).toBe("Silver");
  });

  it("minimums are inclusive", () => {
    expect(classifyTier(100n * ONE_ETHER, 7 * DAY, tiers)).toBe("Basic");
    expect(classifyTier(100_000n * ONE_ETHER, 365 * DAY, tiers)).toBe("NodeOperator");
  });

  it("returns null below every tier", () => {
    expect(classifyTier(99n * ONE_ETHER, 365 * DAY, tiers)).toBeNull();
    expect(classifyTier(1_000n * ONE_ETHER, 6 * DAY, tiers)).toBeNull();
  });

  it("skips disabled tiers", () => {
    const custom = defaultTierTable();
    const node = custom.get("NodeOperator");
    if (node) custom.set("NodeOperator", { ...node, enabled: false });
    expect(classifyTier(100_000n * ONE_ETHER, 365 * DAY, custom)).toBe("Validator");
  });
});

describe("durationBonusFor", () => {
  it("90 days → 500 bps", () => {
    expect(durationBonusFor(90 * DAY, bonuses)).toBe(500n);
  });

  it("highest threshold met, not cumulative", () => {
    expect(durationBonusFor(29 * DAY, bonuses)).toBe(0n);
    expect(durationBonusFor(30 * DAY, bonuses)).toBe(200n);
    expect(durationBonusFor(200 * DAY, bonuses)).toBe(1_000n);
    expect(durationBonusFor(400 * DAY, bonuses)).toBe(2_000n);
  });
});

describe("effectiveRewardRate", () => {
  it("identity multiplier and no bonus returns the base rate", () => {
    expect(effectiveRewardRate(WAD, 10_000n, 0n)).toBe(WAD);
  });

  it("Silver for 90 days: base × 1.25 × 1.05, floored at each step", () => {
    expect(effectiveRewardRate(BASE_REWARD_RATE_PER_SECOND, 12_500n, 500n)).toBe(
      2_080_955_097n,
    );
  });
});

describe("accruedRewards", () => {
  const amount = 1_000n * ONE_ETHER;
  const rate = 2_080_955_097n;

  it("zero elapsed → zero reward", () => {
    expect(accruedRewards(amount, rate, 0)).toBe(0n);
  });

  it("negative elapsed (clock skew) → zero reward", () => {
    expect(accruedRewards(amount, rate, -5)).toBe(0n);
  });

  it("one day: amount × rate × 86400 / 1e18", () => {
    expect(accruedRewards(amount, rate, DAY)).toBe((amount * rate * 86_400n) / WAD);
    expect(accruedRewards(amount, rate, DAY)).toBe(179_794_520_380_800_000n);
  });

  it("is linear in elapsed time", () => {
    const oneDay = accruedRewards(amount, rate, DAY);
    const tenDays = accruedRewards(amount, rate, 10 * DAY);
    expect(tenDays).toBe(oneDay * 10n);
  });
});

describe("governance weight", () => {
  it("remaining fraction in bps", () => {
    expect(remainingTimeFraction(0, 100, 25)).toBe(7_500n);
    expect(remainingTimeFraction(0, 100, 0)).toBe(10_000n);
  });

  it("past end time counts as the full fraction", () => {
    expect(remainingTimeFraction(0, 100, 100)).toBe(10_000n);
    expect(remainingTimeFraction(0, 100, 150)).toBe(10_000n);
  });

  it("amount × weight × fraction / 10000", () => {
    expect(stakeGovernanceWeight(1_000n, 2n, 0, 100, 50)).toBe(1_000n);
    expect(stakeGovernanceWeight(1_000n, 2n, 0, 100, 100)).toBe(2_000n);
  });
});
