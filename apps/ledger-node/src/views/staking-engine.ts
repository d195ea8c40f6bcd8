/**
 * Staking reward engine: locked PSF stakes, tiered linear rewards,
 * time-weighted governance power.
 *
 * Rewards accrue per second since the last claim and are paid from a
 * rewards pool funded separately. Any change to a stake (increase,
 * extend, unstake) settles accrued rewards first.
 */

import {
  BASE_REWARD_RATE_PER_SECOND,
  MAX_STAKE_DURATION_SECONDS,
  MIN_STAKE_DURATION_SECONDS,
  STAKING_ASSET,
  STAKING_TIERS,
  accruedRewards,
  classifyTier,
  defaultDurationBonuses,
  defaultTierTable,
  deriveAccount,
  durationBonusFor,
  effectiveRewardRate,
  isBps,
  stakeGovernanceWeight,
  type Address,
  type StakingTier,
  type TierRequirement,
} from "@tapa/economics";
import { requireCapability, type AuthContext } from "../auth.js";
import { invalid, notFound, rejected, unauthorized } from "../errors.js";
import { JournaledMap } from "../host/journaled-map.js";
import { ReentrancyGuard } from "../host/reentrancy.js";
import type { HostLedger } from "../host/host-ledger.js";
import {
  STAKE_CREATED_EVENT,
  STAKE_REWARDS_CLAIMED_EVENT,
  STAKE_UPDATED_EVENT,
  STAKE_WITHDRAWN_EVENT,
  STAKING_CONFIG_EVENT,
  STAKING_POOL_FUNDED_EVENT,
} from "../event-log/schemas.js";
import { requirePositive, requireSeconds } from "./validate.js";

// ── Types ──────────────────────────────────────────────────────────

export interface Stake {
  id: number;
  owner: Address;
  amount: bigint;
  startTime: number;
  endTime: number;
  lastClaimTime: number;
  tier: StakingTier;
  active: boolean;
  claimedRewards: bigint;
}

export interface StakingPool {
  rewardsPool: bigint;
  totalStaked: bigint;
  baseRewardRate: bigint;
  activeStakes: number;
}

interface StakingTotals {
  baseRewardRate: bigint;
  rewardsPool: bigint;
  totalStaked: bigint;
  nextStakeId: number;
}

// ── Engine ─────────────────────────────────────────────────────────

export class StakingRewardEngine {
  readonly account: Address = deriveAccount("staking");

  private readonly stakes: JournaledMap<number, Stake>;
  private readonly byOwner: JournaledMap<Address, number[]>;
  private readonly tiers: JournaledMap<StakingTier, TierRequirement>;
  private readonly bonuses: JournaledMap<number, bigint>;
  private totals: StakingTotals = {
    baseRewardRate: BASE_REWARD_RATE_PER_SECOND,
    rewardsPool: 0n,
    totalStaked: 0n,
    nextStakeId: 1,
  };
  private readonly guard = new ReentrancyGuard("staking");

  constructor(private readonly host: HostLedger) {
    this.stakes = new JournaledMap(host);
    this.byOwner = new JournaledMap(host);
    this.tiers = new JournaledMap(host, defaultTierTable());
    this.bonuses = new JournaledMap(host, defaultDurationBonuses());
    host.register(this);
  }

  snapshot(): StakingTotals {
    return { ...this.totals };
  }

  restore(totals: StakingTotals): void {
    this.totals = totals;
  }

  // ── Stake lifecycle ──────────────────────────────────────────────

  createStake(auth: AuthContext, amount: bigint, duration: number): Stake {
    return this.host.atomic(() => {
      requirePositive(amount);
      requireSeconds(duration, "duration", MIN_STAKE_DURATION_SECONDS, MAX_STAKE_DURATION_SECONDS);
      const tier = classifyTier(amount, duration, this.tiers.view);
      if (!tier) {
        throw rejected("below_minimum_stake", "amount and duration meet no enabled tier");
      }
      this.host.book.transfer(STAKING_ASSET, auth.caller, this.account, amount);

      const now = this.host.now();
      const stake: Stake = {
        id: this.totals.nextStakeId++,
        owner: auth.caller,
        amount,
        startTime: now,
        endTime: now + duration,
        lastClaimTime: now,
        tier,
        active: true,
        claimedRewards: 0n,
      };
      this.stakes.set(stake.id, stake);
      const owned = this.byOwner.get(auth.caller) ?? [];
      owned.push(stake.id);
      this.byOwner.set(auth.caller, owned);
      this.totals.totalStaked += amount;

      this.host.events.append(STAKE_CREATED_EVENT, now, auth.caller, { ...stake });
      return { ...stake };
    });
  }

  claimRewards(auth: AuthContext, stakeId: number): bigint {
    return this.guard.run(() =>
      this.host.atomic(() => this.settle(this.ownedActiveStake(auth, stakeId))),
    );
  }

  increaseStake(auth: AuthContext, stakeId: number, amount: bigint): Stake {
    return this.guard.run(() =>
      this.host.atomic(() => {
        const stake = this.ownedActiveStake(auth, stakeId);
        requirePositive(amount);
        this.settle(stake);
        this.host.book.transfer(STAKING_ASSET, auth.caller, this.account, amount);
        stake.amount += amount;
        this.totals.totalStaked += amount;
        this.retier(stake);
        this.host.events.append(STAKE_UPDATED_EVENT, this.host.now(), auth.caller, { ...stake });
        return { ...stake };
      }),
    );
  }

  extendStake(auth: AuthContext, stakeId: number, additionalSeconds: number): Stake {
    return this.guard.run(() =>
      this.host.atomic(() => {
        const stake = this.ownedActiveStake(auth, stakeId);
        requireSeconds(additionalSeconds, "additional_seconds", 1, MAX_STAKE_DURATION_SECONDS);
        if (stake.endTime + additionalSeconds - stake.startTime > MAX_STAKE_DURATION_SECONDS) {
          throw rejected(
            "max_duration_exceeded",
            `stake duration may not exceed ${MAX_STAKE_DURATION_SECONDS} seconds`,
          );
        }
        this.settle(stake);
        stake.endTime += additionalSeconds;
        this.retier(stake);
        this.host.events.append(STAKE_UPDATED_EVENT, this.host.now(), auth.caller, { ...stake });
        return { ...stake };
      }),
    );
  }

  /** Settle rewards and return the principal. Only after the lock ends. */
  unstake(auth: AuthContext, stakeId: number): Stake {
    return this.guard.run(() =>
      this.host.atomic(() => {
        const stake = this.ownedActiveStake(auth, stakeId);
        const now = this.host.now();
        if (now < stake.endTime) {
          throw rejected("stake_locked", `stake ${stakeId} is locked until ${stake.endTime}`);
        }
        this.settle(stake);
        stake.active = false;
        this.totals.totalStaked -= stake.amount;
        this.host.events.append(STAKE_WITHDRAWN_EVENT, now, auth.caller, {
          stakeId,
          amount: stake.amount,
        });
        this.host.book.transfer(STAKING_ASSET, this.account, stake.owner, stake.amount);
        return { ...stake };
      }),
    );
  }

  fundRewardsPool(auth: AuthContext, amount: bigint): bigint {
    return this.host.atomic(() => {
      requirePositive(amount);
      this.host.book.transfer(STAKING_ASSET, auth.caller, this.account, amount);
      this.totals.rewardsPool += amount;
      this.host.events.append(STAKING_POOL_FUNDED_EVENT, this.host.now(), auth.caller, {
        amount,
        rewardsPool: this.totals.rewardsPool,
      });
      return this.totals.rewardsPool;
    });
  }

  // ── Administration ───────────────────────────────────────────────

  setTierRequirement(auth: AuthContext, tier: StakingTier, req: TierRequirement): void {
    this.host.atomic(() => {
      requireCapability(auth, "staking_admin");
      if (req.minAmount < 0n || req.rewardMultiplierBps < 0n || req.governanceWeight < 0n) {
        throw invalid("invalid_tier_requirement", "tier values must be >= 0");
      }
      if (!isBps(req.feeDiscountBps)) {
        throw invalid("invalid_tier_requirement", "fee discount must be within 0-10000 bps");
      }
      this.tiers.set(tier, { ...req });
      this.host.events.append(STAKING_CONFIG_EVENT, this.host.now(), auth.caller, { tier, ...req });
    });
  }

  /** Bonus bps for stakes of at least `threshold` seconds; 0 removes it. */
  setDurationBonus(auth: AuthContext, threshold: number, bonusBps: bigint): void {
    this.host.atomic(() => {
      requireCapability(auth, "staking_admin");
      requireSeconds(threshold, "threshold", 0, MAX_STAKE_DURATION_SECONDS);
      if (!isBps(bonusBps)) throw invalid("invalid_bonus", "bonus must be within 0-10000 bps");
      if (bonusBps === 0n) this.bonuses.delete(threshold);
      else this.bonuses.set(threshold, bonusBps);
      this.host.events.append(STAKING_CONFIG_EVENT, this.host.now(), auth.caller, {
        threshold,
        bonusBps,
      });
    });
  }

  setBaseRewardRate(auth: AuthContext, rate: bigint): void {
    this.host.atomic(() => {
      requireCapability(auth, "staking_admin");
      if (rate < 0n) throw invalid("invalid_rate", "rate must be >= 0");
      this.totals.baseRewardRate = rate;
      this.host.events.append(STAKING_CONFIG_EVENT, this.host.now(), auth.caller, {
        baseRewardRate: rate,
      });
    });
  }

  // ── Queries ──────────────────────────────────────────────────────

  getStake(stakeId: number): Stake {
    const stake = this.stakes.get(stakeId);
    if (!stake) throw notFound("stake_not_found", `no stake ${stakeId}`);
    return { ...stake };
  }

  getStakesOf(owner: Address): Stake[] {
    const ids = this.byOwner.get(owner) ?? [];
    return ids.flatMap((id) => {
      const stake = this.stakes.get(id);
      return stake ? [{ ...stake }] : [];
    });
  }

  pendingRewards(stakeId: number): bigint {
    const stake = this.stakes.get(stakeId);
    if (!stake) throw notFound("stake_not_found", `no stake ${stakeId}`);
    if (!stake.active) return 0n;
    return accruedRewards(stake.amount, this.rateFor(stake), this.host.now() - stake.lastClaimTime);
  }

  getGovernanceWeight(account: Address): bigint {
    const now = this.host.now();
    let weight = 0n;
    for (const stake of this.activeStakesOf(account)) {
      const req = this.tiers.get(stake.tier);
      if (!req) continue;
      weight += stakeGovernanceWeight(stake.amount, req.governanceWeight, stake.startTime, stake.endTime, now);
    }
    return weight;
  }

  /** Highest tier among the account's active stakes. */
  highestTierOf(account: Address): StakingTier | null {
    let best: number | null = null;
    for (const stake of this.activeStakesOf(account)) {
      const rank = STAKING_TIERS.indexOf(stake.tier);
      if (best === null || rank < best) best = rank;
    }
    return best === null ? null : (STAKING_TIERS[best] ?? null);
  }

  feeDiscountOf(account: Address): bigint {
    const tier = this.highestTierOf(account);
    if (!tier) return 0n;
    const req = this.tiers.get(tier);
    return req?.enabled ? req.feeDiscountBps : 0n;
  }

  isNodeOperator(account: Address): boolean {
    return this.highestTierOf(account) === "NodeOperator";
  }

  tierRequirements(): Array<{ tier: StakingTier } & TierRequirement> {
    return STAKING_TIERS.flatMap((tier) => {
      const req = this.tiers.get(tier);
      return req ? [{ tier, ...req }] : [];
    });
  }

  pool(): StakingPool {
    let activeStakes = 0;
    for (const stake of this.stakes.view.values()) if (stake.active) activeStakes++;
    return {
      rewardsPool: this.totals.rewardsPool,
      totalStaked: this.totals.totalStaked,
      baseRewardRate: this.totals.baseRewardRate,
      activeStakes,
    };
  }

  // ── Internals ────────────────────────────────────────────────────

  private rateFor(stake: Stake): bigint {
    const req = this.tiers.get(stake.tier);
    const multiplier = req?.rewardMultiplierBps ?? 0n;
    const bonus = durationBonusFor(stake.endTime - stake.startTime, this.bonuses.view);
    return effectiveRewardRate(this.totals.baseRewardRate, multiplier, bonus);
  }

  /** Pay accrued rewards from the pool; lastClaimTime moves to now. */
  private settle(stake: Stake): bigint {
    const now = this.host.now();
    const reward = accruedRewards(stake.amount, this.rateFor(stake), now - stake.lastClaimTime);
    if (reward > this.totals.rewardsPool) {
      throw rejected(
        "insufficient_rewards_pool",
        `pool holds ${this.totals.rewardsPool}, stake ${stake.id} is owed ${reward}`,
      );
    }
    this.totals.rewardsPool -= reward;
    stake.lastClaimTime = now;
    stake.claimedRewards += reward;
    if (reward > 0n) {
      this.host.events.append(STAKE_REWARDS_CLAIMED_EVENT, now, stake.owner, {
        stakeId: stake.id,
        reward,
      });
      this.host.book.transfer(STAKING_ASSET, this.account, stake.owner, reward);
    }
    return reward;
  }

  /** Re-evaluate the tier after a change; keep the old tier if none matches. */
  private retier(stake: Stake): void {
    stake.tier = classifyTier(stake.amount, stake.endTime - stake.startTime, this.tiers.view) ?? stake.tier;
  }

  private ownedActiveStake(auth: AuthContext, stakeId: number): Stake {
    const stake = this.stakes.get(stakeId);
    if (!stake) throw notFound("stake_not_found", `no stake ${stakeId}`);
    if (stake.owner !== auth.caller) {
      throw unauthorized("not_stake_owner", `stake ${stakeId} belongs to ${stake.owner}`);
    }
    if (!stake.active) throw rejected("stake_inactive", `stake ${stakeId} is inactive`);
    return stake;
  }

  private activeStakesOf(account: Address): Stake[] {
    return this.getStakesOf(account).filter((s) => s.active);
  }
}
