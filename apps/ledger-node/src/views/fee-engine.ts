/**
 * Fee engine: marketplace fee profiles, volume discounts, distribution.
 *
 * A processed sale fee is split three ways: creator royalty, community
 * fund, platform fee. The platform share is deposited into the treasury.
 * Payers earn volume discounts from their cumulative processed amount.
 */

import {
  DEFAULT_VOLUME_DISCOUNTS,
  NATIVE_ASSET,
  computeFeeSplit,
  defaultFeeProfiles,
  deriveAccount,
  isBps,
  maxBigInt,
  validateFeeProfile,
  volumeDiscountFor,
  type Address,
  type FeeProfile,
  type FeeSplit,
  type FeeType,
} from "@tapa/economics";
import { authContext, requireCapability, type AuthContext } from "../auth.js";
import { invalid, notFound, rejected } from "../errors.js";
import { AppendOnlyLog } from "../host/append-only-log.js";
import { JournaledMap } from "../host/journaled-map.js";
import { ReentrancyGuard } from "../host/reentrancy.js";
import type { HostLedger } from "../host/host-ledger.js";
import {
  FEE_DISCOUNT_UPDATED_EVENT,
  FEE_PROCESSED_EVENT,
  FEE_PROFILE_UPDATED_EVENT,
} from "../event-log/schemas.js";
import type { TreasuryLedger } from "./treasury-ledger.js";
import { optionalAccount, requireAccount, requirePositive } from "./validate.js";

// ── Types ──────────────────────────────────────────────────────────

export interface FeeTransactionRecord extends FeeSplit {
  id: number;
  amount: bigint;
  feeType: FeeType;
  payer: Address;
  creator: Address | null;
  collection: string | null;
  timestamp: number;
  processed: boolean;
}

export interface ProcessFeeInput {
  amount: bigint;
  feeType: FeeType;
  payer: string;
  creator?: string;
  collection?: string;
}

/** Source of a per-account fee discount (staking tiers). */
export interface DiscountSource {
  feeDiscountOf(account: Address): bigint;
}

export interface FeeEngineOptions {
  treasury: TreasuryLedger;
  communityFundAddress: Address;
  discountSource?: DiscountSource;
}

interface FeeEngineTotals {
  communityFundAddress: Address;
  totalFeesCollected: bigint;
}

// ── Engine ─────────────────────────────────────────────────────────

export class FeeEngine {
  readonly account: Address = deriveAccount("fee-engine");

  private readonly profiles: JournaledMap<FeeType, FeeProfile>;
  private readonly volumeDiscounts: JournaledMap<bigint, bigint>;
  private readonly collectionOverrides: JournaledMap<string, bigint>;
  private readonly payerSpend: JournaledMap<Address, bigint>;
  private readonly transactions = new AppendOnlyLog<FeeTransactionRecord>();
  private totals: FeeEngineTotals;
  private readonly guard = new ReentrancyGuard("fee-engine");
  private readonly treasury: TreasuryLedger;
  private readonly discountSource: DiscountSource | undefined;
  /** The engine's own identity when depositing platform fees. */
  private readonly collectorAuth: AuthContext;

  constructor(
    private readonly host: HostLedger,
    options: FeeEngineOptions,
  ) {
    this.treasury = options.treasury;
    this.discountSource = options.discountSource;
    this.collectorAuth = authContext(this.account, ["fee_collector"]);
    this.profiles = new JournaledMap(host, defaultFeeProfiles());
    this.volumeDiscounts = new JournaledMap(host, DEFAULT_VOLUME_DISCOUNTS);
    this.collectionOverrides = new JournaledMap(host);
    this.payerSpend = new JournaledMap(host);
    this.totals = {
      communityFundAddress: requireAccount(options.communityFundAddress, "community_fund"),
      totalFeesCollected: 0n,
    };
    host.register(this);
    host.register(this.transactions);
  }

  snapshot(): FeeEngineTotals {
    return { ...this.totals };
  }

  restore(totals: FeeEngineTotals): void {
    this.totals = totals;
  }

  // ── Quotes ───────────────────────────────────────────────────────

  calculateFee(
    amount: bigint,
    feeType: FeeType,
    payer: Address,
    collection?: string,
  ): FeeSplit {
    const profile = this.profiles.get(feeType);
    if (!profile || !profile.active) {
      throw rejected("fee_type_inactive", `${feeType} is not active`);
    }
    const override =
      collection === undefined ? undefined : this.collectionOverrides.get(collection);
    return computeFeeSplit(amount, profile, this.getVolumeDiscount(payer), override);
  }

  /** Discount for `payer`: best of volume tier and staking tier. */
  getVolumeDiscount(payer: Address): bigint {
    const volume = volumeDiscountFor(this.getPayerSpend(payer), this.volumeDiscounts.view);
    const staking = this.discountSource?.feeDiscountOf(payer) ?? 0n;
    return maxBigInt(volume, staking);
  }

  getPayerSpend(payer: Address): bigint {
    return this.payerSpend.get(payer) ?? 0n;
  }

  // ── Processing ───────────────────────────────────────────────────

  /**
   * Charge and distribute a sale fee. The caller pays exactly `fee` in
   * native value; every distribution leg succeeds or nothing does.
   */
  processFee(auth: AuthContext, input: ProcessFeeInput): FeeTransactionRecord {
    return this.guard.run(() =>
      this.host.atomic(() => {
        requireCapability(auth, "marketplace", "fee_admin");
        const amount = requirePositive(input.amount);
        const payer = requireAccount(input.payer, "payer");
        const creator = optionalAccount(input.creator, "creator");
        const split = this.calculateFee(amount, input.feeType, payer, input.collection);

        const id = this.transactions.length + 1;
        this.payerSpend.set(payer, this.getPayerSpend(payer) + amount);
        this.totals.totalFeesCollected += split.fee;

        // Distribution. Royalty without a creator stays with the platform.
        const book = this.host.book;
        book.transfer(NATIVE_ASSET, auth.caller, this.account, split.fee);
        let platform = split.platformFee;
        if (creator) book.transfer(NATIVE_ASSET, this.account, creator, split.royalty);
        else platform += split.royalty;
        book.transfer(NATIVE_ASSET, this.account, this.totals.communityFundAddress, split.communityFund);
        if (platform > 0n) {
          this.treasury.depositFees(this.collectorAuth, platform, `fee transaction ${id}`);
        }

        // Recorded once every leg has paid out.
        const record = this.transactions.append({
          id,
          amount,
          feeType: input.feeType,
          payer,
          creator,
          collection: input.collection ?? null,
          timestamp: this.host.now(),
          processed: true,
          ...split,
        });
        this.host.events.append(FEE_PROCESSED_EVENT, record.timestamp, auth.caller, { ...record });
        return { ...record };
      }),
    );
  }

  getFeeTransaction(id: number): FeeTransactionRecord {
    const tx = this.transactions.at(id - 1);
    if (!tx) throw notFound("fee_transaction_not_found", `no fee transaction ${id}`);
    return { ...tx };
  }

  get transactionCount(): number {
    return this.transactions.length;
  }

  get totalFeesCollected(): bigint {
    return this.totals.totalFeesCollected;
  }

  // ── Administration ───────────────────────────────────────────────

  getFeeProfile(feeType: FeeType): FeeProfile {
    const profile = this.profiles.get(feeType);
    if (!profile) throw notFound("fee_type_not_found", `no profile for ${feeType}`);
    return { ...profile };
  }

  setFeeProfile(
    auth: AuthContext,
    feeType: FeeType,
    profile: Omit<FeeProfile, "active">,
  ): FeeProfile {
    return this.host.atomic(() => {
      requireCapability(auth, "fee_admin");
      const reason = validateFeeProfile(profile);
      if (reason) throw invalid("invalid_fee_profile", reason);
      const active = this.profiles.get(feeType)?.active ?? true;
      const next: FeeProfile = { ...profile, active };
      this.profiles.set(feeType, next);
      this.host.events.append(FEE_PROFILE_UPDATED_EVENT, this.host.now(), auth.caller, {
        feeType,
        ...next,
      });
      return { ...next };
    });
  }

  setFeeTypeActive(auth: AuthContext, feeType: FeeType, active: boolean): FeeProfile {
    return this.host.atomic(() => {
      requireCapability(auth, "fee_admin");
      const profile = this.profiles.get(feeType);
      if (!profile) throw notFound("fee_type_not_found", `no profile for ${feeType}`);
      profile.active = active;
      this.host.events.append(FEE_PROFILE_UPDATED_EVENT, this.host.now(), auth.caller, {
        feeType,
        ...profile,
      });
      return { ...profile };
    });
  }

  listVolumeDiscounts(): Array<{ threshold: bigint; discountBps: bigint }> {
    return Array.from(this.volumeDiscounts.view, ([threshold, discountBps]) => ({
      threshold,
      discountBps,
    })).sort((a, b) => (a.threshold < b.threshold ? -1 : a.threshold > b.threshold ? 1 : 0));
  }

  setVolumeDiscountTier(auth: AuthContext, threshold: bigint, discountBps: bigint): void {
    this.host.atomic(() => {
      requireCapability(auth, "fee_admin");
      if (threshold < 0n) throw invalid("invalid_threshold", "threshold must be >= 0");
      if (!isBps(discountBps)) {
        throw invalid("invalid_discount", "discount must be within 0-10000 bps");
      }
      this.volumeDiscounts.set(threshold, discountBps);
      this.host.events.append(FEE_DISCOUNT_UPDATED_EVENT, this.host.now(), auth.caller, {
        threshold,
        discountBps,
      });
    });
  }

  removeVolumeDiscountTier(auth: AuthContext, threshold: bigint): void {
    this.host.atomic(() => {
      requireCapability(auth, "fee_admin");
      if (!this.volumeDiscounts.delete(threshold)) {
        throw notFound("discount_tier_not_found", `no discount tier at ${threshold}`);
      }
      this.host.events.append(FEE_DISCOUNT_UPDATED_EVENT, this.host.now(), auth.caller, {
        threshold,
        discountBps: null,
      });
    });
  }

  /** Per-collection community fund bps; null clears the override. */
  setCollectionCommunityOverride(
    auth: AuthContext,
    collection: string,
    communityFundBps: bigint | null,
  ): void {
    this.host.atomic(() => {
      requireCapability(auth, "fee_admin");
      if (!collection) throw invalid("invalid_collection", "collection must not be empty");
      if (communityFundBps === null) {
        this.collectionOverrides.delete(collection);
      } else {
        if (!isBps(communityFundBps)) {
          throw invalid("invalid_override", "override must be within 0-10000 bps");
        }
        this.collectionOverrides.set(collection, communityFundBps);
      }
      this.host.events.append(FEE_PROFILE_UPDATED_EVENT, this.host.now(), auth.caller, {
        collection,
        communityFundBps,
      });
    });
  }

  get communityFundAddress(): Address {
    return this.totals.communityFundAddress;
  }

  setCommunityFundAddress(auth: AuthContext, address: string): void {
    this.host.atomic(() => {
      requireCapability(auth, "fee_admin");
      this.totals.communityFundAddress = requireAccount(address, "community_fund");
      this.host.events.append(FEE_PROFILE_UPDATED_EVENT, this.host.now(), auth.caller, {
        communityFundAddress: this.totals.communityFundAddress,
      });
    });
  }
}
