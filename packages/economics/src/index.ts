/**
 * @tapa/economics: Frozen accounting primitives.
 *
 * Pure integer math and versioned wire schemas for the fee, treasury,
 * transfer and staking ledgers. No state, no I/O.
 * The ledger node imports from here, never the reverse.
 */

// Basis-point arithmetic
export {
  applyBps,
  discountBy,
  mulDiv,
  isUint256,
  isBps,
  parseUint256,
  minBigInt,
  maxBigInt,
  sumBigInt,
} from "./bps.js";

// Addresses and derived ids
export {
  isAddress,
  normalizeAddress,
  isZeroAddress,
  keccakHex,
  fundIdFromName,
  deriveAccount,
  type Address,
  type Hash32,
} from "./address.js";

// Marketplace fee split
export {
  isFeeType,
  validateFeeProfile,
  defaultFeeProfiles,
  computeFeeSplit,
  type FeeType,
  type FeeProfile,
  type FeeSplit,
} from "./fee-split.js";

// Volume discounts
export { volumeDiscountFor, type VolumeDiscountTable } from "./volume-discount.js";

// Treasury apportionment
export {
  apportionDeposit,
  unallocatedRemainder,
  planProportionalDraw,
  type FundWeight,
  type FundBalance,
} from "./allocation.js";

// Transfer fees and daily caps
export {
  transferTierOf,
  transferFeeBps,
  dailyLimitFor,
  computeTransferFee,
  chargeDailyWindow,
  type TransferTier,
  type FeeBounds,
  type DailyUsage,
} from "./transfer-fee.js";

// Staking
export {
  isStakingTier,
  defaultTierTable,
  defaultDurationBonuses,
  classifyTier,
  durationBonusFor,
  effectiveRewardRate,
  accruedRewards,
  remainingTimeFraction,
  stakeGovernanceWeight,
  type StakingTier,
  type TierRequirement,
  type TierTable,
  type DurationBonusTable,
} from "./staking.js";

// All schemas
export * from "./schemas/index.js";

// Constants
export * from "./constants.js";
