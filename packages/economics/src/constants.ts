/**
 * Ledger constants.
 *
 * FROZEN constants define units and hard bounds: changing them changes
 * the meaning of stored records.
 * DEFAULT constants seed the admin-tunable tables (fee profiles, discount
 * tiers, staking tiers). Admins replace them at runtime.
 */

// ── Frozen (units and bounds) ──────────────────────────────────────
export const BPS_DENOMINATOR = 10_000n; // 10000 bps = 100%
export const MAX_BASE_FEE_BPS = 3_000n; // 30%
export const WAD = 10n ** 18n; // fixed-point scale for reward rates
export const ONE_ETHER = 10n ** 18n;
export const MAX_UINT256 = 2n ** 256n - 1n;

export const SECONDS_PER_DAY = 86_400;
export const DAILY_WINDOW_SECONDS = SECONDS_PER_DAY;

export const ZERO_ADDRESS = "0x0000000000000000000000000000000000000000";

/** Asset tags carried by the value book. */
export const NATIVE_ASSET = "native" as const;
export const STAKING_ASSET = "PSF" as const;

export const UNALLOCATED_FUND_NAME = "Unallocated";

// ── Fee engine defaults ────────────────────────────────────────────
export const FEE_TYPES = [
  "StandardSale",
  "Auction",
  "PremiumListing",
  "PhysicalItem",
  "DigitalContent",
  "CrossCultural",
] as const;

/** [baseFee, royalty, communityFund, platformFee] in bps; royalty + community + platform == base. */
export const DEFAULT_FEE_PROFILES_BPS = {
  StandardSale: [250n, 100n, 50n, 100n],
  Auction: [300n, 100n, 50n, 150n],
  PremiumListing: [350n, 100n, 50n, 200n],
  PhysicalItem: [200n, 75n, 50n, 75n],
  DigitalContent: [250n, 150n, 50n, 50n],
  CrossCultural: [150n, 75n, 50n, 25n],
} as const;

/** Cumulative-spend threshold (wei) → discount bps. */
export const DEFAULT_VOLUME_DISCOUNTS: ReadonlyArray<readonly [bigint, bigint]> = [
  [1n * ONE_ETHER, 1_000n], // 10%
  [5n * ONE_ETHER, 1_500n], // 15%
  [10n * ONE_ETHER, 2_000n], // 20%
];

// ── Transfer engine defaults ───────────────────────────────────────
export const TRANSFER_FEE_GUEST_BPS = 100n; // 1%
export const TRANSFER_FEE_MEMBER_BPS = 50n; // 0.5%
export const TRANSFER_FEE_NODE_OPERATOR_BPS = 25n; // 0.25%

export const MIN_TRANSFER_FEE_WEI = 10n ** 12n; // 0.000001 ether
export const MAX_TRANSFER_FEE_WEI = 10n ** 17n; // 0.1 ether

export const DAILY_LIMIT_GUEST_WEI = 10n * ONE_ETHER;
export const DAILY_LIMIT_MEMBER_WEI = 50n * ONE_ETHER;
export const DAILY_LIMIT_NODE_OPERATOR_WEI = 100n * ONE_ETHER;

export const MAX_BATCH_SIZE = 100;
export const MIN_SCHEDULE_INTERVAL_SECONDS = 3_600; // 1h
export const MAX_SCHEDULE_INTERVAL_SECONDS = 365 * SECONDS_PER_DAY;
export const MAX_SCHEDULE_START_DELAY_SECONDS = 365 * SECONDS_PER_DAY;
export const MAX_ESCROW_SECONDS = 365 * SECONDS_PER_DAY;
export const MAX_COLLECTION_SECONDS = 365 * SECONDS_PER_DAY;

// ── Staking defaults ───────────────────────────────────────────────
/** Checked highest → lowest; first enabled match wins. */
export const STAKING_TIERS = [
  "NodeOperator",
  "Validator",
  "Platinum",
  "Gold",
  "Silver",
  "Basic",
] as const;

export const MIN_STAKE_DURATION_SECONDS = 7 * SECONDS_PER_DAY;
export const MAX_STAKE_DURATION_SECONDS = 4 * 365 * SECONDS_PER_DAY;

/** ~5% APR at WAD scale: 0.05e18 / 31_536_000. */
export const BASE_REWARD_RATE_PER_SECOND = 1_585_489_599n;

/** Duration threshold (seconds) → bonus bps. Highest threshold met applies. */
export const DEFAULT_DURATION_BONUSES: ReadonlyArray<readonly [number, bigint]> = [
  [30 * SECONDS_PER_DAY, 200n],
  [90 * SECONDS_PER_DAY, 500n],
  [180 * SECONDS_PER_DAY, 1_000n],
  [365 * SECONDS_PER_DAY, 2_000n],
];
