/**
 * Staking wire types.
 */

import { Type, type Static } from "@sinclair/typebox";
import { STAKING_TIERS } from "../constants.js";
import { Bps, Seconds, Uint256String } from "./common.js";

export const StakingTierSchema = Type.Union(STAKING_TIERS.map((t) => Type.Literal(t)));

export const CreateStakeRequest = Type.Object(
  { amount: Uint256String, duration_seconds: Type.Integer({ minimum: 1 }) },
  { additionalProperties: false },
);
export type CreateStakeRequest = Static<typeof CreateStakeRequest>;

export const IncreaseStakeRequest = Type.Object(
  { amount: Uint256String },
  { additionalProperties: false },
);
export type IncreaseStakeRequest = Static<typeof IncreaseStakeRequest>;

export const ExtendStakeRequest = Type.Object(
  { additional_seconds: Type.Integer({ minimum: 1 }) },
  { additionalProperties: false },
);
export type ExtendStakeRequest = Static<typeof ExtendStakeRequest>;

export const FundPoolRequest = Type.Object(
  { amount: Uint256String },
  { additionalProperties: false },
);
export type FundPoolRequest = Static<typeof FundPoolRequest>;

export const TierRequirementV1 = Type.Object(
  {
    min_amount: Uint256String,
    min_duration: Seconds,
    reward_multiplier_bps: Type.Integer({ minimum: 0, maximum: 100_000 }),
    governance_weight: Type.Integer({ minimum: 0, maximum: 1_000 }),
    fee_discount_bps: Bps,
    enabled: Type.Boolean(),
  },
  { additionalProperties: false },
);
export type TierRequirementV1 = Static<typeof TierRequirementV1>;

export const DurationBonusRequest = Type.Object(
  { threshold_seconds: Seconds, bonus_bps: Bps },
  { additionalProperties: false },
);
export type DurationBonusRequest = Static<typeof DurationBonusRequest>;
