/**
 * Fee engine wire types.
 */

import { Type, type Static } from "@sinclair/typebox";
import { FEE_TYPES } from "../constants.js";
import { AddressString, Bps, Uint256String } from "./common.js";

export const FeeTypeSchema = Type.Union(FEE_TYPES.map((t) => Type.Literal(t)));

export const FeeProfileV1 = Type.Object(
  {
    base_fee_bps: Bps,
    royalty_bps: Bps,
    community_fund_bps: Bps,
    platform_fee_bps: Bps,
  },
  { additionalProperties: false },
);
export type FeeProfileV1 = Static<typeof FeeProfileV1>;

export const FeeQuoteRequest = Type.Object(
  {
    amount: Uint256String,
    fee_type: FeeTypeSchema,
    payer: AddressString,
    collection: Type.Optional(Type.String({ minLength: 1, maxLength: 128 })),
  },
  { additionalProperties: false },
);
export type FeeQuoteRequest = Static<typeof FeeQuoteRequest>;

export const ProcessFeeRequest = Type.Object(
  {
    amount: Uint256String,
    fee_type: FeeTypeSchema,
    payer: AddressString,
    creator: Type.Optional(AddressString),
    collection: Type.Optional(Type.String({ minLength: 1, maxLength: 128 })),
  },
  { additionalProperties: false },
);
export type ProcessFeeRequest = Static<typeof ProcessFeeRequest>;

export const VolumeDiscountTierV1 = Type.Object(
  {
    threshold: Uint256String,
    discount_bps: Bps,
  },
  { additionalProperties: false },
);
export type VolumeDiscountTierV1 = Static<typeof VolumeDiscountTierV1>;

export const CollectionOverrideRequest = Type.Object(
  {
    collection: Type.String({ minLength: 1, maxLength: 128 }),
    community_fund_bps: Type.Union([Bps, Type.Null()]),
  },
  { additionalProperties: false },
);
export type CollectionOverrideRequest = Static<typeof CollectionOverrideRequest>;
