/**
 * Treasury wire types.
 */

import { Type, type Static } from "@sinclair/typebox";
import { AddressString, Bps, Hash32String, Memo, Uint256String } from "./common.js";

export const FundName = Type.String({ minLength: 1, maxLength: 64 });

export const CreateFundRequest = Type.Object(
  { name: FundName, allocation_bps: Bps },
  { additionalProperties: false },
);
export type CreateFundRequest = Static<typeof CreateFundRequest>;

/** A fund's name derives its id, so only the weight can change. */
export const UpdateFundRequest = Type.Object(
  { allocation_bps: Bps },
  { additionalProperties: false },
);
export type UpdateFundRequest = Static<typeof UpdateFundRequest>;

export const AllocationsRequest = Type.Object(
  {
    allocations: Type.Array(
      Type.Object(
        { fund_id: Hash32String, allocation_bps: Bps },
        { additionalProperties: false },
      ),
      { minItems: 1, maxItems: 64 },
    ),
  },
  { additionalProperties: false },
);
export type AllocationsRequest = Static<typeof AllocationsRequest>;

export const DepositRequest = Type.Object(
  {
    amount: Uint256String,
    description: Memo,
    fund_id: Type.Optional(Hash32String),
  },
  { additionalProperties: false },
);
export type DepositRequest = Static<typeof DepositRequest>;

export const WithdrawRequest = Type.Object(
  {
    fund_id: Hash32String,
    recipient: AddressString,
    amount: Uint256String,
    description: Memo,
  },
  { additionalProperties: false },
);
export type WithdrawRequest = Static<typeof WithdrawRequest>;

export const ProfitWithdrawRequest = Type.Object(
  { recipient: AddressString, amount: Uint256String },
  { additionalProperties: false },
);
export type ProfitWithdrawRequest = Static<typeof ProfitWithdrawRequest>;
