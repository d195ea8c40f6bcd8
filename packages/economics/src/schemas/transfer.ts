/**
 * Transfer engine wire types.
 */

import { Type, type Static } from "@sinclair/typebox";
import { MAX_BATCH_SIZE } from "../constants.js";
import { AddressString, Memo, Seconds, Uint256String } from "./common.js";

export const TransferRequest = Type.Object(
  { recipient: AddressString, amount: Uint256String, memo: Type.Optional(Memo) },
  { additionalProperties: false },
);
export type TransferRequest = Static<typeof TransferRequest>;

export const BatchTransferRequest = Type.Object(
  {
    recipients: Type.Array(AddressString, { minItems: 1, maxItems: MAX_BATCH_SIZE }),
    amounts: Type.Array(Uint256String, { minItems: 1, maxItems: MAX_BATCH_SIZE }),
    memo: Type.Optional(Memo),
  },
  { additionalProperties: false },
);
export type BatchTransferRequest = Static<typeof BatchTransferRequest>;

export const ScheduleRequest = Type.Object(
  {
    recipient: AddressString,
    amount: Uint256String,
    interval_seconds: Type.Integer({ minimum: 1 }),
    repetitions: Type.Integer({ minimum: 0, maximum: 10_000 }),
    start_time: Type.Optional(Seconds),
    prefund_intervals: Type.Optional(Type.Integer({ minimum: 1, maximum: 10_000 })),
  },
  { additionalProperties: false },
);
export type ScheduleRequest = Static<typeof ScheduleRequest>;

export const TopUpRequest = Type.Object(
  { intervals: Type.Integer({ minimum: 1, maximum: 10_000 }) },
  { additionalProperties: false },
);
export type TopUpRequest = Static<typeof TopUpRequest>;

export const EscrowRequest = Type.Object(
  {
    recipient: AddressString,
    amount: Uint256String,
    expires_in: Type.Integer({ minimum: 1 }),
    arbiter: Type.Optional(AddressString),
  },
  { additionalProperties: false },
);
export type EscrowRequest = Static<typeof EscrowRequest>;

export const CollectionRequest = Type.Object(
  {
    purpose: Type.String({ minLength: 1, maxLength: 280 }),
    goal: Uint256String,
    duration_seconds: Type.Integer({ minimum: 1 }),
  },
  { additionalProperties: false },
);
export type CollectionRequest = Static<typeof CollectionRequest>;

export const ContributeRequest = Type.Object(
  { amount: Uint256String },
  { additionalProperties: false },
);
export type ContributeRequest = Static<typeof ContributeRequest>;

export const CollectionPayoutRequest = Type.Object(
  { recipient: AddressString, amount: Uint256String },
  { additionalProperties: false },
);
export type CollectionPayoutRequest = Static<typeof CollectionPayoutRequest>;

export const MembershipRequest = Type.Object(
  { account: AddressString, enabled: Type.Boolean() },
  { additionalProperties: false },
);
export type MembershipRequest = Static<typeof MembershipRequest>;
