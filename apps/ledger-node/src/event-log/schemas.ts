/**
 * Ledger event schemas: append-only record of every mutation.
 *
 * Events are written inside the operation's transaction and vanish with
 * it on revert. Payloads are wire-encoded (bigints as decimal strings).
 */

import { Type, type Static } from "@sinclair/typebox";

export const LedgerEvent = Type.Object({
  /** Monotonic sequence number within the log. */
  seq: Type.Integer({ minimum: 1 }),
  /** Event type discriminator. */
  type: Type.String(),
  /** Ledger time (unix seconds). */
  timestamp: Type.Integer({ minimum: 0 }),
  /** Account that caused the event. */
  actor: Type.String(),
  /** Event-specific payload. */
  payload: Type.Unknown(),
});

export type LedgerEvent = Static<typeof LedgerEvent>;

// ── Event types ────────────────────────────────────────────────────

export const FEE_PROCESSED_EVENT = "fee.processed.v1" as const;
export const FEE_PROFILE_UPDATED_EVENT = "fee.profile.updated.v1" as const;
export const FEE_DISCOUNT_UPDATED_EVENT = "fee.discount.updated.v1" as const;

export const TREASURY_DEPOSIT_EVENT = "treasury.deposit.v1" as const;
export const TREASURY_EXPENSE_EVENT = "treasury.expense.v1" as const;
export const TREASURY_FUND_CREATED_EVENT = "treasury.fund.created.v1" as const;
export const TREASURY_FUND_UPDATED_EVENT = "treasury.fund.updated.v1" as const;
export const TREASURY_FUND_DEACTIVATED_EVENT = "treasury.fund.deactivated.v1" as const;
export const TREASURY_ALLOCATIONS_EVENT = "treasury.allocations.v1" as const;

export const TRANSFER_EVENT = "transfer.v1" as const;
export const TRANSFER_WITHDRAWN_EVENT = "transfer.withdrawn.v1" as const;
export const SCHEDULE_CREATED_EVENT = "schedule.created.v1" as const;
export const SCHEDULE_EXECUTED_EVENT = "schedule.executed.v1" as const;
export const SCHEDULE_CANCELLED_EVENT = "schedule.cancelled.v1" as const;
export const SCHEDULE_TOPPED_UP_EVENT = "schedule.topped_up.v1" as const;
export const ESCROW_CREATED_EVENT = "escrow.created.v1" as const;
export const ESCROW_SETTLED_EVENT = "escrow.settled.v1" as const;
export const COLLECTION_CREATED_EVENT = "collection.created.v1" as const;
export const COLLECTION_CONTRIBUTION_EVENT = "collection.contribution.v1" as const;
export const COLLECTION_FINALIZED_EVENT = "collection.finalized.v1" as const;
export const COLLECTION_PAYOUT_EVENT = "collection.payout.v1" as const;
export const MEMBERSHIP_EVENT = "membership.updated.v1" as const;

export const STAKE_CREATED_EVENT = "stake.created.v1" as const;
export const STAKE_UPDATED_EVENT = "stake.updated.v1" as const;
export const STAKE_REWARDS_CLAIMED_EVENT = "stake.rewards_claimed.v1" as const;
export const STAKE_WITHDRAWN_EVENT = "stake.withdrawn.v1" as const;
export const STAKING_POOL_FUNDED_EVENT = "staking.pool_funded.v1" as const;
export const STAKING_CONFIG_EVENT = "staking.config.v1" as const;
