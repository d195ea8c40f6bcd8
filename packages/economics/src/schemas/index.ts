/**
 * Schema barrel export.
 * Request bodies accepted by the ledger node.
 */

export {
  AddressString,
  Hash32String,
  Uint256String,
  Bps,
  Seconds,
  Memo,
} from "./common.js";

export {
  FeeTypeSchema,
  FeeProfileV1,
  FeeQuoteRequest,
  ProcessFeeRequest,
  VolumeDiscountTierV1,
  CollectionOverrideRequest,
} from "./fee.js";

export {
  FundName,
  CreateFundRequest,
  UpdateFundRequest,
  AllocationsRequest,
  DepositRequest,
  WithdrawRequest,
  ProfitWithdrawRequest,
} from "./treasury.js";

export {
  TransferRequest,
  BatchTransferRequest,
  ScheduleRequest,
  TopUpRequest,
  EscrowRequest,
  CollectionRequest,
  ContributeRequest,
  CollectionPayoutRequest,
  MembershipRequest,
} from "./transfer.js";

export {
  StakingTierSchema,
  CreateStakeRequest,
  IncreaseStakeRequest,
  ExtendStakeRequest,
  FundPoolRequest,
  TierRequirementV1,
  DurationBonusRequest,
} from "./staking.js";
