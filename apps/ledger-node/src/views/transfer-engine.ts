/**
 * Transfer engine: tiered peer-to-peer transfers with pull payments.
 *
 * Senders pay in; the fee goes to the treasury and the net lands in the
 * recipient's pending balance, which the recipient withdraws. Also runs
 * scheduled (recurring) transfers, escrows, community collections and
 * the membership registry that decides each account's fee tier.
 */

import {
  MAX_BATCH_SIZE,
  MAX_COLLECTION_SECONDS,
  MAX_ESCROW_SECONDS,
  MAX_SCHEDULE_INTERVAL_SECONDS,
  MAX_SCHEDULE_START_DELAY_SECONDS,
  MAX_TRANSFER_FEE_WEI,
  MIN_SCHEDULE_INTERVAL_SECONDS,
  MIN_TRANSFER_FEE_WEI,
  NATIVE_ASSET,
  chargeDailyWindow,
  computeTransferFee,
  dailyLimitFor,
  deriveAccount,
  sumBigInt,
  transferTierOf,
  type Address,
  type DailyUsage,
  type FeeBounds,
  type TransferTier,
} from "@tapa/economics";
import { authContext, requireCapability, type AuthContext } from "../auth.js";
import { invalid, notFound, rejected, unauthorized } from "../errors.js";
import { AppendOnlyLog } from "../host/append-only-log.js";
import { JournaledMap } from "../host/journaled-map.js";
import { ReentrancyGuard } from "../host/reentrancy.js";
import type { HostLedger } from "../host/host-ledger.js";
import {
  COLLECTION_CONTRIBUTION_EVENT,
  COLLECTION_CREATED_EVENT,
  COLLECTION_FINALIZED_EVENT,
  COLLECTION_PAYOUT_EVENT,
  ESCROW_CREATED_EVENT,
  ESCROW_SETTLED_EVENT,
  MEMBERSHIP_EVENT,
  SCHEDULE_CANCELLED_EVENT,
  SCHEDULE_CREATED_EVENT,
  SCHEDULE_EXECUTED_EVENT,
  SCHEDULE_TOPPED_UP_EVENT,
  TRANSFER_EVENT,
  TRANSFER_WITHDRAWN_EVENT,
} from "../event-log/schemas.js";
import type { TreasuryLedger } from "./treasury-ledger.js";
import { optionalAccount, requireAccount, requirePositive, requireSeconds } from "./validate.js";

// ── Types ──────────────────────────────────────────────────────────

export type TransferKind = "direct" | "batch" | "scheduled" | "escrow";

export interface TransferRecord {
  id: number;
  kind: TransferKind;
  sender: Address;
  recipient: Address;
  amount: bigint;
  fee: bigint;
  net: bigint;
  memo: string;
  timestamp: number;
}

export interface ScheduledTransfer {
  id: number;
  sender: Address;
  recipient: Address;
  /** Gross amount per interval, as requested. */
  amountPerTransfer: bigint;
  feePerTransfer: bigint;
  /** Net moved to the recipient on each execution. */
  netPerTransfer: bigint;
  intervalSeconds: number;
  nextExecutionTime: number;
  /** Executions left; 0 means indefinite. */
  remainingTransfers: number;
  executions: number;
  /** Net value held for future executions. */
  escrowed: bigint;
  active: boolean;
  createdAt: number;
}

export interface ScheduleInput {
  recipient: string;
  amount: bigint;
  intervalSeconds: number;
  repetitions: number;
  startTime?: number;
  /** Intervals escrowed up front by an indefinite schedule. Default 1. */
  prefundIntervals?: number;
}

export type EscrowStatus = "open" | "released" | "refunded";

export interface Escrow {
  id: number;
  sender: Address;
  recipient: Address;
  arbiter: Address | null;
  amount: bigint;
  fee: bigint;
  net: bigint;
  createdAt: number;
  expiresAt: number;
  status: EscrowStatus;
}

export interface EscrowInput {
  recipient: string;
  amount: bigint;
  expiresIn: number;
  arbiter?: string;
}

export interface CommunityCollection {
  id: number;
  creator: Address;
  purpose: string;
  goal: bigint;
  /** Balance still held for the collection. */
  collected: bigint;
  /** Lifetime contributions. */
  totalRaised: bigint;
  contributors: number;
  deadline: number;
  active: boolean;
  createdAt: number;
}

/** Staking-derived inputs to the fee schedule. */
export interface TransferStakingSource {
  feeDiscountOf(account: Address): bigint;
  isNodeOperator(account: Address): boolean;
}

export interface TransferEngineOptions {
  treasury: TreasuryLedger;
  staking?: TransferStakingSource;
  feeBounds?: FeeBounds;
}

export interface TransferQuote {
  tier: TransferTier;
  fee: bigint;
  net: bigint;
  discountBps: bigint;
  dailyLimit: bigint;
  dailyRemaining: bigint;
}

interface TransferTotals {
  nextScheduleId: number;
  nextEscrowId: number;
  nextCollectionId: number;
  feeBounds: FeeBounds;
  totalFees: bigint;
}

// ── Engine ─────────────────────────────────────────────────────────

export class TransferEngine {
  readonly account: Address = deriveAccount("transfers");

  private readonly pending: JournaledMap<Address, bigint>;
  private readonly daily: JournaledMap<Address, DailyUsage>;
  private readonly members: JournaledMap<Address, true>;
  private readonly nodeOperators: JournaledMap<Address, true>;
  private readonly schedules: JournaledMap<number, ScheduledTransfer>;
  private readonly escrows: JournaledMap<number, Escrow>;
  private readonly collections: JournaledMap<number, CommunityCollection>;
  /** `${collectionId}:${account}` → contributed amount */
  private readonly contributions: JournaledMap<string, bigint>;
  private totals: TransferTotals;
  private readonly transfers = new AppendOnlyLog<TransferRecord>();
  private readonly guard = new ReentrancyGuard("transfers");
  private readonly treasury: TreasuryLedger;
  private readonly staking: TransferStakingSource | undefined;
  private readonly collectorAuth: AuthContext;

  constructor(
    private readonly host: HostLedger,
    options: TransferEngineOptions,
  ) {
    this.treasury = options.treasury;
    this.staking = options.staking;
    this.collectorAuth = authContext(this.account, ["fee_collector"]);
    const feeBounds = options.feeBounds ?? {
      minFee: MIN_TRANSFER_FEE_WEI,
      maxFee: MAX_TRANSFER_FEE_WEI,
    };
    if (feeBounds.minFee > feeBounds.maxFee) {
      throw invalid("invalid_fee_bounds", "minFee must be <= maxFee");
    }
    this.pending = new JournaledMap(host);
    this.daily = new JournaledMap(host);
    this.members = new JournaledMap(host);
    this.nodeOperators = new JournaledMap(host);
    this.schedules = new JournaledMap(host);
    this.escrows = new JournaledMap(host);
    this.collections = new JournaledMap(host);
    this.contributions = new JournaledMap(host);
    this.totals = {
      nextScheduleId: 1,
      nextEscrowId: 1,
      nextCollectionId: 1,
      feeBounds,
      totalFees: 0n,
    };
    host.register(this);
    host.register(this.transfers);
  }

  snapshot(): TransferTotals {
    return { ...this.totals };
  }

  restore(totals: TransferTotals): void {
    this.totals = totals;
  }

  // ── Fee schedule ─────────────────────────────────────────────────

  tierOf(account: Address): TransferTier {
    return transferTierOf({
      nodeOperator:
        this.nodeOperators.has(account) || (this.staking?.isNodeOperator(account) ?? false),
      member: this.members.has(account),
    });
  }

  quoteTransfer(sender: Address, amount: bigint): TransferQuote {
    const tier = this.tierOf(sender);
    const discountBps = this.staking?.feeDiscountOf(sender) ?? 0n;
    const fee = computeTransferFee(amount, tier, this.totals.feeBounds, discountBps);
    const dailyLimit = dailyLimitFor(tier);
    const window = chargeDailyWindow(this.daily.get(sender), this.host.now(), 0n, dailyLimit);
    const spent = window?.spent ?? 0n;
    return {
      tier,
      fee,
      net: amount > fee ? amount - fee : 0n,
      discountBps,
      dailyLimit,
      dailyRemaining: dailyLimit > spent ? dailyLimit - spent : 0n,
    };
  }

  get feeBounds(): FeeBounds {
    return { ...this.totals.feeBounds };
  }

  setFeeBounds(auth: AuthContext, bounds: FeeBounds): void {
    this.host.atomic(() => {
      requireCapability(auth, "transfer_admin");
      if (bounds.minFee < 0n || bounds.minFee > bounds.maxFee) {
        throw invalid("invalid_fee_bounds", "require 0 <= minFee <= maxFee");
      }
      this.totals.feeBounds = { ...bounds };
    });
  }

  // ── Direct transfers ─────────────────────────────────────────────

  transfer(auth: AuthContext, recipient: string, amount: bigint, memo = ""): TransferRecord {
    return this.host.atomic(() => {
      const to = requireAccount(recipient, "recipient");
      requirePositive(amount);
      this.host.book.transfer(NATIVE_ASSET, auth.caller, this.account, amount);
      const fee = this.chargeSender(auth.caller, amount, amount);
      const record = this.credit("direct", auth.caller, to, amount, fee, memo);
      this.forwardFees(fee, `transfer ${record.id}`);
      return record;
    });
  }

  /** Per-recipient fees; every entry succeeds or none does. */
  batchTransfer(
    auth: AuthContext,
    recipients: readonly string[],
    amounts: readonly bigint[],
    memo = "",
  ): TransferRecord[] {
    return this.host.atomic(() => {
      if (recipients.length === 0 || recipients.length !== amounts.length) {
        throw invalid("invalid_batch", "recipients and amounts must be non-empty and equal length");
      }
      if (recipients.length > MAX_BATCH_SIZE) {
        throw invalid("batch_too_large", `at most ${MAX_BATCH_SIZE} entries per batch`);
      }
      const targets = recipients.map((r) => requireAccount(r, "recipient"));
      for (const a of amounts) requirePositive(a);

      this.host.book.transfer(NATIVE_ASSET, auth.caller, this.account, sumBigInt(amounts));
      const records: TransferRecord[] = [];
      let fees = 0n;
      targets.forEach((to, i) => {
        const amount = amounts[i] ?? 0n;
        const fee = this.chargeSender(auth.caller, amount, amount);
        fees += fee;
        records.push(this.credit("batch", auth.caller, to, amount, fee, memo));
      });
      this.forwardFees(fees, `batch of ${records.length}`);
      return records;
    });
  }

  pendingOf(account: Address): bigint {
    return this.pending.get(account) ?? 0n;
  }

  /** Pay out the caller's pending balance. */
  withdrawPending(auth: AuthContext): bigint {
    return this.guard.run(() =>
      this.host.atomic(() => {
        const amount = this.pendingOf(auth.caller);
        if (amount === 0n) throw rejected("nothing_to_withdraw", "no pending balance");
        this.pending.delete(auth.caller);
        this.host.events.append(TRANSFER_WITHDRAWN_EVENT, this.host.now(), auth.caller, { amount });
        this.host.book.transfer(NATIVE_ASSET, this.account, auth.caller, amount);
        return amount;
      }),
    );
  }

  getTransfers(offset = 0, limit = 50): TransferRecord[] {
    return this.transfers.slice(offset, limit);
  }

  get totalFees(): bigint {
    return this.totals.totalFees;
  }

  // ── Scheduled transfers ──────────────────────────────────────────

  /**
   * Escrow a recurring transfer. Fees for every escrowed interval are
   * taken now; each execution moves the precomputed net.
   */
  createScheduledTransfer(auth: AuthContext, input: ScheduleInput): ScheduledTransfer {
    return this.host.atomic(() => {
      const to = requireAccount(input.recipient, "recipient");
      const amount = requirePositive(input.amount);
      requireSeconds(
        input.intervalSeconds,
        "interval",
        MIN_SCHEDULE_INTERVAL_SECONDS,
        MAX_SCHEDULE_INTERVAL_SECONDS,
      );
      if (!Number.isSafeInteger(input.repetitions) || input.repetitions < 0) {
        throw invalid("invalid_repetitions", "repetitions must be >= 0");
      }
      const now = this.host.now();
      const start =
        input.startTime === undefined
          ? now + input.intervalSeconds
          : requireSeconds(input.startTime, "start_time", now, now + MAX_SCHEDULE_START_DELAY_SECONDS);
      const intervals = input.repetitions > 0 ? input.repetitions : (input.prefundIntervals ?? 1);
      if (!Number.isSafeInteger(intervals) || intervals < 1) {
        throw invalid("invalid_prefund", "prefund intervals must be >= 1");
      }

      const gross = amount * BigInt(intervals);
      this.host.book.transfer(NATIVE_ASSET, auth.caller, this.account, gross);
      const feePerTransfer = this.chargeSender(auth.caller, amount, gross);
      const schedule: ScheduledTransfer = {
        id: this.totals.nextScheduleId++,
        sender: auth.caller,
        recipient: to,
        amountPerTransfer: amount,
        feePerTransfer,
        netPerTransfer: amount - feePerTransfer,
        intervalSeconds: input.intervalSeconds,
        nextExecutionTime: start,
        remainingTransfers: input.repetitions,
        executions: 0,
        escrowed: (amount - feePerTransfer) * BigInt(intervals),
        active: true,
        createdAt: now,
      };
      this.schedules.set(schedule.id, schedule);
      this.host.events.append(SCHEDULE_CREATED_EVENT, now, auth.caller, { ...schedule });
      this.forwardFees(feePerTransfer * BigInt(intervals), `schedule ${schedule.id}`);
      return { ...schedule };
    });
  }

  /** Anyone may execute a due schedule. A failed attempt changes nothing. */
  executeScheduledTransfer(auth: AuthContext, scheduleId: number): ScheduledTransfer {
    return this.host.atomic(() => {
      const schedule = this.schedule(scheduleId);
      if (!schedule.active) throw rejected("schedule_inactive", `schedule ${scheduleId} is inactive`);
      const now = this.host.now();
      if (now < schedule.nextExecutionTime) {
        throw rejected("schedule_not_due", `schedule ${scheduleId} is due at ${schedule.nextExecutionTime}`);
      }
      if (schedule.escrowed < schedule.netPerTransfer) {
        throw rejected("schedule_underfunded", `schedule ${scheduleId} needs a top-up`);
      }

      schedule.escrowed -= schedule.netPerTransfer;
      schedule.nextExecutionTime += schedule.intervalSeconds;
      schedule.executions += 1;
      if (schedule.remainingTransfers > 0) {
        schedule.remainingTransfers -= 1;
        if (schedule.remainingTransfers === 0) schedule.active = false;
      }
      this.addPending(schedule.recipient, schedule.netPerTransfer);
      const record = this.transfers.append({
        id: this.transfers.length + 1,
        kind: "scheduled",
        sender: schedule.sender,
        recipient: schedule.recipient,
        amount: schedule.amountPerTransfer,
        fee: schedule.feePerTransfer,
        net: schedule.netPerTransfer,
        memo: `schedule ${scheduleId}`,
        timestamp: now,
      });
      this.host.events.append(SCHEDULE_EXECUTED_EVENT, now, auth.caller, {
        scheduleId,
        transferId: record.id,
        net: record.net,
        remainingTransfers: schedule.remainingTransfers,
      });
      return { ...schedule };
    });
  }

  /** Add escrow to an indefinite schedule. */
  topUpScheduledTransfer(auth: AuthContext, scheduleId: number, intervals: number): ScheduledTransfer {
    return this.host.atomic(() => {
      const schedule = this.ownSchedule(auth, scheduleId);
      if (schedule.remainingTransfers !== 0) {
        throw rejected("schedule_fully_funded", "only indefinite schedules take top-ups");
      }
      if (!Number.isSafeInteger(intervals) || intervals < 1) {
        throw invalid("invalid_intervals", "intervals must be >= 1");
      }
      const count = BigInt(intervals);
      const gross = schedule.amountPerTransfer * count;
      this.host.book.transfer(NATIVE_ASSET, auth.caller, this.account, gross);
      this.chargeSender(auth.caller, schedule.amountPerTransfer, gross);
      schedule.escrowed += schedule.netPerTransfer * count;
      this.host.events.append(SCHEDULE_TOPPED_UP_EVENT, this.host.now(), auth.caller, {
        scheduleId,
        intervals,
        escrowed: schedule.escrowed,
      });
      this.forwardFees(schedule.feePerTransfer * count, `schedule ${scheduleId} top-up`);
      return { ...schedule };
    });
  }

  /** Stop a schedule; unspent escrow returns to the sender's pending balance. */
  cancelScheduledTransfer(auth: AuthContext, scheduleId: number): ScheduledTransfer {
    return this.host.atomic(() => {
      const schedule = this.schedule(scheduleId);
      if (schedule.sender !== auth.caller && !auth.capabilities.has("transfer_admin")) {
        throw unauthorized("not_schedule_sender", `schedule ${scheduleId} belongs to ${schedule.sender}`);
      }
      if (!schedule.active) throw rejected("schedule_inactive", `schedule ${scheduleId} is inactive`);
      const refund = schedule.escrowed;
      schedule.escrowed = 0n;
      schedule.active = false;
      this.addPending(schedule.sender, refund);
      this.host.events.append(SCHEDULE_CANCELLED_EVENT, this.host.now(), auth.caller, {
        scheduleId,
        refund,
      });
      return { ...schedule };
    });
  }

  getScheduledTransfer(scheduleId: number): ScheduledTransfer {
    return { ...this.schedule(scheduleId) };
  }

  /** Active schedules due at or before `now`, soonest first. */
  dueScheduledTransfers(now = this.host.now()): ScheduledTransfer[] {
    return Array.from(this.schedules.view.values())
      .filter((s) => s.active && s.nextExecutionTime <= now)
      .sort((a, b) => a.nextExecutionTime - b.nextExecutionTime || a.id - b.id)
      .map((s) => ({ ...s }));
  }

  // ── Escrow ───────────────────────────────────────────────────────

  createEscrow(auth: AuthContext, input: EscrowInput): Escrow {
    return this.host.atomic(() => {
      const to = requireAccount(input.recipient, "recipient");
      const arbiter = optionalAccount(input.arbiter, "arbiter");
      const amount = requirePositive(input.amount);
      requireSeconds(input.expiresIn, "expires_in", 1, MAX_ESCROW_SECONDS);
      if (arbiter && (arbiter === auth.caller || arbiter === to)) {
        throw invalid("invalid_arbiter", "arbiter must differ from sender and recipient");
      }
      this.host.book.transfer(NATIVE_ASSET, auth.caller, this.account, amount);
      const fee = this.chargeSender(auth.caller, amount, amount);
      const now = this.host.now();
      const escrow: Escrow = {
        id: this.totals.nextEscrowId++,
        sender: auth.caller,
        recipient: to,
        arbiter,
        amount,
        fee,
        net: amount - fee,
        createdAt: now,
        expiresAt: now + input.expiresIn,
        status: "open",
      };
      this.escrows.set(escrow.id, escrow);
      this.host.events.append(ESCROW_CREATED_EVENT, now, auth.caller, { ...escrow });
      this.forwardFees(fee, `escrow ${escrow.id}`);
      return { ...escrow };
    });
  }

  /** Sender or arbiter releases the net amount to the recipient. */
  releaseEscrow(auth: AuthContext, escrowId: number): Escrow {
    return this.host.atomic(() => {
      const escrow = this.openEscrow(escrowId);
      if (auth.caller !== escrow.sender && auth.caller !== escrow.arbiter) {
        throw unauthorized("not_escrow_releaser", "only the sender or arbiter may release");
      }
      escrow.status = "released";
      this.addPending(escrow.recipient, escrow.net);
      this.transfers.append({
        id: this.transfers.length + 1,
        kind: "escrow",
        sender: escrow.sender,
        recipient: escrow.recipient,
        amount: escrow.amount,
        fee: escrow.fee,
        net: escrow.net,
        memo: `escrow ${escrowId}`,
        timestamp: this.host.now(),
      });
      this.host.events.append(ESCROW_SETTLED_EVENT, this.host.now(), auth.caller, {
        escrowId,
        status: escrow.status,
      });
      return { ...escrow };
    });
  }

  /**
   * Return the net amount to the sender. Recipient or arbiter may refund
   * at any time; the sender only once the escrow has expired.
   */
  refundEscrow(auth: AuthContext, escrowId: number): Escrow {
    return this.host.atomic(() => {
      const escrow = this.openEscrow(escrowId);
      const now = this.host.now();
      const byCounterparty = auth.caller === escrow.recipient || auth.caller === escrow.arbiter;
      if (!byCounterparty) {
        if (auth.caller !== escrow.sender) {
          throw unauthorized("not_escrow_party", `caller is not a party to escrow ${escrowId}`);
        }
        if (now < escrow.expiresAt) {
          throw rejected("escrow_not_expired", `escrow ${escrowId} expires at ${escrow.expiresAt}`);
        }
      }
      escrow.status = "refunded";
      this.addPending(escrow.sender, escrow.net);
      this.host.events.append(ESCROW_SETTLED_EVENT, now, auth.caller, {
        escrowId,
        status: escrow.status,
      });
      return { ...escrow };
    });
  }

  getEscrow(escrowId: number): Escrow {
    const escrow = this.escrows.get(escrowId);
    if (!escrow) throw notFound("escrow_not_found", `no escrow ${escrowId}`);
    return { ...escrow };
  }

  // ── Community collections ────────────────────────────────────────

  createCommunityCollection(
    auth: AuthContext,
    purpose: string,
    goal: bigint,
    durationSeconds: number,
  ): CommunityCollection {
    return this.host.atomic(() => {
      const trimmed = purpose.trim();
      if (!trimmed) throw invalid("invalid_purpose", "purpose must not be empty");
      requirePositive(goal, "goal");
      requireSeconds(durationSeconds, "duration", 1, MAX_COLLECTION_SECONDS);
      const now = this.host.now();
      const collection: CommunityCollection = {
        id: this.totals.nextCollectionId++,
        creator: auth.caller,
        purpose: trimmed,
        goal,
        collected: 0n,
        totalRaised: 0n,
        contributors: 0,
        deadline: now + durationSeconds,
        active: true,
        createdAt: now,
      };
      this.collections.set(collection.id, collection);
      this.host.events.append(COLLECTION_CREATED_EVENT, now, auth.caller, { ...collection });
      return { ...collection };
    });
  }

  /** Fee-free contribution while the collection is open. */
  contributeToCollection(auth: AuthContext, collectionId: number, amount: bigint): CommunityCollection {
    return this.host.atomic(() => {
      const collection = this.openCollection(collectionId);
      const now = this.host.now();
      if (now >= collection.deadline) {
        throw rejected("collection_expired", `collection ${collectionId} closed at ${collection.deadline}`);
      }
      requirePositive(amount);
      this.host.book.transfer(NATIVE_ASSET, auth.caller, this.account, amount);
      const key = `${collectionId}:${auth.caller}`;
      const before = this.contributions.get(key) ?? 0n;
      if (before === 0n) collection.contributors += 1;
      this.contributions.set(key, before + amount);
      collection.collected += amount;
      collection.totalRaised += amount;
      this.host.events.append(COLLECTION_CONTRIBUTION_EVENT, now, auth.caller, {
        collectionId,
        amount,
        collected: collection.collected,
      });
      return { ...collection };
    });
  }

  contributionOf(collectionId: number, account: Address): bigint {
    return this.contributions.get(`${collectionId}:${account}`) ?? 0n;
  }

  /** Creator closes the collection and receives everything it holds. */
  finalizeCommunityCollection(auth: AuthContext, collectionId: number): bigint {
    return this.guard.run(() =>
      this.host.atomic(() => {
        const collection = this.collection(collectionId);
        if (collection.creator !== auth.caller) {
          throw unauthorized("not_collection_creator", `collection ${collectionId} belongs to ${collection.creator}`);
        }
        if (!collection.active) {
          throw rejected("collection_inactive", `collection ${collectionId} is already closed`);
        }
        const payout = collection.collected;
        collection.active = false;
        collection.collected = 0n;
        this.host.events.append(COLLECTION_FINALIZED_EVENT, this.host.now(), auth.caller, {
          collectionId,
          payout,
        });
        this.host.book.transfer(NATIVE_ASSET, this.account, collection.creator, payout);
        return payout;
      }),
    );
  }

  /** Admin payout from a collection that stays open. */
  payoutFromCollection(
    auth: AuthContext,
    collectionId: number,
    recipient: string,
    amount: bigint,
  ): CommunityCollection {
    return this.guard.run(() =>
      this.host.atomic(() => {
        requireCapability(auth, "transfer_admin");
        const to = requireAccount(recipient, "recipient");
        const collection = this.openCollection(collectionId);
        requirePositive(amount);
        if (amount > collection.collected) {
          throw rejected(
            "insufficient_collection_balance",
            `collection ${collectionId} holds ${collection.collected}, requested ${amount}`,
          );
        }
        collection.collected -= amount;
        this.host.events.append(COLLECTION_PAYOUT_EVENT, this.host.now(), auth.caller, {
          collectionId,
          recipient: to,
          amount,
        });
        this.host.book.transfer(NATIVE_ASSET, this.account, to, amount);
        return { ...collection };
      }),
    );
  }

  getCollection(collectionId: number): CommunityCollection {
    return { ...this.collection(collectionId) };
  }

  // ── Membership registry ──────────────────────────────────────────

  setMember(auth: AuthContext, account: string, enabled: boolean): void {
    this.setRegistry(auth, "member", account, enabled);
  }

  setNodeOperator(auth: AuthContext, account: string, enabled: boolean): void {
    this.setRegistry(auth, "nodeOperator", account, enabled);
  }

  // ── Internals ────────────────────────────────────────────────────

  /**
   * Fee on `amount` for the sender's tier, charging `dailySpend` against
   * the sender's rolling daily limit.
   */
  private chargeSender(sender: Address, amount: bigint, dailySpend: bigint): bigint {
    const tier = this.tierOf(sender);
    const discount = this.staking?.feeDiscountOf(sender) ?? 0n;
    const fee = computeTransferFee(amount, tier, this.totals.feeBounds, discount);
    if (fee >= amount) {
      throw invalid("amount_below_fee", `amount ${amount} does not exceed fee ${fee}`);
    }
    const limit = dailyLimitFor(tier);
    const usage = chargeDailyWindow(this.daily.get(sender), this.host.now(), dailySpend, limit);
    if (!usage) {
      throw rejected("daily_limit_exceeded", `${tier} daily limit is ${limit}`);
    }
    this.daily.set(sender, usage);
    return fee;
  }

  private credit(
    kind: TransferKind,
    sender: Address,
    recipient: Address,
    amount: bigint,
    fee: bigint,
    memo: string,
  ): TransferRecord {
    const net = amount - fee;
    this.addPending(recipient, net);
    const record = this.transfers.append({
      id: this.transfers.length + 1,
      kind,
      sender,
      recipient,
      amount,
      fee,
      net,
      memo,
      timestamp: this.host.now(),
    });
    this.host.events.append(TRANSFER_EVENT, record.timestamp, sender, { ...record });
    return record;
  }

  private forwardFees(fee: bigint, description: string): void {
    if (fee === 0n) return;
    this.totals.totalFees += fee;
    this.treasury.depositFees(this.collectorAuth, fee, description);
  }

  private addPending(account: Address, amount: bigint): void {
    if (amount === 0n) return;
    this.pending.set(account, this.pendingOf(account) + amount);
  }

  private setRegistry(
    auth: AuthContext,
    registry: "member" | "nodeOperator",
    account: string,
    enabled: boolean,
  ): void {
    this.host.atomic(() => {
      requireCapability(auth, "membership_admin");
      const address = requireAccount(account, "account");
      const set = registry === "member" ? this.members : this.nodeOperators;
      if (enabled) set.set(address, true);
      else set.delete(address);
      this.host.events.append(MEMBERSHIP_EVENT, this.host.now(), auth.caller, {
        registry,
        account: address,
        enabled,
      });
    });
  }

  private schedule(scheduleId: number): ScheduledTransfer {
    const schedule = this.schedules.get(scheduleId);
    if (!schedule) throw notFound("schedule_not_found", `no scheduled transfer ${scheduleId}`);
    return schedule;
  }

  private ownSchedule(auth: AuthContext, scheduleId: number): ScheduledTransfer {
    const schedule = this.schedule(scheduleId);
    if (schedule.sender !== auth.caller) {
      throw unauthorized("not_schedule_sender", `schedule ${scheduleId} belongs to ${schedule.sender}`);
    }
    if (!schedule.active) throw rejected("schedule_inactive", `schedule ${scheduleId} is inactive`);
    return schedule;
  }

  private openEscrow(escrowId: number): Escrow {
    const escrow = this.escrows.get(escrowId);
    if (!escrow) throw notFound("escrow_not_found", `no escrow ${escrowId}`);
    if (escrow.status !== "open") throw rejected("escrow_settled", `escrow ${escrowId} is ${escrow.status}`);
    return escrow;
  }

  private collection(collectionId: number): CommunityCollection {
    const collection = this.collections.get(collectionId);
    if (!collection) throw notFound("collection_not_found", `no collection ${collectionId}`);
    return collection;
  }

  private openCollection(collectionId: number): CommunityCollection {
    const collection = this.collection(collectionId);
    if (!collection.active) {
      throw rejected("collection_inactive", `collection ${collectionId} is closed`);
    }
    return collection;
  }
}
