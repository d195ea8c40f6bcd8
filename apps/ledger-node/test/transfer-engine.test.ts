/**
 * Transfer engine tests: tiered fees, daily limits, pull payments,
 * batches, scheduled transfers, escrow, community collections.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { fundIdFromName } from "@tapa/economics";
import {
  ALICE,
  BOB,
  CAROL,
  DAVE,
  DAY,
  ETHER,
  START,
  errorCode,
  makeFixture,
  type Fixture,
} from "./fixtures.js";

const UNALLOCATED = fundIdFromName("Unallocated");
const HOUR = 3_600;

let f: Fixture;

beforeEach(() => {
  f = makeFixture();
  f.mintNative(ALICE, 100n * ETHER);
});

function treasuryBalance(): bigint {
  return f.system.treasury.getFundDetails(UNALLOCATED).balance;
}

describe("fee tiers", () => {
  it("charges guests 1% and credits the net as pending", () => {
    const record = f.system.transfers.transfer(f.alice, BOB, ETHER, "rent");
    expect(record).toMatchObject({
      id: 1,
      kind: "direct",
      sender: ALICE,
      recipient: BOB,
      amount: ETHER,
      fee: 10_000_000_000_000_000n,
      net: 990_000_000_000_000_000n,
      memo: "rent",
    });
    expect(f.system.transfers.pendingOf(BOB)).toBe(990_000_000_000_000_000n);
    expect(f.native(ALICE)).toBe(99n * ETHER);
    expect(treasuryBalance()).toBe(10_000_000_000_000_000n);
    expect(f.system.transfers.totalFees).toBe(10_000_000_000_000_000n);
  });

  it("charges members 0.5% and node operators 0.25%", () => {
    f.system.transfers.setMember(f.admin, ALICE, true);
    expect(f.system.transfers.transfer(f.alice, BOB, ETHER).fee).toBe(5_000_000_000_000_000n);
    f.system.transfers.setNodeOperator(f.admin, ALICE, true);
    expect(f.system.transfers.tierOf(ALICE)).toBe("nodeOperator");
    expect(f.system.transfers.transfer(f.alice, BOB, ETHER).fee).toBe(2_500_000_000_000_000n);
  });

  it("clamps the fee to the configured bounds", () => {
    expect(f.system.transfers.transfer(f.alice, BOB, 10_000_000_000_000n).fee).toBe(1_000_000_000_000n);
    f.system.transfers.setMember(f.admin, ALICE, true);
    expect(f.system.transfers.transfer(f.alice, BOB, 40n * ETHER).fee).toBe(100_000_000_000_000_000n);
  });

  it("rejects amounts below the fee", () => {
    expect(errorCode(() => f.system.transfers.transfer(f.alice, BOB, 100_000_000_000n))).toBe(
      "amount_below_fee",
    );
  });

  it("rejects an amount that only covers the fee", () => {
    expect(errorCode(() => f.system.transfers.transfer(f.alice, BOB, 1_000_000_000_000n))).toBe(
      "amount_below_fee",
    );
    expect(
      errorCode(() =>
        f.system.transfers.createScheduledTransfer(f.alice, {
          recipient: BOB,
          amount: 1_000_000_000_000n,
          intervalSeconds: HOUR,
          repetitions: 0,
        }),
      ),
    ).toBe("amount_below_fee");
    expect(f.system.transfers.pendingOf(BOB)).toBe(0n);
    expect(f.native(ALICE)).toBe(100n * ETHER);
  });

  it("applies the staking discount without clamping", () => {
    f.mintPsf(ALICE, 1_000n * ETHER);
    f.system.staking.createStake(f.alice, 1_000n * ETHER, 30 * DAY); // Silver, 500 bps
    expect(f.system.transfers.transfer(f.alice, BOB, ETHER).fee).toBe(9_500_000_000_000_000n);
    expect(f.system.transfers.transfer(f.alice, BOB, 10_000_000_000_000n).fee).toBe(95_000_000_000n);
  });

  it("treats a NodeOperator staker as a node operator", () => {
    f.mintPsf(ALICE, 100_000n * ETHER);
    f.system.staking.createStake(f.alice, 100_000n * ETHER, 365 * DAY);
    expect(f.system.transfers.tierOf(ALICE)).toBe("nodeOperator");
    // 0.25% less the 2500 bps tier discount
    expect(f.system.transfers.transfer(f.alice, BOB, ETHER).fee).toBe(1_875_000_000_000_000n);
  });

  it("requires membership_admin to change the registry", () => {
    expect(errorCode(() => f.system.transfers.setMember(f.alice, ALICE, true))).toBe(
      "missing_capability",
    );
  });
});

describe("daily limit", () => {
  it("caps guest spend per rolling day and resets lazily", () => {
    f.system.transfers.transfer(f.alice, BOB, 6n * ETHER);
    expect(errorCode(() => f.system.transfers.transfer(f.alice, BOB, 5n * ETHER))).toBe(
      "daily_limit_exceeded",
    );
    expect(f.system.transfers.quoteTransfer(ALICE, ETHER).dailyRemaining).toBe(4n * ETHER);
    f.clock.advance(DAY);
    expect(f.system.transfers.transfer(f.alice, BOB, 5n * ETHER).amount).toBe(5n * ETHER);
  });
});

describe("withdrawPending", () => {
  it("pays out and zeroes the pending balance", () => {
    f.system.transfers.transfer(f.alice, BOB, ETHER);
    expect(f.system.transfers.withdrawPending(f.bob)).toBe(990_000_000_000_000_000n);
    expect(f.native(BOB)).toBe(990_000_000_000_000_000n);
    expect(f.system.transfers.pendingOf(BOB)).toBe(0n);
    expect(errorCode(() => f.system.transfers.withdrawPending(f.bob))).toBe("nothing_to_withdraw");
  });

  it("rejects re-entry from the recipient and keeps the balance", () => {
    f.system.transfers.transfer(f.alice, BOB, ETHER);
    f.system.host.book.onReceive(BOB, () => {
      f.system.transfers.withdrawPending(f.bob);
    });
    expect(errorCode(() => f.system.transfers.withdrawPending(f.bob))).toBe("reentrant_call");
    expect(f.system.transfers.pendingOf(BOB)).toBe(990_000_000_000_000_000n);
    expect(f.native(BOB)).toBe(0n);
  });
});

describe("batchTransfer", () => {
  it("charges per recipient and forwards fees in one deposit", () => {
    const records = f.system.transfers.batchTransfer(f.alice, [BOB, CAROL], [ETHER, 2n * ETHER], "payroll");
    expect(records.map((r) => r.fee)).toEqual([10_000_000_000_000_000n, 20_000_000_000_000_000n]);
    expect(f.system.transfers.pendingOf(CAROL)).toBe(1_980_000_000_000_000_000n);
    const deposits = f.system.treasury.getDeposits();
    expect(deposits).toHaveLength(1);
    expect(deposits[0]?.amount).toBe(30_000_000_000_000_000n);
  });

  it("is all or nothing", () => {
    expect(
      errorCode(() => f.system.transfers.batchTransfer(f.alice, [BOB, CAROL], [ETHER, 100_000_000_000n])),
    ).toBe("amount_below_fee");
    expect(f.system.transfers.pendingOf(BOB)).toBe(0n);
    expect(f.native(ALICE)).toBe(100n * ETHER);
    // daily usage was rolled back too
    expect(f.system.transfers.transfer(f.alice, BOB, 10n * ETHER).amount).toBe(10n * ETHER);
  });

  it("limits batch size and length agreement", () => {
    const many = Array.from({ length: 101 }, () => BOB);
    const amounts = many.map(() => ETHER);
    expect(errorCode(() => f.system.transfers.batchTransfer(f.alice, many, amounts))).toBe(
      "batch_too_large",
    );
    expect(errorCode(() => f.system.transfers.batchTransfer(f.alice, [BOB], [ETHER, ETHER]))).toBe(
      "invalid_batch",
    );
  });
});

describe("scheduled transfers", () => {
  const NET = 990_000_000_000_000_000n;

  it("escrows every interval and charges fees up front", () => {
    const s = f.system.transfers.createScheduledTransfer(f.alice, {
      recipient: BOB,
      amount: ETHER,
      intervalSeconds: DAY,
      repetitions: 3,
    });
    expect(s).toMatchObject({
      id: 1,
      netPerTransfer: NET,
      feePerTransfer: 10_000_000_000_000_000n,
      escrowed: 3n * NET,
      nextExecutionTime: START + DAY,
      remainingTransfers: 3,
      active: true,
    });
    expect(f.native(ALICE)).toBe(97n * ETHER);
    expect(treasuryBalance()).toBe(30_000_000_000_000_000n);
  });

  it("rejects early execution without touching the schedule", () => {
    f.system.transfers.createScheduledTransfer(f.alice, {
      recipient: BOB,
      amount: ETHER,
      intervalSeconds: DAY,
      repetitions: 3,
    });
    expect(errorCode(() => f.system.transfers.executeScheduledTransfer(f.bob, 1))).toBe("schedule_not_due");
    const s = f.system.transfers.getScheduledTransfer(1);
    expect(s.remainingTransfers).toBe(3);
    expect(s.nextExecutionTime).toBe(START + DAY);
  });

  it("runs to completion and deactivates", () => {
    f.system.transfers.createScheduledTransfer(f.alice, {
      recipient: BOB,
      amount: ETHER,
      intervalSeconds: DAY,
      repetitions: 3,
    });
    f.clock.advance(DAY);
    const first = f.system.transfers.executeScheduledTransfer(f.carol, 1);
    expect(first.remainingTransfers).toBe(2);
    expect(first.nextExecutionTime).toBe(START + 2 * DAY);
    expect(f.system.transfers.pendingOf(BOB)).toBe(NET);

    f.clock.advance(2 * DAY);
    f.system.transfers.executeScheduledTransfer(f.carol, 1);
    const last = f.system.transfers.executeScheduledTransfer(f.carol, 1);
    expect(last).toMatchObject({ remainingTransfers: 0, active: false, escrowed: 0n, executions: 3 });
    expect(f.system.transfers.pendingOf(BOB)).toBe(3n * NET);
    expect(errorCode(() => f.system.transfers.executeScheduledTransfer(f.carol, 1))).toBe(
      "schedule_inactive",
    );
  });

  it("cancel returns unspent escrow to the sender", () => {
    f.system.transfers.createScheduledTransfer(f.alice, {
      recipient: BOB,
      amount: ETHER,
      intervalSeconds: DAY,
      repetitions: 3,
    });
    f.clock.advance(DAY);
    f.system.transfers.executeScheduledTransfer(f.bob, 1);
    expect(errorCode(() => f.system.transfers.cancelScheduledTransfer(f.bob, 1))).toBe(
      "not_schedule_sender",
    );
    const s = f.system.transfers.cancelScheduledTransfer(f.alice, 1);
    expect(s).toMatchObject({ active: false, escrowed: 0n });
    expect(f.system.transfers.pendingOf(ALICE)).toBe(2n * NET);
  });

  it("indefinite schedules run while prefunded and accept top-ups", () => {
    f.system.transfers.createScheduledTransfer(f.alice, {
      recipient: BOB,
      amount: ETHER,
      intervalSeconds: HOUR,
      repetitions: 0,
      prefundIntervals: 2,
    });
    f.clock.advance(HOUR);
    f.system.transfers.executeScheduledTransfer(f.bob, 1);
    f.clock.advance(HOUR);
    const drained = f.system.transfers.executeScheduledTransfer(f.bob, 1);
    expect(drained).toMatchObject({ active: true, escrowed: 0n, remainingTransfers: 0 });

    f.clock.advance(HOUR);
    expect(errorCode(() => f.system.transfers.executeScheduledTransfer(f.bob, 1))).toBe(
      "schedule_underfunded",
    );
    f.system.transfers.topUpScheduledTransfer(f.alice, 1, 1);
    expect(f.system.transfers.executeScheduledTransfer(f.bob, 1).executions).toBe(3);
    expect(f.system.transfers.pendingOf(BOB)).toBe(3n * NET);
  });

  it("only indefinite schedules take top-ups", () => {
    f.system.transfers.createScheduledTransfer(f.alice, {
      recipient: BOB,
      amount: ETHER,
      intervalSeconds: DAY,
      repetitions: 2,
    });
    expect(errorCode(() => f.system.transfers.topUpScheduledTransfer(f.alice, 1, 1))).toBe(
      "schedule_fully_funded",
    );
  });

  it("rejects intervals under an hour", () => {
    expect(
      errorCode(() =>
        f.system.transfers.createScheduledTransfer(f.alice, {
          recipient: BOB,
          amount: ETHER,
          intervalSeconds: 60,
          repetitions: 1,
        }),
      ),
    ).toBe("invalid_interval");
  });

  it("bounds the start time and interval", () => {
    const schedule = (startTime: number | undefined, intervalSeconds = HOUR) =>
      errorCode(() =>
        f.system.transfers.createScheduledTransfer(f.alice, {
          recipient: BOB,
          amount: ETHER,
          intervalSeconds,
          repetitions: 1,
          startTime,
        }),
      );
    expect(schedule(1e300)).toBe("invalid_start_time");
    expect(schedule(START - 1)).toBe("invalid_start_time");
    expect(schedule(START + 0.5)).toBe("invalid_start_time");
    expect(schedule(START + 366 * DAY)).toBe("invalid_start_time");
    expect(schedule(undefined, 366 * DAY)).toBe("invalid_interval");
    expect(schedule(START + 365 * DAY)).toBeUndefined();
  });

  it("lists due schedules", () => {
    f.system.transfers.createScheduledTransfer(f.alice, {
      recipient: BOB,
      amount: ETHER,
      intervalSeconds: HOUR,
      repetitions: 1,
      startTime: START,
    });
    expect(f.system.transfers.dueScheduledTransfers().map((s) => s.id)).toEqual([1]);
  });
});

describe("escrow", () => {
  const NET = 990_000_000_000_000_000n;

  beforeEach(() => {
    f.system.transfers.createEscrow(f.alice, {
      recipient: BOB,
      amount: ETHER,
      expiresIn: DAY,
      arbiter: CAROL,
    });
  });

  it("holds the net amount until released by sender or arbiter", () => {
    expect(f.system.transfers.getEscrow(1)).toMatchObject({ net: NET, status: "open", expiresAt: START + DAY });
    expect(errorCode(() => f.system.transfers.releaseEscrow(f.bob, 1))).toBe("not_escrow_releaser");
    expect(f.system.transfers.releaseEscrow(f.carol, 1).status).toBe("released");
    expect(f.system.transfers.pendingOf(BOB)).toBe(NET);
    expect(errorCode(() => f.system.transfers.releaseEscrow(f.alice, 1))).toBe("escrow_settled");
  });

  it("lets the sender refund only after expiry", () => {
    expect(errorCode(() => f.system.transfers.refundEscrow(f.alice, 1))).toBe("escrow_not_expired");
    f.clock.advance(DAY);
    expect(f.system.transfers.refundEscrow(f.alice, 1).status).toBe("refunded");
    expect(f.system.transfers.pendingOf(ALICE)).toBe(NET);
  });

  it("lets the recipient refund at any time", () => {
    expect(f.system.transfers.refundEscrow(f.bob, 1).status).toBe("refunded");
    expect(f.system.transfers.pendingOf(ALICE)).toBe(NET);
  });

  it("rejects an arbiter who is a party", () => {
    expect(
      errorCode(() =>
        f.system.transfers.createEscrow(f.alice, { recipient: BOB, amount: ETHER, expiresIn: DAY, arbiter: BOB }),
      ),
    ).toBe("invalid_arbiter");
  });
});

describe("community collections", () => {
  beforeEach(() => {
    f.mintNative(CAROL, 10n * ETHER);
    f.system.transfers.createCommunityCollection(f.bob, "Festival", 5n * ETHER, 7 * DAY);
  });

  it("collects fee-free contributions", () => {
    f.system.transfers.contributeToCollection(f.alice, 1, 2n * ETHER);
    const c = f.system.transfers.contributeToCollection(f.carol, 1, ETHER);
    expect(c).toMatchObject({ collected: 3n * ETHER, totalRaised: 3n * ETHER, contributors: 2 });
    expect(f.system.transfers.contributionOf(1, ALICE)).toBe(2n * ETHER);
  });

  it("admin payout leaves the collection open", () => {
    f.system.transfers.contributeToCollection(f.alice, 1, 3n * ETHER);
    const c = f.system.transfers.payoutFromCollection(f.admin, 1, DAVE, ETHER);
    expect(c).toMatchObject({ collected: 2n * ETHER, active: true });
    expect(f.native(DAVE)).toBe(ETHER);
    expect(
      errorCode(() => f.system.transfers.payoutFromCollection(f.admin, 1, DAVE, 3n * ETHER)),
    ).toBe("insufficient_collection_balance");
    expect(errorCode(() => f.system.transfers.payoutFromCollection(f.alice, 1, DAVE, 1n))).toBe(
      "missing_capability",
    );
  });

  it("finalize pays the creator once", () => {
    f.system.transfers.contributeToCollection(f.alice, 1, 3n * ETHER);
    expect(errorCode(() => f.system.transfers.finalizeCommunityCollection(f.alice, 1))).toBe(
      "not_collection_creator",
    );
    expect(f.system.transfers.finalizeCommunityCollection(f.bob, 1)).toBe(3n * ETHER);
    expect(f.native(BOB)).toBe(3n * ETHER);
    expect(f.system.transfers.getCollection(1)).toMatchObject({
      active: false,
      collected: 0n,
      totalRaised: 3n * ETHER,
    });
    expect(errorCode(() => f.system.transfers.finalizeCommunityCollection(f.bob, 1))).toBe(
      "collection_inactive",
    );
    expect(f.native(BOB)).toBe(3n * ETHER);
    expect(errorCode(() => f.system.transfers.contributeToCollection(f.alice, 1, ETHER))).toBe(
      "collection_inactive",
    );
  });

  it("closes contributions at the deadline", () => {
    f.clock.advance(7 * DAY);
    expect(errorCode(() => f.system.transfers.contributeToCollection(f.alice, 1, ETHER))).toBe(
      "collection_expired",
    );
  });
});
