/**
 * Treasury ledger tests: apportionment, expenses, profit-sharing draws,
 * fund administration and the 10000 bps allocation invariant.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { fundIdFromName } from "@tapa/economics";
import { authContext } from "../src/auth.js";
import { ALICE, BOB, CAROL, errorCode, makeFixture, type Fixture } from "./fixtures.js";

const OPS = fundIdFromName("Operations");
const DEV = fundIdFromName("Development");
const UNALLOCATED = fundIdFromName("Unallocated");

let f: Fixture;

beforeEach(() => {
  f = makeFixture([
    { name: "Operations", allocationBps: 3000n },
    { name: "Development", allocationBps: 2000n },
  ]);
  f.mintNative(ALICE, 1_000_000n);
});

function balances(): Record<string, bigint> {
  const out: Record<string, bigint> = {};
  for (const fund of f.system.treasury.listFunds()) out[fund.name] = fund.balance;
  return out;
}

describe("funds", () => {
  it("gives Unallocated the remaining allocation", () => {
    const funds = f.system.treasury.listFunds();
    expect(funds.map((x) => [x.name, x.allocationBps])).toEqual([
      ["Unallocated", 5000n],
      ["Operations", 3000n],
      ["Development", 2000n],
    ]);
    expect(f.system.treasury.activeAllocationTotal()).toBe(10_000n);
  });

  it("rejects duplicate names by existence, not balance", () => {
    expect(errorCode(() => f.system.treasury.createFund(f.admin, "Operations", 0n))).toBe(
      "fund_exists",
    );
  });

  it("rejects a fund that would push allocations past 10000", () => {
    expect(errorCode(() => f.system.treasury.createFund(f.admin, "Marketing", 6000n))).toBe(
      "allocation_exceeds_total",
    );
    expect(errorCode(() => f.system.treasury.getFundDetails(fundIdFromName("Marketing")))).toBe(
      "fund_not_found",
    );
    expect(f.system.treasury.getFundDetails(UNALLOCATED).allocationBps).toBe(5000n);
  });

  it("re-normalizes Unallocated on create", () => {
    const fund = f.system.treasury.createFund(f.admin, "Marketing", 1000n);
    expect(fund.id).toBe(fundIdFromName("Marketing"));
    expect(f.system.treasury.getFundDetails(UNALLOCATED).allocationBps).toBe(4000n);
    expect(f.system.treasury.activeAllocationTotal()).toBe(10_000n);
  });

  it("requires the treasurer capability", () => {
    expect(errorCode(() => f.system.treasury.createFund(f.alice, "Marketing", 1000n))).toBe(
      "missing_capability",
    );
  });

  it("updates a fund and keeps the invariant", () => {
    f.system.treasury.updateFund(f.admin, OPS, { allocationBps: 4000n });
    const ops = f.system.treasury.getFundDetails(OPS);
    expect(ops.name).toBe("Operations");
    expect(ops.allocationBps).toBe(4000n);
    expect(f.system.treasury.getFundDetails(UNALLOCATED).allocationBps).toBe(4000n);
  });

  it("keeps every fund name bound to its id", () => {
    f.system.treasury.updateFund(f.admin, OPS, { allocationBps: 1000n });
    expect(errorCode(() => f.system.treasury.createFund(f.admin, "Operations", 0n))).toBe(
      "fund_exists",
    );
    const grants = f.system.treasury.createFund(f.admin, "Grants", 500n);
    expect(grants.id).toBe(fundIdFromName("Grants"));
    expect(errorCode(() => f.system.treasury.createFund(f.admin, "Grants", 0n))).toBe(
      "fund_exists",
    );
    expect(f.system.treasury.listFunds().map((x) => x.name)).toEqual([
      "Unallocated",
      "Operations",
      "Development",
      "Grants",
    ]);
  });

  it("leaves allocations untouched when a reweight overflows", () => {
    expect(
      errorCode(() => f.system.treasury.updateFund(f.admin, OPS, { allocationBps: 9000n })),
    ).toBe("allocation_exceeds_total");
    expect(f.system.treasury.getFundDetails(OPS).allocationBps).toBe(3000n);
    expect(f.system.treasury.getFundDetails(UNALLOCATED).allocationBps).toBe(5000n);
  });

  it("deactivation sweeps balance and allocation into Unallocated", () => {
    f.system.treasury.depositFunds(f.alice, 600n, "ops budget", OPS);
    const ops = f.system.treasury.deactivateFund(f.admin, OPS);
    expect(ops.active).toBe(false);
    expect(ops.balance).toBe(0n);
    const unallocated = f.system.treasury.getFundDetails(UNALLOCATED);
    expect(unallocated.balance).toBe(600n);
    expect(unallocated.allocationBps).toBe(8000n);
    expect(f.system.treasury.listFunds().map((x) => x.name)).toEqual(["Unallocated", "Development"]);
    expect(f.system.treasury.listFunds(true)).toHaveLength(3);
  });

  it("never deactivates Unallocated", () => {
    expect(errorCode(() => f.system.treasury.deactivateFund(f.admin, UNALLOCATED))).toBe(
      "unallocated_fund_immutable",
    );
  });
});

describe("updateAllFundAllocations", () => {
  it("reverts when the total is not 10000", () => {
    expect(
      errorCode(() =>
        f.system.treasury.updateAllFundAllocations(f.admin, [
          { fundId: OPS, allocationBps: 5000n },
          { fundId: DEV, allocationBps: 1000n },
        ]),
      ),
    ).toBe("allocation_sum_mismatch");
    expect(f.system.treasury.getFundDetails(OPS).allocationBps).toBe(3000n);
    expect(f.system.treasury.getFundDetails(DEV).allocationBps).toBe(2000n);
  });

  it("applies a set that totals 10000", () => {
    f.system.treasury.updateAllFundAllocations(f.admin, [
      { fundId: OPS, allocationBps: 4000n },
      { fundId: DEV, allocationBps: 1000n },
      { fundId: UNALLOCATED, allocationBps: 5000n },
    ]);
    expect(f.system.treasury.getFundDetails(OPS).allocationBps).toBe(4000n);
    expect(f.system.treasury.activeAllocationTotal()).toBe(10_000n);
  });

  it("rejects a fund listed twice", () => {
    expect(
      errorCode(() =>
        f.system.treasury.updateAllFundAllocations(f.admin, [
          { fundId: OPS, allocationBps: 3000n },
          { fundId: OPS, allocationBps: 3000n },
        ]),
      ),
    ).toBe("duplicate_fund");
  });
});

describe("deposits", () => {
  it("apportions by allocation with the remainder to Unallocated", () => {
    const deposit = f.system.treasury.depositFunds(f.alice, 10_001n, "seed");
    expect(deposit.source).toBe("funds");
    expect(deposit.fundId).toBeNull();
    expect(balances()).toEqual({ Unallocated: 5001n, Operations: 3000n, Development: 2000n });
    expect(f.native(f.system.treasury.account)).toBe(10_001n);
    expect(f.native(ALICE)).toBe(1_000_000n - 10_001n);
  });

  it("credits a targeted deposit to one fund", () => {
    f.system.treasury.depositFunds(f.alice, 500n, "dev grant", DEV);
    expect(balances()).toEqual({ Unallocated: 0n, Operations: 0n, Development: 500n });
  });

  it("requires fee_collector for fee deposits", () => {
    expect(errorCode(() => f.system.treasury.depositFees(f.alice, 100n, "fees"))).toBe(
      "missing_capability",
    );
    const collector = authContext(ALICE, ["fee_collector"]);
    const deposit = f.system.treasury.depositFees(collector, 100n, "fees");
    expect(deposit.source).toBe("fees");
    expect(f.system.treasury.getDeposits()).toHaveLength(1);
  });

  it("fails a deposit the sender cannot cover", () => {
    expect(errorCode(() => f.system.treasury.depositFunds(f.bob, 1n, "broke"))).toBe(
      "insufficient_balance",
    );
    expect(f.system.treasury.getDeposits()).toHaveLength(0);
  });
});

describe("withdraw", () => {
  beforeEach(() => {
    f.system.treasury.depositFunds(f.alice, 10_001n, "seed");
  });

  it("pays the recipient and records an expense", () => {
    const expense = f.system.treasury.withdraw(f.admin, OPS, BOB, 1000n, "servers");
    expect(expense).toMatchObject({ id: 1, fundId: OPS, recipient: BOB, amount: 1000n });
    expect(f.system.treasury.getFundDetails(OPS).balance).toBe(2000n);
    expect(f.native(BOB)).toBe(1000n);
  });

  it("withdraw then targeted deposit of the same amount restores the fund", () => {
    f.system.treasury.withdraw(f.admin, OPS, BOB, 1000n, "servers");
    f.system.treasury.depositFunds(f.bob, 1000n, "refund", OPS);
    expect(f.system.treasury.getFundDetails(OPS).balance).toBe(3000n);
  });

  it("rejects spending beyond the fund balance", () => {
    expect(errorCode(() => f.system.treasury.withdraw(f.admin, OPS, BOB, 3001n, "too much"))).toBe(
      "insufficient_fund_balance",
    );
  });

  it("requires the spender capability", () => {
    expect(errorCode(() => f.system.treasury.withdraw(f.alice, OPS, BOB, 1n, "x"))).toBe(
      "missing_capability",
    );
  });

  it("rolls back when the recipient rejects the payment", () => {
    f.system.host.book.onReceive(BOB, () => {
      throw new Error("rejecting");
    });
    expect(errorCode(() => f.system.treasury.withdraw(f.admin, OPS, BOB, 1000n, "x"))).toBe(
      "value_transfer_failed",
    );
    expect(f.system.treasury.getFundDetails(OPS).balance).toBe(3000n);
    expect(f.system.treasury.getExpenses()).toHaveLength(0);
  });
});

describe("withdrawFunds", () => {
  it("drains Unallocated first when it covers the amount", () => {
    f.system.treasury.depositFunds(f.alice, 10_001n, "seed");
    const expenses = f.system.treasury.withdrawFunds(f.admin, CAROL, 5000n);
    expect(expenses.map((e) => [e.fundId, e.amount])).toEqual([[UNALLOCATED, 5000n]]);
    expect(balances()).toEqual({ Unallocated: 1n, Operations: 3000n, Development: 2000n });
    expect(f.native(CAROL)).toBe(5000n);
  });

  it("draws proportionally, then covers the shortfall from Unallocated", () => {
    f.system.treasury.depositFunds(f.alice, 600n, "ops", OPS);
    f.system.treasury.depositFunds(f.alice, 300n, "dev", DEV);
    f.system.treasury.depositFunds(f.alice, 100n, "rest", UNALLOCATED);

    const expenses = f.system.treasury.withdrawFunds(f.admin, CAROL, 500n);
    expect(expenses.map((e) => [e.fundId, e.amount])).toEqual([
      [UNALLOCATED, 50n],
      [OPS, 300n],
      [DEV, 150n],
    ]);
    expect(balances()).toEqual({ Unallocated: 50n, Operations: 300n, Development: 150n });
  });

  it("fails when the treasury cannot cover the amount", () => {
    f.system.treasury.depositFunds(f.alice, 100n, "seed");
    expect(errorCode(() => f.system.treasury.withdrawFunds(f.admin, CAROL, 101n))).toBe(
      "insufficient_treasury_balance",
    );
  });

  it("requires the profit_sharing capability", () => {
    expect(errorCode(() => f.system.treasury.withdrawFunds(f.alice, CAROL, 1n))).toBe(
      "missing_capability",
    );
  });
});
