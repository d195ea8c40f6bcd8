/**
 * Treasury apportionment tests.
 */

import { describe, it, expect } from "vitest";
import {
  apportionDeposit,
  unallocatedRemainder,
  planProportionalDraw,
  sumBigInt,
} from "../../src/index.js";

const U = "unallocated";

describe("apportionDeposit", () => {
  it("splits by allocation and gives rounding slack to Unallocated", () => {
    const shares = apportionDeposit(
      10_001n,
      [
        { id: "ops", allocationBps: 3_000n },
        { id: "dev", allocationBps: 2_000n },
      ],
      U,
    );
    expect(shares.get("ops")).toBe(3_000n);
    expect(shares.get("dev")).toBe(2_000n);
    expect(shares.get(U)).toBe(5_001n);
  });

  it("shares always sum to the deposit", () => {
    const funds = [
      { id: "a", allocationBps: 3_333n },
      { id: "b", allocationBps: 3_333n },
      { id: "c", allocationBps: 3_333n },
    ];
    for (const amount of [1n, 7n, 9_999n, 10n ** 18n + 3n]) {
      const shares = apportionDeposit(amount, funds, U);
      expect(sumBigInt(shares.values())).toBe(amount);
    }
  });

  it("ignores an Unallocated entry in the weight list", () => {
    const shares = apportionDeposit(100n, [{ id: U, allocationBps: 10_000n }], U);
    expect(shares.get(U)).toBe(100n);
    expect(shares.size).toBe(1);
  });
});

describe("unallocatedRemainder", () => {
  it("fills up to 10000 bps", () => {
    expect(unallocatedRemainder([3_000n, 2_000n])).toBe(5_000n);
    expect(unallocatedRemainder([])).toBe(10_000n);
    expect(unallocatedRemainder([10_000n])).toBe(0n);
  });

  it("returns null when other funds exceed 10000 bps", () => {
    expect(unallocatedRemainder([6_000n, 5_000n])).toBeNull();
  });
});

describe("planProportionalDraw", () => {
  it("drains Unallocated alone when it covers the amount", () => {
    const plan = planProportionalDraw(
      400n,
      [
        { id: "ops", balance: 1_000n },
        { id: U, balance: 500n },
      ],
      U,
    );
    expect(plan).toEqual(new Map([[U, 400n]]));
  });

  it("draws proportionally to total balance, shortfall from Unallocated", () => {
    // total 1000: ops 500×600/1000 = 300, dev 500×300/1000 = 150, U 50
    const plan = planProportionalDraw(
      500n,
      [
        { id: "ops", balance: 600n },
        { id: "dev", balance: 300n },
        { id: U, balance: 100n },
      ],
      U,
    );
    expect(plan?.get("ops")).toBe(300n);
    expect(plan?.get("dev")).toBe(150n);
    expect(plan?.get(U)).toBe(50n);
  });

  it("covers rounding shortfall from other funds when Unallocated is empty", () => {
    const plan = planProportionalDraw(
      1n,
      [
        { id: "a", balance: 1n },
        { id: "b", balance: 1n },
        { id: U, balance: 0n },
      ],
      U,
    );
    expect(plan).toEqual(new Map([["a", 1n]]));
  });

  it("returns null when the treasury cannot cover the amount", () => {
    const plan = planProportionalDraw(
      1_001n,
      [
        { id: "ops", balance: 900n },
        { id: U, balance: 100n },
      ],
      U,
    );
    expect(plan).toBeNull();
  });

  it("never draws more than a fund holds", () => {
    const funds = [
      { id: "a", balance: 333n },
      { id: "b", balance: 667n },
      { id: U, balance: 10n },
    ];
    const plan = planProportionalDraw(1_000n, funds, U);
    expect(plan).not.toBeNull();
    for (const f of funds) {
      expect(plan?.get(f.id) ?? 0n).toBeLessThanOrEqual(f.balance);
    }
    expect(sumBigInt(plan?.values() ?? [])).toBe(1_000n);
  });
});
