/**
 * Transfer fee schedule + daily window tests.
 */

import { describe, it, expect } from "vitest";
import {
  transferTierOf,
  computeTransferFee,
  chargeDailyWindow,
  dailyLimitFor,
  MIN_TRANSFER_FEE_WEI,
  MAX_TRANSFER_FEE_WEI,
  ONE_ETHER,
  DAILY_WINDOW_SECONDS,
} from "../../src/index.js";

const bounds = { minFee: MIN_TRANSFER_FEE_WEI, maxFee: MAX_TRANSFER_FEE_WEI };

describe("transferTierOf", () => {
  it("node operator status wins over membership", () => {
    expect(transferTierOf({ nodeOperator: true, member: true })).toBe("nodeOperator");
  });

  it("member and guest", () => {
    expect(transferTierOf({ nodeOperator: false, member: true })).toBe("member");
    expect(transferTierOf({ nodeOperator: false, member: false })).toBe("guest");
  });
});

describe("computeTransferFee", () => {
  it("guest 1%, member 0.5%, node operator 0.25% of 1 ether", () => {
    expect(computeTransferFee(ONE_ETHER, "guest", bounds)).toBe(10n ** 16n);
    expect(computeTransferFee(ONE_ETHER, "member", bounds)).toBe(5n * 10n ** 15n);
    expect(computeTransferFee(ONE_ETHER, "nodeOperator", bounds)).toBe(25n * 10n ** 14n);
  });

  it("clamps small fees up to minFee", () => {
    expect(computeTransferFee(1_000n, "guest", bounds)).toBe(MIN_TRANSFER_FEE_WEI);
  });

  it("clamps large fees down to maxFee", () => {
    expect(computeTransferFee(100n * ONE_ETHER, "guest", bounds)).toBe(MAX_TRANSFER_FEE_WEI);
  });

  it("a staking discount bypasses the clamp", () => {
    // tier fee 1 ether, 20% off → 0.8 ether, above maxFee but not clamped
    expect(computeTransferFee(100n * ONE_ETHER, "guest", bounds, 2_000n)).toBe(
      8n * 10n ** 17n,
    );
    expect(computeTransferFee(1_000n, "guest", bounds, 2_000n)).toBe(8n);
  });
});

describe("chargeDailyWindow", () => {
  it("opens a window on first spend", () => {
    expect(chargeDailyWindow(undefined, 1_000, 5n, 10n)).toEqual({
      windowStart: 1_000,
      spent: 5n,
    });
  });

  it("accumulates within the window and rejects over the limit", () => {
    const first = chargeDailyWindow(undefined, 1_000, 5n, 10n);
    const second = chargeDailyWindow(first ?? undefined, 2_000, 5n, 10n);
    expect(second).toEqual({ windowStart: 1_000, spent: 10n });
    expect(chargeDailyWindow(second ?? undefined, 3_000, 1n, 10n)).toBeNull();
  });

  it("resets lazily once 24h have passed", () => {
    const full = { windowStart: 1_000, spent: 10n };
    expect(chargeDailyWindow(full, 1_000 + DAILY_WINDOW_SECONDS, 1n, 10n)).toEqual({
      windowStart: 1_000 + DAILY_WINDOW_SECONDS,
      spent: 1n,
    });
  });

  it("limits grow with tier", () => {
    expect(dailyLimitFor("guest")).toBeLessThan(dailyLimitFor("member"));
    expect(dailyLimitFor("member")).toBeLessThan(dailyLimitFor("nodeOperator"));
  });
});
