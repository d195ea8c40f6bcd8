/**
 * Address + derived id tests.
 */

import { describe, it, expect } from "vitest";
import {
  normalizeAddress,
  isAddress,
  isZeroAddress,
  fundIdFromName,
  deriveAccount,
  keccakHex,
  parseUint256,
  ZERO_ADDRESS,
  MAX_UINT256,
} from "../../src/index.js";

describe("addresses", () => {
  it("normalizes to lowercase", () => {
    expect(normalizeAddress("0xABCDEF0000000000000000000000000000000001")).toBe(
      "0xabcdef0000000000000000000000000000000001",
    );
  });

  it("rejects malformed input", () => {
    expect(normalizeAddress("0x1234")).toBeNull();
    expect(isAddress("abcdef0000000000000000000000000000000001")).toBe(false);
  });

  it("detects the zero address", () => {
    expect(isZeroAddress(ZERO_ADDRESS)).toBe(true);
    expect(isZeroAddress("0x0000000000000000000000000000000000000001")).toBe(false);
  });
});

describe("derived ids", () => {
  it("keccak256 of the empty string", () => {
    expect(keccakHex("")).toBe(
      "0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470",
    );
  });

  it("fund id is deterministic per name", () => {
    expect(fundIdFromName("Operations")).toBe(fundIdFromName("Operations"));
    expect(fundIdFromName("Operations")).not.toBe(fundIdFromName("operations"));
    expect(fundIdFromName("Operations")).toMatch(/^0x[0-9a-f]{64}$/);
  });

  it("engine accounts are valid addresses", () => {
    const treasury = deriveAccount("treasury");
    expect(isAddress(treasury)).toBe(true);
    expect(treasury).not.toBe(deriveAccount("staking"));
  });
});

describe("parseUint256", () => {
  it("parses decimal strings", () => {
    expect(parseUint256("0")).toBe(0n);
    expect(parseUint256("1000000000000000000")).toBe(10n ** 18n);
    expect(parseUint256(MAX_UINT256.toString())).toBe(MAX_UINT256);
  });

  it("rejects overflow and non-decimal text", () => {
    expect(parseUint256((MAX_UINT256 + 1n).toString())).toBeNull();
    expect(parseUint256("-1")).toBeNull();
    expect(parseUint256("1e18")).toBeNull();
    expect(parseUint256("")).toBeNull();
  });
});
