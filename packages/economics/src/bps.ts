/**
 * Integer arithmetic over uint256 amounts and basis points.
 *
 * All ledger math is bigint with floor division. Amounts are the smallest
 * unit of an asset (wei-equivalent); rates are basis points (10000 = 100%).
 */

import { BPS_DENOMINATOR, MAX_UINT256 } from "./constants.js";

/** amount × bps / 10000, floored. */
export function applyBps(amount: bigint, bps: bigint): bigint {
  return (amount * bps) / BPS_DENOMINATOR;
}

/** amount reduced by a discount: amount × (10000 − bps) / 10000. */
export function discountBy(amount: bigint, discountBps: bigint): bigint {
  const bps = discountBps > BPS_DENOMINATOR ? BPS_DENOMINATOR : discountBps;
  return (amount * (BPS_DENOMINATOR - bps)) / BPS_DENOMINATOR;
}

/** a × b / denominator, floored. Throws on a zero denominator. */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) throw new RangeError("mulDiv: division by zero");
  return (a * b) / denominator;
}

export function isUint256(value: bigint): boolean {
  return value >= 0n && value <= MAX_UINT256;
}

export function isBps(value: bigint): boolean {
  return value >= 0n && value <= BPS_DENOMINATOR;
}

/**
 * Parse a decimal string into a uint256 bigint.
 * @returns null for anything that is not a plain decimal in [0, 2^256 − 1]
 */
export function parseUint256(text: string): bigint | null {
  if (!/^[0-9]{1,78}$/.test(text)) return null;
  const value = BigInt(text);
  return isUint256(value) ? value : null;
}

export function minBigInt(...values: bigint[]): bigint {
  let min = values[0] ?? 0n;
  for (const v of values) if (v < min) min = v;
  return min;
}

export function maxBigInt(...values: bigint[]): bigint {
  let max = values[0] ?? 0n;
  for (const v of values) if (v > max) max = v;
  return max;
}

export function sumBigInt(values: Iterable<bigint>): bigint {
  let total = 0n;
  for (const v of values) total += v;
  return total;
}
