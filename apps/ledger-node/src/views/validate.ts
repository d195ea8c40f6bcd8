/**
 * Input guards shared by the engines.
 */

import { isZeroAddress, isUint256, normalizeAddress, type Address } from "@tapa/economics";
import { invalid } from "../errors.js";

/** Normalized non-zero account, or throws invalid_<field>. */
export function requireAccount(value: string, field: string): Address {
  const address = normalizeAddress(value);
  if (!address || isZeroAddress(address)) {
    throw invalid(`invalid_${field}`, `${field} must be a non-zero address`);
  }
  return address;
}

export function optionalAccount(value: string | undefined, field: string): Address | null {
  return value === undefined ? null : requireAccount(value, field);
}

export function requirePositive(amount: bigint, field = "amount"): bigint {
  if (amount <= 0n || !isUint256(amount)) {
    throw invalid(`invalid_${field}`, `${field} must be > 0`);
  }
  return amount;
}

export function requireSeconds(value: number, field: string, min: number, max: number): number {
  if (!Number.isSafeInteger(value) || value < min || value > max) {
    throw invalid(`invalid_${field}`, `${field} must be within ${min}-${max} seconds`);
  }
  return value;
}
