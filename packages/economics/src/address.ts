/**
 * Account addresses and derived identifiers.
 *
 * Addresses are 20-byte hex strings ("0x" + 40 hex), stored lowercase.
 * Fund ids and engine account addresses are derived with keccak256 so the
 * same name always yields the same identity.
 */

import { keccak_256 } from "@noble/hashes/sha3";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";
import { ZERO_ADDRESS } from "./constants.js";

export type Address = string;

/** 32-byte keccak256 id, "0x"-prefixed hex. */
export type Hash32 = string;

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;

export function isAddress(value: string): boolean {
  return ADDRESS_RE.test(value);
}

/** Lowercase a well-formed address; null when malformed. */
export function normalizeAddress(value: string): Address | null {
  return isAddress(value) ? value.toLowerCase() : null;
}

export function isZeroAddress(value: string): boolean {
  return value.toLowerCase() === ZERO_ADDRESS;
}

export function keccakHex(text: string): Hash32 {
  return `0x${bytesToHex(keccak_256(utf8ToBytes(text)))}`;
}

/** Fund identity = keccak256(utf8(name)). */
export function fundIdFromName(name: string): Hash32 {
  return keccakHex(name);
}

/** Account address owned by a ledger component, e.g. deriveAccount("treasury"). */
export function deriveAccount(label: string): Address {
  const hash = bytesToHex(keccak_256(utf8ToBytes(`tapa:account:${label}`)));
  return `0x${hash.slice(-40)}`;
}
