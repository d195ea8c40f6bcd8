/**
 * Shared test fixtures: a ledger system on a manual clock with a handful
 * of funded accounts.
 */

import { NATIVE_ASSET, STAKING_ASSET, type Address } from "@tapa/economics";
import { CAPABILITIES, authContext, type AuthContext } from "../src/auth.js";
import { isLedgerError } from "../src/errors.js";
import { ManualClock } from "../src/host/clock.js";
import { createLedgerSystem, type LedgerSystem } from "../src/system.js";
import type { InitialFund } from "../src/views/treasury-ledger.js";

export const ETHER = 10n ** 18n;
export const DAY = 86_400;
export const START = 1_700_000_000;

export const ADMIN = "0x" + "ad".repeat(20);
export const ALICE = "0x" + "a1".repeat(20);
export const BOB = "0x" + "b0".repeat(20);
export const CAROL = "0x" + "c0".repeat(20);
export const DAVE = "0x" + "d0".repeat(20);
export const COMMUNITY = "0x" + "cf".repeat(20);

export interface Fixture {
  clock: ManualClock;
  system: LedgerSystem;
  admin: AuthContext;
  alice: AuthContext;
  bob: AuthContext;
  carol: AuthContext;
  mintNative(account: Address, amount: bigint): void;
  mintPsf(account: Address, amount: bigint): void;
  native(account: Address): bigint;
  psf(account: Address): bigint;
}

export function makeFixture(initialFunds?: readonly InitialFund[]): Fixture {
  const clock = new ManualClock(START);
  const system = createLedgerSystem({ clock, communityFundAddress: COMMUNITY, initialFunds });
  const book = system.host.book;
  return {
    clock,
    system,
    admin: authContext(ADMIN, CAPABILITIES),
    alice: authContext(ALICE),
    bob: authContext(BOB),
    carol: authContext(CAROL),
    mintNative: (account, amount) => book.mint(NATIVE_ASSET, account, amount),
    mintPsf: (account, amount) => book.mint(STAKING_ASSET, account, amount),
    native: (account) => book.balanceOf(NATIVE_ASSET, account),
    psf: (account) => book.balanceOf(STAKING_ASSET, account),
  };
}

/** Code of the LedgerError thrown by `fn`, or undefined if it returns. */
export function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (isLedgerError(err)) return err.code;
    throw err;
  }
  return undefined;
}
