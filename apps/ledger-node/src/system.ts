/**
 * Ledger system: wires the host ledger and the four engines together.
 *
 * Staking feeds the fee engine's discount and the transfer engine's
 * node-operator tier; fee and transfer engines deposit into the treasury
 * under their own fee_collector identity.
 */

import type { Address, FeeBounds } from "@tapa/economics";
import { HostLedger } from "./host/host-ledger.js";
import { systemClock, type Clock } from "./host/clock.js";
import { FeeEngine } from "./views/fee-engine.js";
import { TreasuryLedger, type InitialFund } from "./views/treasury-ledger.js";
import { TransferEngine } from "./views/transfer-engine.js";
import { StakingRewardEngine } from "./views/staking-engine.js";

export interface LedgerSystemOptions {
  clock?: Clock;
  communityFundAddress: Address;
  initialFunds?: readonly InitialFund[];
  feeBounds?: FeeBounds;
}

export interface LedgerSystem {
  host: HostLedger;
  treasury: TreasuryLedger;
  fees: FeeEngine;
  transfers: TransferEngine;
  staking: StakingRewardEngine;
}

export function createLedgerSystem(options: LedgerSystemOptions): LedgerSystem {
  const host = new HostLedger(options.clock ?? systemClock);
  const treasury = new TreasuryLedger(host, { initialFunds: options.initialFunds });
  const staking = new StakingRewardEngine(host);
  const fees = new FeeEngine(host, {
    treasury,
    communityFundAddress: options.communityFundAddress,
    discountSource: staking,
  });
  const transfers = new TransferEngine(host, {
    treasury,
    staking,
    feeBounds: options.feeBounds,
  });
  return { host, treasury, fees, transfers, staking };
}

/** Parse "Name:bps" fund specs. */
export function parseFundSpecs(specs: readonly string[]): InitialFund[] {
  return specs.map((spec) => {
    const idx = spec.lastIndexOf(":");
    const name = spec.slice(0, idx).trim();
    const bps = spec.slice(idx + 1).trim();
    if (idx <= 0 || !name || !/^[0-9]+$/.test(bps)) {
      throw new Error(`invalid fund spec "${spec}", expected Name:bps`);
    }
    return { name, allocationBps: BigInt(bps) };
  });
}
