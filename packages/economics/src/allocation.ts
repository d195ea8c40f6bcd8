/**
 * Treasury fund apportionment.
 *
 * Deposits are split across active funds by allocation bps. The default
 * Unallocated fund takes its own share plus every unit lost to flooring, so
 * the shares always sum to the deposited amount.
 *
 * Profit-sharing withdrawals drain Unallocated first; when it cannot cover
 * the amount they draw from every active fund in proportion to its share of
 * the total treasury balance.
 */

import { BPS_DENOMINATOR } from "./constants.js";
import { applyBps, mulDiv, sumBigInt } from "./bps.js";

export interface FundWeight {
  id: string;
  allocationBps: bigint;
}

export interface FundBalance {
  id: string;
  balance: bigint;
}

/**
 * Split `amount` across funds. `funds` lists active funds other than
 * Unallocated; the remainder is credited to `unallocatedId`.
 */
export function apportionDeposit(
  amount: bigint,
  funds: readonly FundWeight[],
  unallocatedId: string,
): Map<string, bigint> {
  const shares = new Map<string, bigint>();
  let assigned = 0n;
  for (const fund of funds) {
    if (fund.id === unallocatedId) continue;
    const share = applyBps(amount, fund.allocationBps);
    shares.set(fund.id, (shares.get(fund.id) ?? 0n) + share);
    assigned += share;
  }
  shares.set(unallocatedId, (shares.get(unallocatedId) ?? 0n) + amount - assigned);
  return shares;
}

/**
 * Allocation Unallocated must carry so active allocations total 10000.
 * @returns null when the other funds already exceed 10000 bps
 */
export function unallocatedRemainder(
  otherAllocations: Iterable<bigint>,
): bigint | null {
  const total = sumBigInt(otherAllocations);
  return total > BPS_DENOMINATOR ? null : BPS_DENOMINATOR - total;
}

/**
 * Plan how a profit-sharing withdrawal is drawn from funds.
 * `funds` lists every active fund including Unallocated.
 * @returns fund id → amount to debit, or null when the treasury cannot cover it
 */
export function planProportionalDraw(
  amount: bigint,
  funds: readonly FundBalance[],
  unallocatedId: string,
): Map<string, bigint> | null {
  const draws = new Map<string, bigint>();
  const unallocated = funds.find((f) => f.id === unallocatedId);
  const unallocatedBalance = unallocated?.balance ?? 0n;

  if (unallocatedBalance >= amount) {
    draws.set(unallocatedId, amount);
    return draws;
  }

  const total = sumBigInt(funds.map((f) => f.balance));
  if (total < amount || total === 0n) return null;

  const remaining = new Map<string, bigint>();
  let drawn = 0n;
  for (const fund of funds) {
    if (fund.id === unallocatedId) continue;
    const take = mulDiv(amount, fund.balance, total);
    if (take > 0n) draws.set(fund.id, take);
    remaining.set(fund.id, fund.balance - take);
    drawn += take;
  }

  // Shortfall: Unallocated first, then whatever the other funds have left.
  let shortfall = amount - drawn;
  const fromUnallocated = shortfall < unallocatedBalance ? shortfall : unallocatedBalance;
  if (fromUnallocated > 0n) draws.set(unallocatedId, fromUnallocated);
  shortfall -= fromUnallocated;

  for (const [id, left] of remaining) {
    if (shortfall === 0n) break;
    const take = shortfall < left ? shortfall : left;
    if (take === 0n) continue;
    draws.set(id, (draws.get(id) ?? 0n) + take);
    shortfall -= take;
  }

  return shortfall === 0n ? draws : null;
}
