/**
 * Volume discount lookup.
 *
 * A payer qualifies for the tier with the highest threshold that their
 * cumulative lifetime spend has met or exceeded. Every threshold is
 * examined; table order does not matter.
 */

/** threshold (smallest unit) → discount bps */
export type VolumeDiscountTable = ReadonlyMap<bigint, bigint>;

export function volumeDiscountFor(
  cumulativeSpend: bigint,
  table: VolumeDiscountTable,
): bigint {
  let bestThreshold = -1n;
  let discount = 0n;
  for (const [threshold, bps] of table) {
    if (cumulativeSpend >= threshold && threshold > bestThreshold) {
      bestThreshold = threshold;
      discount = bps;
    }
  }
  return discount;
}
