/**
 * Amount parsing and formatting.
 *
 * Amounts on the command line are ether-denominated decimals ("1.5") or
 * raw wei with a suffix ("1500wei"). The node always speaks wei strings.
 */

import { MAX_UINT256 } from "@tapa/economics";

const DECIMALS = 18;
const WEI_PER_ETHER = 10n ** BigInt(DECIMALS);

export function parseAmount(text: string): bigint {
  const input = text.trim();
  const wei = /^([0-9]+)\s*wei$/i.exec(input);
  let value: bigint;
  if (wei?.[1] !== undefined) {
    value = BigInt(wei[1]);
  } else {
    const match = /^([0-9]*)(?:\.([0-9]*))?$/.exec(input);
    const whole = match?.[1] ?? "";
    const frac = match?.[2] ?? "";
    if (!match || (whole === "" && frac === "")) {
      throw new Error(`Invalid amount: ${text}`);
    }
    if (frac.length > DECIMALS) {
      throw new Error(`Invalid amount: at most ${DECIMALS} decimal places. Got: ${text}`);
    }
    value = BigInt(whole || "0") * WEI_PER_ETHER + BigInt(frac.padEnd(DECIMALS, "0") || "0");
  }
  if (value > MAX_UINT256) throw new Error(`Invalid amount: exceeds uint256. Got: ${text}`);
  return value;
}

/** Wei (bigint or decimal string) as an ether decimal with trailing zeros trimmed. */
export function formatEther(wei: bigint | string): string {
  const value = typeof wei === "bigint" ? wei : BigInt(wei);
  const whole = value / WEI_PER_ETHER;
  const frac = (value % WEI_PER_ETHER).toString().padStart(DECIMALS, "0").replace(/0+$/, "");
  return frac ? `${whole}.${frac}` : whole.toString();
}

/** "1d", "12h", "30m", "90" (seconds) → seconds. */
export function parseDuration(text: string): number {
  const match = /^([0-9]+)([smhd]?)$/.exec(text.trim());
  if (!match?.[1]) throw new Error(`Invalid duration: ${text}`);
  const n = Number(match[1]);
  switch (match[2]) {
    case "d":
      return n * 86_400;
    case "h":
      return n * 3_600;
    case "m":
      return n * 60;
    default:
      return n;
  }
}

export function parseId(text: string, what: string): number {
  if (!/^[1-9][0-9]{0,14}$/.test(text)) {
    throw new Error(`Invalid ${what}: must be a positive integer. Got: ${text}`);
  }
  return Number(text);
}
