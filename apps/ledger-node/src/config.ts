/**
 * Ledger node configuration.
 */

function env(key: string, fallback?: string): string {
  const val = process.env[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

export const config = {
  port: parseInt(env("LEDGER_PORT", "3200"), 10),
  host: env("LEDGER_HOST", "0.0.0.0"),
  logLevel: env("LOG_LEVEL", "info"),
  /** JSON file of bearer tokens: [{ token, address, capabilities[] }]. Empty = no authenticated callers. */
  accountsFile: env("ACCOUNTS_FILE", ""),
  /** Recipient of the community-fund share of every marketplace fee. */
  communityFundAddress: env("COMMUNITY_FUND_ADDRESS", "0x00000000000000000000000000000000c0ffee01"),
  /** Enables POST /faucet. Never set in production. */
  devMode: env("DEV_MODE", "false") === "true",
  /** Scheduled-transfer keeper interval (ms). 0 = disabled. Default: 60000. */
  keeperIntervalMs: parseInt(env("KEEPER_INTERVAL_MS", "60000"), 10),
  /** Transfer fee clamp, in wei. */
  minTransferFeeWei: BigInt(env("MIN_TRANSFER_FEE_WEI", "1000000000000")),
  maxTransferFeeWei: BigInt(env("MAX_TRANSFER_FEE_WEI", "100000000000000000")),
  /** Funds created at startup besides Unallocated: "Name:bps,Name:bps". */
  treasuryFunds: env("TREASURY_FUNDS", "")
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0),
} as const;
