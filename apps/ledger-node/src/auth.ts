/**
 * Caller identity and capabilities.
 *
 * Every mutating ledger operation receives an AuthContext: the calling
 * account plus the capability flags it has been granted. Engines check the
 * capability they need and nothing else.
 */

import { readFileSync } from "node:fs";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { normalizeAddress, isZeroAddress, type Address } from "@tapa/economics";
import { invalid, unauthorized } from "./errors.js";

export const CAPABILITIES = [
  "fee_admin",
  "marketplace",
  "treasurer",
  "spender",
  "fee_collector",
  "profit_sharing",
  "transfer_admin",
  "membership_admin",
  "staking_admin",
] as const;

export type Capability = (typeof CAPABILITIES)[number];

export interface AuthContext {
  caller: Address;
  capabilities: ReadonlySet<Capability>;
}

export function authContext(
  caller: string,
  capabilities: Iterable<Capability> = [],
): AuthContext {
  const address = normalizeAddress(caller);
  if (!address || isZeroAddress(address)) {
    throw invalid("invalid_caller", `caller must be a non-zero address: ${caller}`);
  }
  return { caller: address, capabilities: new Set(capabilities) };
}

/** Throws unless the caller holds at least one of `needed`. */
export function requireCapability(auth: AuthContext, ...needed: Capability[]): void {
  if (needed.some((c) => auth.capabilities.has(c))) return;
  throw unauthorized("missing_capability", `requires ${needed.join(" or ")}`);
}

// ── Bearer-token accounts ──────────────────────────────────────────

export interface AccountGrant {
  token: string;
  address: Address;
  capabilities: Capability[];
}

const AccountsFile = Type.Array(
  Type.Object({
    token: Type.String({ minLength: 1 }),
    address: Type.String({ pattern: "^0x[0-9a-fA-F]{40}$" }),
    capabilities: Type.Array(Type.Union(CAPABILITIES.map((c) => Type.Literal(c)))),
  }),
);

/**
 * Parse an accounts document: `[{ token, address, capabilities: [] }]`.
 * Unknown capabilities and malformed addresses are rejected.
 */
export function parseAccountGrants(doc: unknown): AccountGrant[] {
  if (!Value.Check(AccountsFile, doc)) {
    const first = Value.Errors(AccountsFile, doc).First();
    throw new Error(`invalid accounts file at ${first?.path ?? "/"}: ${first?.message ?? "bad shape"}`);
  }
  return doc.map((entry) => ({
    token: entry.token,
    address: entry.address.toLowerCase(),
    capabilities: entry.capabilities,
  }));
}

export function loadAccountGrants(path: string): AccountGrant[] {
  if (!path) return [];
  const doc: unknown = JSON.parse(readFileSync(path, "utf8"));
  return parseAccountGrants(doc);
}

export class AccountDirectory {
  private readonly byToken = new Map<string, AccountGrant>();

  constructor(grants: readonly AccountGrant[]) {
    for (const g of grants) this.byToken.set(g.token, g);
  }

  /** Resolve an `Authorization: Bearer <token>` header. */
  resolve(header: string | undefined): AuthContext | null {
    if (!header) return null;
    const match = /^Bearer\s+(\S+)$/i.exec(header);
    if (!match || match[1] === undefined) return null;
    const grant = this.byToken.get(match[1]);
    if (!grant) return null;
    return authContext(grant.address, grant.capabilities);
  }
}
