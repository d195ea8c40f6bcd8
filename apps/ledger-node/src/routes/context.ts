/**
 * Shared route plumbing: caller resolution and path/body parsing.
 */

import type { FastifyRequest } from "fastify";
import { Type, type Static } from "@sinclair/typebox";
import { parseUint256, type Hash32 } from "@tapa/economics";
import type { AccountDirectory, AuthContext } from "../auth.js";
import { invalid, unauthenticated } from "../errors.js";
import type { LedgerSystem } from "../system.js";

export interface RouteContext {
  system: LedgerSystem;
  accounts: AccountDirectory;
  devMode: boolean;
}

/** Caller behind the request's bearer token. */
export function authenticate(ctx: RouteContext, request: FastifyRequest): AuthContext {
  const auth = ctx.accounts.resolve(request.headers.authorization);
  if (!auth) throw unauthenticated("unauthenticated", "missing or unknown bearer token");
  return auth;
}

export function amount(text: string, field = "amount"): bigint {
  const value = parseUint256(text);
  if (value === null) throw invalid(`invalid_${field}`, `${field} must be a uint256 decimal string`);
  return value;
}

export function recordId(text: string, field = "id"): number {
  if (!/^[1-9][0-9]{0,14}$/.test(text)) {
    throw invalid(`invalid_${field}`, `${field} must be a positive integer`);
  }
  return Number(text);
}

export function fundId(text: string): Hash32 {
  if (!/^0x[0-9a-f]{64}$/.test(text)) throw invalid("invalid_fund_id", "fund id must be 0x + 64 hex");
  return text;
}

export interface IdParams {
  id: string;
}

export const PageQuery = Type.Object({
  offset: Type.Optional(Type.Integer({ minimum: 0 })),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 500 })),
});
export type PageQuery = Static<typeof PageQuery>;
