/**
 * HTTP helpers: native fetch against the ledger node.
 *
 * Responses are checked against a TypeBox schema before the command sees
 * them. Non-2xx responses become ApiError carrying the node's error code.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { CliConfig } from "./config.js";

/** Timeout for each request (ms). */
const FETCH_TIMEOUT_MS = 30_000;

const ErrorBody = Type.Object({
  error: Type.String(),
  detail: Type.Optional(Type.String()),
});

export class ApiError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    detail: string,
  ) {
    super(`${status} ${code}${detail && detail !== code ? `: ${detail}` : ""}`);
    this.name = "ApiError";
  }
}

type Method = "GET" | "POST" | "PUT";

export async function requestJson<T extends TSchema>(
  config: CliConfig,
  method: Method,
  path: string,
  schema: T,
  body?: unknown,
): Promise<Static<T>> {
  const headers: Record<string, string> = {};
  if (body !== undefined) headers["content-type"] = "application/json";
  if (config.token) headers["authorization"] = `Bearer ${config.token}`;

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), FETCH_TIMEOUT_MS);
  let res: Response;
  try {
    res = await fetch(`${config.node}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: controller.signal,
    });
  } finally {
    clearTimeout(timeout);
  }

  const text = await res.text();
  let payload: unknown = null;
  if (text) {
    try {
      payload = JSON.parse(text);
    } catch {
      payload = null;
    }
  }

  if (!res.ok) {
    if (Value.Check(ErrorBody, payload)) {
      throw new ApiError(res.status, payload.error, payload.detail ?? "");
    }
    throw new ApiError(res.status, "http_error", text);
  }
  if (!Value.Check(schema, payload)) {
    const first = Value.Errors(schema, payload).First();
    throw new Error(`unexpected response from ${method} ${path} at ${first?.path ?? "/"}`);
  }
  return payload;
}

export function httpGet<T extends TSchema>(config: CliConfig, path: string, schema: T): Promise<Static<T>> {
  return requestJson(config, "GET", path, schema);
}

export function httpPost<T extends TSchema>(
  config: CliConfig,
  path: string,
  schema: T,
  body: unknown = {},
): Promise<Static<T>> {
  return requestJson(config, "POST", path, schema, body);
}
