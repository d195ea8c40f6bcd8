/**
 * CLI configuration: loads from ~/.tapa/config.json + env overrides.
 *
 * Priority: env vars > config file > defaults.
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export interface CliConfig {
  /** Ledger node base URL. */
  node: string;
  /** Bearer token sent on mutating requests. */
  token?: string;
  /** Default account for balance and weight lookups. */
  account?: string;
}

const CONFIG_DIR = join(homedir(), ".tapa");
const CONFIG_FILE = join(CONFIG_DIR, "config.json");

const DEFAULT_NODE = "http://localhost:3200";

const ConfigFile = Type.Object({
  node: Type.Optional(Type.String()),
  token: Type.Optional(Type.String()),
  account: Type.Optional(Type.String()),
});
type ConfigFile = Static<typeof ConfigFile>;

export function getConfigPath(): string {
  return CONFIG_FILE;
}

/** Parse a config file body; unknown shapes are ignored. */
export function parseConfigFile(raw: string): ConfigFile {
  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch {
    return {};
  }
  return Value.Check(ConfigFile, doc) ? doc : {};
}

/** Env overrides on top of the file config. */
export function resolveConfig(
  file: ConfigFile,
  env: Record<string, string | undefined> = process.env,
): CliConfig {
  return {
    node: (env["TAPA_NODE"] ?? file.node ?? DEFAULT_NODE).replace(/\/+$/, ""),
    token: env["TAPA_TOKEN"] ?? file.token,
    account: env["TAPA_ACCOUNT"] ?? file.account,
  };
}

export async function loadConfig(): Promise<CliConfig> {
  const raw = await readFile(CONFIG_FILE, "utf-8").catch(() => "{}");
  return resolveConfig(parseConfigFile(raw));
}

export async function saveConfig(config: CliConfig): Promise<void> {
  await mkdir(CONFIG_DIR, { recursive: true });
  const toSave: ConfigFile = {
    node: config.node,
    ...(config.token ? { token: config.token } : {}),
    ...(config.account ? { account: config.account } : {}),
  };
  await writeFile(CONFIG_FILE, JSON.stringify(toSave, null, 2) + "\n", "utf-8");
}
