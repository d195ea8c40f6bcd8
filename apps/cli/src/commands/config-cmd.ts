/**
 * tapa config [--node url] [--token token] [--account address]
 */

import { loadConfig, saveConfig, getConfigPath } from "../lib/config.js";

interface ConfigOptions {
  node?: string;
  token?: string;
  account?: string;
}

export async function configCommand(opts: ConfigOptions): Promise<void> {
  const config = await loadConfig();
  let changed = false;

  if (opts.node) {
    config.node = opts.node.replace(/\/+$/, "");
    changed = true;
  }
  if (opts.token) {
    config.token = opts.token;
    changed = true;
  }
  if (opts.account) {
    config.account = opts.account.toLowerCase();
    changed = true;
  }

  if (changed) {
    await saveConfig(config);
    console.log(`Config saved to ${getConfigPath()}`);
  }

  console.log(`\nCurrent config:`);
  console.log(`  node:    ${config.node}`);
  console.log(`  token:   ${config.token ? "****" + config.token.slice(-4) : "(none)"}`);
  console.log(`  account: ${config.account ?? "(none)"}`);
}
