/**
 * Ledger node: HTTP front for the fee, treasury, transfer and staking
 * ledgers.
 *
 * All ledgers live in memory in this process. Every mutating route runs
 * one synchronous ledger operation, so requests are applied one at a time
 * in arrival order. Callers authenticate with a bearer token that maps to
 * an account address and its capabilities (ACCOUNTS_FILE).
 *
 * Routes: see routes/*.ts.
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import Fastify, { type FastifyServerOptions } from "fastify";
import { deriveAccount } from "@tapa/economics";
import { config } from "./config.js";
import { AccountDirectory, authContext, loadAccountGrants, type AccountGrant } from "./auth.js";
import { isLedgerError } from "./errors.js";
import { createLedgerSystem, parseFundSpecs, type LedgerSystem } from "./system.js";
import { createTransferKeeper } from "./keeper.js";
import type { RouteContext } from "./routes/context.js";
import { healthRoutes } from "./routes/health.js";
import { feeRoutes } from "./routes/fees.js";
import { treasuryRoutes } from "./routes/treasury.js";
import { transferRoutes } from "./routes/transfers.js";
import { stakingRoutes } from "./routes/staking.js";

export interface LedgerNodeDeps {
  system?: LedgerSystem;
  accounts?: readonly AccountGrant[];
  devMode?: boolean;
  logger?: FastifyServerOptions["logger"];
}

function hasStatusCode(err: unknown): err is { statusCode: number; message: string } {
  return (
    typeof err === "object" &&
    err !== null &&
    "statusCode" in err &&
    typeof err.statusCode === "number" &&
    "message" in err &&
    typeof err.message === "string"
  );
}

export function buildApp(deps?: LedgerNodeDeps) {
  const system =
    deps?.system ??
    createLedgerSystem({
      communityFundAddress: config.communityFundAddress,
      initialFunds: parseFundSpecs(config.treasuryFunds),
      feeBounds: { minFee: config.minTransferFeeWei, maxFee: config.maxTransferFeeWei },
    });
  const accounts = new AccountDirectory(deps?.accounts ?? loadAccountGrants(config.accountsFile));
  const app = Fastify({ logger: deps?.logger ?? { level: config.logLevel } });

  app.setErrorHandler((err: Error, request, reply) => {
    if (isLedgerError(err)) {
      return reply.status(err.status).send(err.toJSON());
    }
    if (hasStatusCode(err) && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: "invalid_request", detail: err.message });
    }
    request.log.error({ err }, "unhandled error");
    return reply.status(500).send({ error: "internal_error" });
  });

  const ctx: RouteContext = {
    system,
    accounts,
    devMode: deps?.devMode ?? config.devMode,
  };

  healthRoutes(app, ctx);
  feeRoutes(app, ctx);
  treasuryRoutes(app, ctx);
  transferRoutes(app, ctx);
  stakingRoutes(app, ctx);

  return { app, system };
}

// Run if executed directly (not when imported in tests)
if (
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  console.log("─── ledger node config ───");
  console.log(`  port:              ${config.port}`);
  console.log(`  accounts_file:     ${config.accountsFile || "(none)"}`);
  console.log(`  community_fund:    ${config.communityFundAddress}`);
  console.log(`  treasury_funds:    ${config.treasuryFunds.join(", ") || "(Unallocated only)"}`);
  console.log(`  transfer_fee:      ${config.minTransferFeeWei}-${config.maxTransferFeeWei} wei`);
  console.log(`  keeper:            ${config.keeperIntervalMs > 0 ? `${config.keeperIntervalMs}ms` : "disabled"}`);
  console.log(`  dev_mode:          ${config.devMode}`);
  console.log("───────────────────────────");

  const { app, system } = buildApp();

  // Start keeper BEFORE listen (Fastify 5 forbids addHook after listen)
  if (config.keeperIntervalMs > 0) {
    const keeper = createTransferKeeper(system, authContext(deriveAccount("keeper")), {
      checkIntervalMs: config.keeperIntervalMs,
      onExecute: (schedule) => {
        app.log.info(
          { schedule: schedule.id, remaining: schedule.remainingTransfers },
          "scheduled transfer executed",
        );
      },
      onError: (err, scheduleId) => {
        app.log.warn({ err, scheduleId }, "scheduled transfer failed");
      },
    });

    app.addHook("onClose", async () => {
      keeper.stop();
    });

    keeper.start();
    app.log.info({ intervalMs: config.keeperIntervalMs }, "transfer keeper started");
  }

  app.listen({ port: config.port, host: config.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
