/**
 * Health, balance, event and faucet routes.
 *
 * GET  /health             liveness + event count
 * GET  /balances/:address  host balances and pending transfers
 * GET  /events             event log (?from_seq, ?type, ?limit)
 * POST /faucet             mint test value (dev mode only)
 */

import type { FastifyInstance } from "fastify";
import { Type, type Static } from "@sinclair/typebox";
import { AddressString, NATIVE_ASSET, STAKING_ASSET, Uint256String } from "@tapa/economics";
import { toWire } from "../json.js";
import { requireAccount } from "../views/validate.js";
import { amount, type RouteContext } from "./context.js";

const EventsQuery = Type.Object({
  from_seq: Type.Optional(Type.Integer({ minimum: 1 })),
  type: Type.Optional(Type.String({ maxLength: 64 })),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 1000 })),
});
type EventsQuery = Static<typeof EventsQuery>;

const FaucetRequest = Type.Object(
  {
    account: AddressString,
    asset: Type.Union([Type.Literal(NATIVE_ASSET), Type.Literal(STAKING_ASSET)]),
    amount: Uint256String,
  },
  { additionalProperties: false },
);
type FaucetRequest = Static<typeof FaucetRequest>;

export function healthRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { host, transfers } = ctx.system;

  app.get("/health", async (_request, reply) => {
    return reply.send({
      status: "ok",
      timestamp: host.now(),
      events: host.events.count(),
    });
  });

  app.get<{ Params: { address: string } }>("/balances/:address", async (request, reply) => {
    const account = requireAccount(request.params.address, "address");
    return reply.send(
      toWire({
        account,
        native: host.book.balanceOf(NATIVE_ASSET, account),
        psf: host.book.balanceOf(STAKING_ASSET, account),
        pending: transfers.pendingOf(account),
      }),
    );
  });

  app.get<{ Querystring: EventsQuery }>(
    "/events",
    { schema: { querystring: EventsQuery } },
    async (request, reply) => {
      const q = request.query;
      return reply.send({
        events: host.events.query({ fromSeq: q.from_seq, type: q.type, limit: q.limit }),
      });
    },
  );

  if (ctx.devMode) {
    app.post<{ Body: FaucetRequest }>(
      "/faucet",
      { schema: { body: FaucetRequest } },
      async (request, reply) => {
        const body = request.body;
        const account = requireAccount(body.account, "account");
        const value = amount(body.amount);
        host.atomic(() => host.book.mint(body.asset, account, value));
        return reply.send(
          toWire({ account, asset: body.asset, balance: host.book.balanceOf(body.asset, account) }),
        );
      },
    );
  }
}
