/**
 * Transfer engine routes: transfers, schedules, escrows, collections,
 * membership registry.
 *
 * POST /transfers                         transfer (net to recipient's pending balance)
 * POST /transfers/batch                   atomic batch transfer
 * POST /transfers/quote                   fee, tier and daily headroom for a sender
 * POST /transfers/withdraw                withdraw the caller's pending balance
 * GET  /transfers/pending/:address        pending balance
 * GET  /transfers                         transfer log
 * PUT  /transfers/fee-bounds              fee clamp (transfer_admin)
 * POST /transfers/scheduled               create schedule
 * GET  /transfers/scheduled/due           schedules due now
 * GET  /transfers/scheduled/:id           schedule
 * POST /transfers/scheduled/:id/execute   execute a due schedule (any caller)
 * POST /transfers/scheduled/:id/cancel    cancel (sender)
 * POST /transfers/scheduled/:id/top-up    add intervals to an indefinite schedule
 * POST /escrows, /escrows/:id/release, /escrows/:id/refund; GET /escrows/:id
 * POST /collections, /collections/:id/contribute, /:id/finalize, /:id/payout; GET /collections/:id
 * POST /members, /node-operators          registry (membership_admin)
 */

import type { FastifyInstance } from "fastify";
import { Type, type Static } from "@sinclair/typebox";
import {
  AddressString,
  BatchTransferRequest,
  CollectionPayoutRequest,
  CollectionRequest,
  ContributeRequest,
  EscrowRequest,
  MembershipRequest,
  ScheduleRequest,
  TopUpRequest,
  TransferRequest,
  Uint256String,
} from "@tapa/economics";
import { toWire } from "../json.js";
import { requireAccount } from "../views/validate.js";
import {
  PageQuery,
  amount,
  authenticate,
  recordId,
  type IdParams,
  type RouteContext,
} from "./context.js";

const QuoteRequest = Type.Object(
  { sender: AddressString, amount: Uint256String },
  { additionalProperties: false },
);
type QuoteRequest = Static<typeof QuoteRequest>;

const FeeBoundsRequest = Type.Object(
  { min_fee: Uint256String, max_fee: Uint256String },
  { additionalProperties: false },
);
type FeeBoundsRequest = Static<typeof FeeBoundsRequest>;

export function transferRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { transfers } = ctx.system;

  // ── Transfers ────────────────────────────────────────────────────

  app.post<{ Body: TransferRequest }>(
    "/transfers",
    { schema: { body: TransferRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const body = request.body;
      const record = transfers.transfer(auth, body.recipient, amount(body.amount), body.memo);
      return reply.status(201).send(toWire(record));
    },
  );

  app.post<{ Body: BatchTransferRequest }>(
    "/transfers/batch",
    { schema: { body: BatchTransferRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const body = request.body;
      const records = transfers.batchTransfer(
        auth,
        body.recipients,
        body.amounts.map((a) => amount(a)),
        body.memo,
      );
      return reply.status(201).send(toWire({ transfers: records }));
    },
  );

  app.post<{ Body: QuoteRequest }>(
    "/transfers/quote",
    { schema: { body: QuoteRequest } },
    async (request, reply) => {
      const sender = requireAccount(request.body.sender, "sender");
      return reply.send(toWire(transfers.quoteTransfer(sender, amount(request.body.amount))));
    },
  );

  app.post("/transfers/withdraw", async (request, reply) => {
    const auth = authenticate(ctx, request);
    const withdrawn = transfers.withdrawPending(auth);
    return reply.send(toWire({ account: auth.caller, withdrawn }));
  });

  app.get<{ Params: { address: string } }>(
    "/transfers/pending/:address",
    async (request, reply) => {
      const account = requireAccount(request.params.address, "address");
      return reply.send(toWire({ account, pending: transfers.pendingOf(account) }));
    },
  );

  app.get<{ Querystring: PageQuery }>(
    "/transfers",
    { schema: { querystring: PageQuery } },
    async (request, reply) => {
      const { offset, limit } = request.query;
      return reply.send(toWire({ transfers: transfers.getTransfers(offset, limit) }));
    },
  );

  app.put<{ Body: FeeBoundsRequest }>(
    "/transfers/fee-bounds",
    { schema: { body: FeeBoundsRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      transfers.setFeeBounds(auth, {
        minFee: amount(request.body.min_fee, "min_fee"),
        maxFee: amount(request.body.max_fee, "max_fee"),
      });
      return reply.send(toWire(transfers.feeBounds));
    },
  );

  // ── Scheduled transfers ──────────────────────────────────────────

  app.post<{ Body: ScheduleRequest }>(
    "/transfers/scheduled",
    { schema: { body: ScheduleRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const body = request.body;
      const schedule = transfers.createScheduledTransfer(auth, {
        recipient: body.recipient,
        amount: amount(body.amount),
        intervalSeconds: body.interval_seconds,
        repetitions: body.repetitions,
        startTime: body.start_time,
        prefundIntervals: body.prefund_intervals,
      });
      return reply.status(201).send(toWire(schedule));
    },
  );

  app.get("/transfers/scheduled/due", async (_request, reply) => {
    return reply.send(toWire({ schedules: transfers.dueScheduledTransfers() }));
  });

  app.get<{ Params: IdParams }>("/transfers/scheduled/:id", async (request, reply) => {
    return reply.send(toWire(transfers.getScheduledTransfer(recordId(request.params.id))));
  });

  app.post<{ Params: IdParams }>("/transfers/scheduled/:id/execute", async (request, reply) => {
    const auth = authenticate(ctx, request);
    const schedule = transfers.executeScheduledTransfer(auth, recordId(request.params.id));
    return reply.send(toWire(schedule));
  });

  app.post<{ Params: IdParams }>("/transfers/scheduled/:id/cancel", async (request, reply) => {
    const auth = authenticate(ctx, request);
    const schedule = transfers.cancelScheduledTransfer(auth, recordId(request.params.id));
    return reply.send(toWire(schedule));
  });

  app.post<{ Params: IdParams; Body: TopUpRequest }>(
    "/transfers/scheduled/:id/top-up",
    { schema: { body: TopUpRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const schedule = transfers.topUpScheduledTransfer(
        auth,
        recordId(request.params.id),
        request.body.intervals,
      );
      return reply.send(toWire(schedule));
    },
  );

  // ── Escrow ───────────────────────────────────────────────────────

  app.post<{ Body: EscrowRequest }>(
    "/escrows",
    { schema: { body: EscrowRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const body = request.body;
      const escrow = transfers.createEscrow(auth, {
        recipient: body.recipient,
        amount: amount(body.amount),
        expiresIn: body.expires_in,
        arbiter: body.arbiter,
      });
      return reply.status(201).send(toWire(escrow));
    },
  );

  app.get<{ Params: IdParams }>("/escrows/:id", async (request, reply) => {
    return reply.send(toWire(transfers.getEscrow(recordId(request.params.id))));
  });

  app.post<{ Params: IdParams }>("/escrows/:id/release", async (request, reply) => {
    const auth = authenticate(ctx, request);
    return reply.send(toWire(transfers.releaseEscrow(auth, recordId(request.params.id))));
  });

  app.post<{ Params: IdParams }>("/escrows/:id/refund", async (request, reply) => {
    const auth = authenticate(ctx, request);
    return reply.send(toWire(transfers.refundEscrow(auth, recordId(request.params.id))));
  });

  // ── Community collections ────────────────────────────────────────

  app.post<{ Body: CollectionRequest }>(
    "/collections",
    { schema: { body: CollectionRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const body = request.body;
      const collection = transfers.createCommunityCollection(
        auth,
        body.purpose,
        amount(body.goal, "goal"),
        body.duration_seconds,
      );
      return reply.status(201).send(toWire(collection));
    },
  );

  app.get<{ Params: IdParams }>("/collections/:id", async (request, reply) => {
    return reply.send(toWire(transfers.getCollection(recordId(request.params.id))));
  });

  app.post<{ Params: IdParams; Body: ContributeRequest }>(
    "/collections/:id/contribute",
    { schema: { body: ContributeRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const collection = transfers.contributeToCollection(
        auth,
        recordId(request.params.id),
        amount(request.body.amount),
      );
      return reply.send(toWire(collection));
    },
  );

  app.post<{ Params: IdParams }>("/collections/:id/finalize", async (request, reply) => {
    const auth = authenticate(ctx, request);
    const id = recordId(request.params.id);
    const payout = transfers.finalizeCommunityCollection(auth, id);
    return reply.send(toWire({ collectionId: id, payout }));
  });

  app.post<{ Params: IdParams; Body: CollectionPayoutRequest }>(
    "/collections/:id/payout",
    { schema: { body: CollectionPayoutRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const collection = transfers.payoutFromCollection(
        auth,
        recordId(request.params.id),
        request.body.recipient,
        amount(request.body.amount),
      );
      return reply.send(toWire(collection));
    },
  );

  // ── Membership registry ──────────────────────────────────────────

  app.post<{ Body: MembershipRequest }>(
    "/members",
    { schema: { body: MembershipRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      transfers.setMember(auth, request.body.account, request.body.enabled);
      const account = requireAccount(request.body.account, "account");
      return reply.send(toWire({ account, tier: transfers.tierOf(account) }));
    },
  );

  app.post<{ Body: MembershipRequest }>(
    "/node-operators",
    { schema: { body: MembershipRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      transfers.setNodeOperator(auth, request.body.account, request.body.enabled);
      const account = requireAccount(request.body.account, "account");
      return reply.send(toWire({ account, tier: transfers.tierOf(account) }));
    },
  );
}
