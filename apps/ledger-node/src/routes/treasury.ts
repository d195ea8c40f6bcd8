/**
 * Treasury routes.
 *
 * GET   /treasury/funds                 active funds (?all=true for inactive too)
 * GET   /treasury/funds/:id             one fund
 * POST  /treasury/funds                 create fund (treasurer)
 * PATCH /treasury/funds/:id             reweight (treasurer)
 * POST  /treasury/funds/:id/deactivate  deactivate, sweep to Unallocated (treasurer)
 * PUT   /treasury/allocations           bulk allocation update (treasurer)
 * POST  /treasury/deposit               deposit funds (any caller)
 * POST  /treasury/deposit-fees          deposit fees (fee_collector)
 * POST  /treasury/withdraw              fund expense (spender)
 * POST  /treasury/withdraw-funds        profit-sharing draw (profit_sharing)
 * GET   /treasury/expenses              expense log
 * GET   /treasury/deposits              deposit log
 */

import type { FastifyInstance } from "fastify";
import { Type } from "@sinclair/typebox";
import {
  AllocationsRequest,
  CreateFundRequest,
  DepositRequest,
  ProfitWithdrawRequest,
  UpdateFundRequest,
  WithdrawRequest,
} from "@tapa/economics";
import { toWire } from "../json.js";
import {
  PageQuery,
  amount,
  authenticate,
  fundId,
  type IdParams,
  type RouteContext,
} from "./context.js";

const FundListQuery = Type.Object({ all: Type.Optional(Type.Boolean()) });

export function treasuryRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { treasury } = ctx.system;

  app.get<{ Querystring: { all?: boolean } }>(
    "/treasury/funds",
    { schema: { querystring: FundListQuery } },
    async (request, reply) => {
      return reply.send(
        toWire({
          funds: treasury.listFunds(request.query.all ?? false),
          totalBalance: treasury.totalBalance(),
          allocationTotalBps: treasury.activeAllocationTotal(),
        }),
      );
    },
  );

  app.get<{ Params: IdParams }>("/treasury/funds/:id", async (request, reply) => {
    return reply.send(toWire(treasury.getFundDetails(fundId(request.params.id))));
  });

  app.post<{ Body: CreateFundRequest }>(
    "/treasury/funds",
    { schema: { body: CreateFundRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const fund = treasury.createFund(auth, request.body.name, BigInt(request.body.allocation_bps));
      return reply.status(201).send(toWire(fund));
    },
  );

  app.patch<{ Params: IdParams; Body: UpdateFundRequest }>(
    "/treasury/funds/:id",
    { schema: { body: UpdateFundRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const fund = treasury.updateFund(auth, fundId(request.params.id), {
        allocationBps: BigInt(request.body.allocation_bps),
      });
      return reply.send(toWire(fund));
    },
  );

  app.post<{ Params: IdParams }>("/treasury/funds/:id/deactivate", async (request, reply) => {
    const auth = authenticate(ctx, request);
    return reply.send(toWire(treasury.deactivateFund(auth, fundId(request.params.id))));
  });

  app.put<{ Body: AllocationsRequest }>(
    "/treasury/allocations",
    { schema: { body: AllocationsRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const funds = treasury.updateAllFundAllocations(
        auth,
        request.body.allocations.map((a) => ({
          fundId: a.fund_id,
          allocationBps: BigInt(a.allocation_bps),
        })),
      );
      return reply.send(toWire({ funds }));
    },
  );

  app.post<{ Body: DepositRequest }>(
    "/treasury/deposit",
    { schema: { body: DepositRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const body = request.body;
      const deposit = treasury.depositFunds(
        auth,
        amount(body.amount),
        body.description,
        body.fund_id === undefined ? undefined : fundId(body.fund_id),
      );
      return reply.status(201).send(toWire(deposit));
    },
  );

  app.post<{ Body: DepositRequest }>(
    "/treasury/deposit-fees",
    { schema: { body: DepositRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const deposit = treasury.depositFees(auth, amount(request.body.amount), request.body.description);
      return reply.status(201).send(toWire(deposit));
    },
  );

  app.post<{ Body: WithdrawRequest }>(
    "/treasury/withdraw",
    { schema: { body: WithdrawRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const body = request.body;
      const expense = treasury.withdraw(
        auth,
        fundId(body.fund_id),
        body.recipient,
        amount(body.amount),
        body.description,
      );
      return reply.send(toWire(expense));
    },
  );

  app.post<{ Body: ProfitWithdrawRequest }>(
    "/treasury/withdraw-funds",
    { schema: { body: ProfitWithdrawRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const expenses = treasury.withdrawFunds(auth, request.body.recipient, amount(request.body.amount));
      return reply.send(toWire({ expenses }));
    },
  );

  app.get<{ Querystring: PageQuery }>(
    "/treasury/expenses",
    { schema: { querystring: PageQuery } },
    async (request, reply) => {
      const { offset, limit } = request.query;
      return reply.send(toWire({ expenses: treasury.getExpenses(offset, limit) }));
    },
  );

  app.get<{ Querystring: PageQuery }>(
    "/treasury/deposits",
    { schema: { querystring: PageQuery } },
    async (request, reply) => {
      const { offset, limit } = request.query;
      return reply.send(toWire({ deposits: treasury.getDeposits(offset, limit) }));
    },
  );
}
