/**
 * Fee engine routes.
 *
 * GET    /fees/profiles/:type         fee profile
 * PUT    /fees/profiles/:type         replace profile (fee_admin)
 * POST   /fees/profiles/:type/active  enable/disable a fee type (fee_admin)
 * POST   /fees/quote                  calculateFee, no state change
 * POST   /fees/process                charge and distribute (marketplace)
 * GET    /fees/transactions/:id       processed fee record
 * GET    /fees/discounts              volume discount tiers
 * PUT    /fees/discounts              set a tier (fee_admin)
 * DELETE /fees/discounts/:threshold   remove a tier (fee_admin)
 * PUT    /fees/collections/override   per-collection community bps (fee_admin)
 * GET    /fees/payers/:address        cumulative spend and discount
 */

import type { FastifyInstance } from "fastify";
import { Type } from "@sinclair/typebox";
import {
  CollectionOverrideRequest,
  FeeProfileV1,
  FeeQuoteRequest,
  ProcessFeeRequest,
  VolumeDiscountTierV1,
  isFeeType,
  type FeeType,
} from "@tapa/economics";
import { notFound } from "../errors.js";
import { toWire } from "../json.js";
import { requireAccount } from "../views/validate.js";
import { amount, authenticate, recordId, type IdParams, type RouteContext } from "./context.js";

function feeType(text: string): FeeType {
  if (!isFeeType(text)) throw notFound("fee_type_not_found", `unknown fee type ${text}`);
  return text;
}

const ActiveBody = Type.Object({ active: Type.Boolean() }, { additionalProperties: false });

export function feeRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { fees } = ctx.system;

  app.get<{ Params: { type: string } }>("/fees/profiles/:type", async (request, reply) => {
    const type = feeType(request.params.type);
    return reply.send(toWire({ feeType: type, ...fees.getFeeProfile(type) }));
  });

  app.put<{ Params: { type: string }; Body: FeeProfileV1 }>(
    "/fees/profiles/:type",
    { schema: { body: FeeProfileV1 } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const type = feeType(request.params.type);
      const body = request.body;
      const profile = fees.setFeeProfile(auth, type, {
        baseFeeBps: BigInt(body.base_fee_bps),
        royaltyBps: BigInt(body.royalty_bps),
        communityFundBps: BigInt(body.community_fund_bps),
        platformFeeBps: BigInt(body.platform_fee_bps),
      });
      return reply.send(toWire({ feeType: type, ...profile }));
    },
  );

  app.post<{ Params: { type: string }; Body: { active: boolean } }>(
    "/fees/profiles/:type/active",
    { schema: { body: ActiveBody } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const type = feeType(request.params.type);
      const profile = fees.setFeeTypeActive(auth, type, request.body.active);
      return reply.send(toWire({ feeType: type, ...profile }));
    },
  );

  app.post<{ Body: FeeQuoteRequest }>(
    "/fees/quote",
    { schema: { body: FeeQuoteRequest } },
    async (request, reply) => {
      const body = request.body;
      const split = fees.calculateFee(
        amount(body.amount),
        body.fee_type,
        requireAccount(body.payer, "payer"),
        body.collection,
      );
      return reply.send(toWire(split));
    },
  );

  app.post<{ Body: ProcessFeeRequest }>(
    "/fees/process",
    { schema: { body: ProcessFeeRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const body = request.body;
      const record = fees.processFee(auth, {
        amount: amount(body.amount),
        feeType: body.fee_type,
        payer: body.payer,
        creator: body.creator,
        collection: body.collection,
      });
      return reply.status(201).send(toWire(record));
    },
  );

  app.get<{ Params: IdParams }>("/fees/transactions/:id", async (request, reply) => {
    return reply.send(toWire(fees.getFeeTransaction(recordId(request.params.id))));
  });

  app.get("/fees/discounts", async (_request, reply) => {
    return reply.send(toWire({ tiers: fees.listVolumeDiscounts() }));
  });

  app.put<{ Body: VolumeDiscountTierV1 }>(
    "/fees/discounts",
    { schema: { body: VolumeDiscountTierV1 } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      fees.setVolumeDiscountTier(
        auth,
        amount(request.body.threshold, "threshold"),
        BigInt(request.body.discount_bps),
      );
      return reply.send(toWire({ tiers: fees.listVolumeDiscounts() }));
    },
  );

  app.delete<{ Params: { threshold: string } }>(
    "/fees/discounts/:threshold",
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      fees.removeVolumeDiscountTier(auth, amount(request.params.threshold, "threshold"));
      return reply.send(toWire({ tiers: fees.listVolumeDiscounts() }));
    },
  );

  app.put<{ Body: CollectionOverrideRequest }>(
    "/fees/collections/override",
    { schema: { body: CollectionOverrideRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const bps = request.body.community_fund_bps;
      fees.setCollectionCommunityOverride(
        auth,
        request.body.collection,
        bps === null ? null : BigInt(bps),
      );
      return reply.send({ ok: true });
    },
  );

  app.get<{ Params: { address: string } }>("/fees/payers/:address", async (request, reply) => {
    const payer = requireAccount(request.params.address, "address");
    return reply.send(
      toWire({
        payer,
        cumulativeSpend: fees.getPayerSpend(payer),
        discountBps: fees.getVolumeDiscount(payer),
      }),
    );
  });
}
