/**
 * Staking routes.
 *
 * POST /stakes                 lock PSF for a duration
 * GET  /stakes/:id             stake with pending rewards
 * GET  /stakes/:id/rewards     pending rewards only
 * POST /stakes/:id/increase    add principal (settles rewards first)
 * POST /stakes/:id/extend      extend the lock (settles rewards first)
 * POST /stakes/:id/claim       claim rewards
 * POST /stakes/:id/unstake     withdraw after the lock ends
 * GET  /governance/:address    voting weight, highest tier, stakes
 * GET  /staking/pool           rewards pool and totals
 * POST /staking/pool           fund the rewards pool (any caller)
 * GET  /staking/tiers          tier table
 * PUT  /staking/tiers/:tier    tier requirement (staking_admin)
 * PUT  /staking/duration-bonus duration bonus threshold (staking_admin)
 * PUT  /staking/base-rate      base reward rate (staking_admin)
 */

import type { FastifyInstance } from "fastify";
import { Type, type Static } from "@sinclair/typebox";
import {
  CreateStakeRequest,
  DurationBonusRequest,
  ExtendStakeRequest,
  FundPoolRequest,
  IncreaseStakeRequest,
  TierRequirementV1,
  Uint256String,
  isStakingTier,
  type StakingTier,
} from "@tapa/economics";
import { notFound } from "../errors.js";
import { toWire } from "../json.js";
import { requireAccount } from "../views/validate.js";
import { amount, authenticate, recordId, type IdParams, type RouteContext } from "./context.js";

const BaseRateRequest = Type.Object({ rate: Uint256String }, { additionalProperties: false });
type BaseRateRequest = Static<typeof BaseRateRequest>;

function stakingTier(text: string): StakingTier {
  if (!isStakingTier(text)) throw notFound("tier_not_found", `unknown staking tier ${text}`);
  return text;
}

export function stakingRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { staking } = ctx.system;

  app.post<{ Body: CreateStakeRequest }>(
    "/stakes",
    { schema: { body: CreateStakeRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const stake = staking.createStake(auth, amount(request.body.amount), request.body.duration_seconds);
      return reply.status(201).send(toWire(stake));
    },
  );

  app.get<{ Params: IdParams }>("/stakes/:id", async (request, reply) => {
    const id = recordId(request.params.id);
    return reply.send(toWire({ ...staking.getStake(id), pendingRewards: staking.pendingRewards(id) }));
  });

  app.get<{ Params: IdParams }>("/stakes/:id/rewards", async (request, reply) => {
    const id = recordId(request.params.id);
    return reply.send(toWire({ stakeId: id, pendingRewards: staking.pendingRewards(id) }));
  });

  app.post<{ Params: IdParams; Body: IncreaseStakeRequest }>(
    "/stakes/:id/increase",
    { schema: { body: IncreaseStakeRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const stake = staking.increaseStake(auth, recordId(request.params.id), amount(request.body.amount));
      return reply.send(toWire(stake));
    },
  );

  app.post<{ Params: IdParams; Body: ExtendStakeRequest }>(
    "/stakes/:id/extend",
    { schema: { body: ExtendStakeRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const stake = staking.extendStake(
        auth,
        recordId(request.params.id),
        request.body.additional_seconds,
      );
      return reply.send(toWire(stake));
    },
  );

  app.post<{ Params: IdParams }>("/stakes/:id/claim", async (request, reply) => {
    const auth = authenticate(ctx, request);
    const id = recordId(request.params.id);
    const claimed = staking.claimRewards(auth, id);
    return reply.send(toWire({ stakeId: id, claimed }));
  });

  app.post<{ Params: IdParams }>("/stakes/:id/unstake", async (request, reply) => {
    const auth = authenticate(ctx, request);
    return reply.send(toWire(staking.unstake(auth, recordId(request.params.id))));
  });

  app.get<{ Params: { address: string } }>("/governance/:address", async (request, reply) => {
    const account = requireAccount(request.params.address, "address");
    return reply.send(
      toWire({
        account,
        governanceWeight: staking.getGovernanceWeight(account),
        highestTier: staking.highestTierOf(account),
        feeDiscountBps: staking.feeDiscountOf(account),
        stakes: staking.getStakesOf(account),
      }),
    );
  });

  app.get("/staking/pool", async (_request, reply) => {
    return reply.send(toWire(staking.pool()));
  });

  app.post<{ Body: FundPoolRequest }>(
    "/staking/pool",
    { schema: { body: FundPoolRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      staking.fundRewardsPool(auth, amount(request.body.amount));
      return reply.send(toWire(staking.pool()));
    },
  );

  app.get("/staking/tiers", async (_request, reply) => {
    return reply.send(toWire({ tiers: staking.tierRequirements() }));
  });

  app.put<{ Params: { tier: string }; Body: TierRequirementV1 }>(
    "/staking/tiers/:tier",
    { schema: { body: TierRequirementV1 } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      const body = request.body;
      staking.setTierRequirement(auth, stakingTier(request.params.tier), {
        minAmount: amount(body.min_amount, "min_amount"),
        minDuration: body.min_duration,
        rewardMultiplierBps: BigInt(body.reward_multiplier_bps),
        governanceWeight: BigInt(body.governance_weight),
        feeDiscountBps: BigInt(body.fee_discount_bps),
        enabled: body.enabled,
      });
      return reply.send(toWire({ tiers: staking.tierRequirements() }));
    },
  );

  app.put<{ Body: DurationBonusRequest }>(
    "/staking/duration-bonus",
    { schema: { body: DurationBonusRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      staking.setDurationBonus(auth, request.body.threshold_seconds, BigInt(request.body.bonus_bps));
      return reply.send({ ok: true });
    },
  );

  app.put<{ Body: BaseRateRequest }>(
    "/staking/base-rate",
    { schema: { body: BaseRateRequest } },
    async (request, reply) => {
      const auth = authenticate(ctx, request);
      staking.setBaseRewardRate(auth, amount(request.body.rate, "rate"));
      return reply.send(toWire(staking.pool()));
    },
  );
}
