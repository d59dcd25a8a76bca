import { Router, type Request } from "express";
import { z } from "zod";
import { EVENT_TOPICS, MAX_BASIS_POINTS } from "@roscaflow/shared";
import { env } from "../config/env.js";
import { assetLedger, auditTrail, authorizer, engine } from "../domain/index.js";
import { counterpartyProof, proofOf, requireAuth } from "../middleware/auth.js";
import { HttpError } from "../utils/errors.js";

export const v1Router = Router();

const addressSchema = z.string().trim().min(1).max(128);
const amountSchema = z.number().int().positive().max(Number.MAX_SAFE_INTEGER);
const basisPointsSchema = z.number().int().min(0).max(MAX_BASIS_POINTS);
const topicSchema = z.enum(EVENT_TOPICS);

v1Router.get("/health", (_request, response) => {
  response.json({
    data: {
      service: "roscaflow-api-node",
      status: "ok",
      timestamp: new Date().toISOString(),
      auditChainValid: auditTrail.verifyChain(),
    },
  });
});

// Development helpers: token issuance and test asset minting.

v1Router.post("/auth/token", (request, response) => {
  requireDevTools();
  const payload = z.object({ address: addressSchema }).parse(request.body);
  response.status(201).json({
    data: {
      address: payload.address,
      token: authorizer.issueToken(payload.address),
    },
  });
});

v1Router.post("/dev/mint", (request, response) => {
  requireDevTools();
  const payload = z
    .object({
      asset: addressSchema,
      to: addressSchema,
      amount: amountSchema,
    })
    .parse(request.body);
  assetLedger.mint(payload.asset, payload.to, payload.amount);
  response.status(201).json({
    data: {
      asset: payload.asset,
      account: payload.to,
      balance: assetLedger.balanceOf(payload.asset, payload.to),
    },
  });
});

v1Router.get("/dev/balances/:asset/:account", (request, response) => {
  requireDevTools();
  response.json({
    data: {
      asset: request.params.asset,
      account: request.params.account,
      balance: assetLedger.balanceOf(request.params.asset, request.params.account),
    },
  });
});

// Protocol

v1Router.post("/protocol/initialize", requireAuth, (request, response) => {
  const data = engine.initialize(proofOf(request));
  response.status(201).json({ data });
});

v1Router.get("/protocol", (_request, response) => {
  response.json({
    data: {
      config: engine.getProtocol(),
      feeBasisPoints: engine.feeBasisPoints(),
      treasury: engine.treasuryAddress(),
      lastActiveAt: engine.getLastActiveTimestamp(),
    },
  });
});

v1Router.put("/protocol/fee", requireAuth, (request, response) => {
  const payload = z
    .object({
      feeBasisPoints: basisPointsSchema,
      treasury: addressSchema,
    })
    .parse(request.body);
  const data = engine.setProtocolFee(proofOf(request), payload.feeBasisPoints, payload.treasury);
  response.json({ data });
});

v1Router.post("/protocol/admin-action", requireAuth, (request, response) => {
  const lastActiveAt = engine.adminAction(proofOf(request));
  response.json({ data: { lastActiveAt } });
});

// Custody

v1Router.post("/custody/deposit", requireAuth, (request, response) => {
  const payload = z.object({ asset: addressSchema, amount: amountSchema }).parse(request.body);
  const balance = engine.deposit(proofOf(request), payload.asset, payload.amount);
  response.status(201).json({ data: { asset: payload.asset, balance } });
});

v1Router.post("/custody/emergency-withdraw", requireAuth, (request, response) => {
  const payload = z.object({ asset: addressSchema }).parse(request.body);
  const amount = engine.emergencyWithdraw(proofOf(request), payload.asset);
  response.json({ data: { asset: payload.asset, amount } });
});

v1Router.get("/custody/:user/:asset", (request, response) => {
  response.json({
    data: {
      user: request.params.user,
      asset: request.params.asset,
      balance: engine.getUserBalance(request.params.user, request.params.asset),
    },
  });
});

// Circles

v1Router.get("/circles", (_request, response) => {
  response.json({ data: engine.listCircles() });
});

v1Router.post("/circles", requireAuth, (request, response) => {
  const payload = z
    .object({
      contribution: amountSchema,
      isRandomQueue: z.boolean().default(false),
      asset: addressSchema,
      cycleDuration: amountSchema.optional(),
      lateFeeBps: basisPointsSchema.optional(),
      insuranceFeeBps: basisPointsSchema.optional(),
    })
    .parse(request.body);
  const circleId = engine.createCircle(proofOf(request), payload);
  response.status(201).json({ data: engine.getCircle(circleId) });
});

v1Router.get("/circles/:circleId", (request, response) => {
  response.json({ data: engine.getCircle(circleIdOf(request)) });
});

v1Router.get("/circles/:circleId/members", (request, response) => {
  response.json({ data: engine.listMembers(circleIdOf(request)) });
});

v1Router.get("/circles/:circleId/cycle", (request, response) => {
  response.json({ data: engine.getCycleInfo(circleIdOf(request)) });
});

v1Router.get("/circles/:circleId/queue", (request, response) => {
  response.json({ data: engine.getPayoutQueue(circleIdOf(request)) });
});

v1Router.get("/circles/:circleId/payout-status", (request, response) => {
  response.json({ data: engine.getPayoutStatus(circleIdOf(request)) });
});

v1Router.get("/circles/:circleId/events", (request, response) => {
  const circleId = circleIdOf(request);
  engine.getCircle(circleId);
  const filters = z
    .object({
      topic: topicSchema.optional(),
      limit: z.coerce.number().int().positive().max(500).optional(),
    })
    .parse(request.query);
  response.json({ data: auditTrail.list({ circleId, ...filters }) });
});

v1Router.post("/circles/:circleId/join", requireAuth, (request, response) => {
  const data = engine.joinCircle(proofOf(request), circleIdOf(request));
  response.status(201).json({ data });
});

v1Router.post("/circles/:circleId/finalize", requireAuth, (request, response) => {
  const data = engine.finalizeCircle(proofOf(request), circleIdOf(request));
  response.json({ data });
});

v1Router.post("/circles/:circleId/contributions", requireAuth, (request, response) => {
  const data = engine.contributeToCircle(proofOf(request), circleIdOf(request));
  response.status(201).json({ data });
});

v1Router.post("/circles/:circleId/payouts", requireAuth, (request, response) => {
  const payload = z.object({ recipient: addressSchema }).parse(request.body);
  const data = engine.processPayout(proofOf(request), circleIdOf(request), payload.recipient);
  response.json({ data });
});

v1Router.post("/circles/:circleId/rollover", requireAuth, (request, response) => {
  const data = engine.rolloverGroup(proofOf(request), circleIdOf(request));
  response.json({ data });
});

v1Router.post("/circles/:circleId/admin", requireAuth, (request, response) => {
  const payload = z.object({ newAdmin: addressSchema }).parse(request.body);
  const data = engine.transferCircleAdmin(proofOf(request), circleIdOf(request), payload.newAdmin);
  response.json({ data });
});

v1Router.post("/circles/:circleId/kick", requireAuth, (request, response) => {
  const payload = z
    .object({
      member: addressSchema,
      penalty: z.number().int().min(0).default(0),
    })
    .parse(request.body);
  const data = engine.kickMember(proofOf(request), circleIdOf(request), payload.member, payload.penalty);
  response.json({ data });
});

v1Router.post("/circles/:circleId/swap", requireAuth, (request, response) => {
  const payload = z.object({ newMemberToken: z.string().min(1) }).parse(request.body);
  const data = engine.swapMember(proofOf(request), counterpartyProof(payload.newMemberToken), circleIdOf(request));
  response.json({ data });
});

v1Router.post("/circles/:circleId/swap-by-admin", requireAuth, (request, response) => {
  const payload = z.object({ oldMember: addressSchema, newMember: addressSchema }).parse(request.body);
  const data = engine.swapMemberByAdmin(
    proofOf(request),
    circleIdOf(request),
    payload.oldMember,
    payload.newMember
  );
  response.json({ data });
});

v1Router.post("/circles/:circleId/eject", requireAuth, (request, response) => {
  const payload = z.object({ member: addressSchema }).parse(request.body);
  const data = engine.ejectMember(proofOf(request), circleIdOf(request), payload.member);
  response.json({ data });
});

v1Router.post("/circles/:circleId/exit", requireAuth, (request, response) => {
  const data = engine.requestExit(proofOf(request), circleIdOf(request));
  response.json({ data });
});

v1Router.post("/circles/:circleId/fill-vacancy", requireAuth, (request, response) => {
  const payload = z
    .object({
      exiting: addressSchema,
      newMemberToken: z.string().min(1),
    })
    .parse(request.body);
  const data = engine.fillVacancy(
    proofOf(request),
    counterpartyProof(payload.newMemberToken),
    circleIdOf(request),
    payload.exiting
  );
  response.json({ data });
});

v1Router.post("/circles/:circleId/insurance-coverage", requireAuth, (request, response) => {
  const payload = z.object({ member: addressSchema }).parse(request.body);
  const data = engine.triggerInsuranceCoverage(proofOf(request), circleIdOf(request), payload.member);
  response.json({ data });
});

v1Router.post("/circles/:circleId/dissolution/propose", requireAuth, (request, response) => {
  const dissolved = engine.proposeDissolution(proofOf(request), circleIdOf(request));
  response.json({ data: { dissolved } });
});

v1Router.post("/circles/:circleId/dissolution/vote", requireAuth, (request, response) => {
  const dissolved = engine.voteDissolve(proofOf(request), circleIdOf(request));
  response.json({ data: { dissolved } });
});

v1Router.post("/circles/:circleId/withdraw", requireAuth, (request, response) => {
  const amount = engine.withdrawProRata(proofOf(request), circleIdOf(request));
  response.json({ data: { amount } });
});

v1Router.post("/circles/:circleId/penalty-proposals", requireAuth, (request, response) => {
  const payload = z.object({ lateFeeBps: basisPointsSchema }).parse(request.body);
  const data = engine.proposePenaltyChange(proofOf(request), circleIdOf(request), payload.lateFeeBps);
  response.status(201).json({ data });
});

v1Router.post("/circles/:circleId/penalty-proposals/vote", requireAuth, (request, response) => {
  const data = engine.votePenaltyChange(proofOf(request), circleIdOf(request));
  response.json({ data });
});

function circleIdOf(request: Request): number {
  return z.coerce.number().int().positive().parse(request.params.circleId);
}

function requireDevTools() {
  if (!env.EXPOSE_DEV_TOOLS) {
    throw new HttpError(404, "NOT_FOUND", "Route not found.");
  }
}
