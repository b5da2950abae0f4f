/**
 * Delegation routes.
 *
 * POST /api/v1/delegations               — Create a stream or flow (sender = caller)
 * POST /api/v1/delegations/withdraw      — Withdraw everything available from several delegations
 * GET  /api/v1/delegations/:id           — Active record, tombstone, or unknown
 * GET  /api/v1/delegations/:id/balance   — Available balance (?asOf=unix seconds)
 * POST /api/v1/delegations/:id/withdraw  — Withdraw part of the available balance
 * POST /api/v1/delegations/:id/cancel    — Cancel and pay out the recipient
 */

import { Hono } from "hono";
import { DelegationError } from "@ubistream/delegation";
import type { AppEnv } from "../types/api-contract.js";
import {
  BalanceQuerySchema,
  CreateDelegationSchema,
  DelegationIdSchema,
  WithdrawAmountSchema,
  WithdrawSchema,
  toCancellationView,
  toCreateDelegationParams,
  toDelegationStateView,
  toWithdrawalView,
} from "../types/dto.js";
import { requireCaller } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createDelegationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", requireCaller(), validateBody(CreateDelegationSchema), (c) => {
    const engine = c.get("engine");
    const sender = c.get("caller");
    const body = c.get("validatedBody");

    const id = engine.createDelegation(sender, toCreateDelegationParams(body));

    return c.json({ data: toDelegationStateView(engine.getDelegation(id)) }, 201);
  });

  routes.post("/withdraw", requireCaller(), validateBody(WithdrawSchema), (c) => {
    const engine = c.get("engine");
    const { ids } = c.get("validatedBody");

    const results = engine.withdraw(c.get("caller"), ids);

    return c.json({ data: results.map(toWithdrawalView) });
  });

  routes.get("/:id", (c) => {
    const engine = c.get("engine");
    const id = DelegationIdSchema.parse(c.req.param("id"));

    const state = engine.getDelegation(id);
    if (state.status === "unknown") {
      throw new DelegationError("NOT_FOUND", `Delegation ${String(id)} does not exist`);
    }

    return c.json({ data: toDelegationStateView(state) });
  });

  routes.get("/:id/balance", (c) => {
    const engine = c.get("engine");
    const id = DelegationIdSchema.parse(c.req.param("id"));

    const queryResult = BalanceQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const { asOf } = queryResult.data;
    const balance = engine.balanceOfDelegation(id, asOf);

    return c.json({
      data: { id, balance: balance.toString(), ...(asOf !== undefined ? { asOf } : {}) },
    });
  });

  routes.post("/:id/withdraw", requireCaller(), validateBody(WithdrawAmountSchema), (c) => {
    const engine = c.get("engine");
    const id = DelegationIdSchema.parse(c.req.param("id"));
    const { amount } = c.get("validatedBody");

    const result = engine.withdrawAmount(c.get("caller"), id, amount);

    return c.json({ data: toWithdrawalView(result) });
  });

  routes.post("/:id/cancel", requireCaller(), (c) => {
    const engine = c.get("engine");
    const id = DelegationIdSchema.parse(c.req.param("id"));

    const result = engine.cancelDelegation(c.get("caller"), id);

    return c.json({ data: toCancellationView(result) });
  });

  return routes;
}
