/**
 * Value movement routes. The caller is the account being debited.
 *
 * POST /api/v1/transfers — Move settled value to another account
 * POST /api/v1/burns     — Destroy settled value
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { BurnSchema, TransferSchema } from "../types/dto.js";
import { requireCaller } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";

export function createTransferRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/transfers", requireCaller(), validateBody(TransferSchema), (c) => {
    const engine = c.get("engine");
    const from = c.get("caller");
    const { to, amount } = c.get("validatedBody");

    engine.transfer(from, to, amount);

    return c.json({ data: { from, to, amount: amount.toString() } });
  });

  routes.post("/burns", requireCaller(), validateBody(BurnSchema), (c) => {
    const engine = c.get("engine");
    const account = c.get("caller");
    const { amount } = c.get("validatedBody");

    engine.burn(account, amount);

    return c.json({ data: { account, amount: amount.toString() } });
  });

  return routes;
}
