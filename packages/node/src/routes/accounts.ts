/**
 * Account routes.
 *
 * GET  /api/v1/accounts/:address                 — Balances and delegation ids
 * POST /api/v1/accounts/:address/start-accruing  — Begin accrual for a verified account
 * POST /api/v1/accounts/:address/mint-accrued    — Fold pending accrual into the balance
 * POST /api/v1/accounts/:address/report-removal  — Settle a de-verified account (reporter = caller)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddressSchema } from "../types/dto.js";
import { requireCaller, requirePermission } from "../middleware/auth.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:address", (c) => {
    const engine = c.get("engine");
    const address = AddressSchema.parse(c.req.param("address"));

    return c.json({
      data: {
        address,
        settledBalance: engine.getSettledBalance(address).toString(),
        balance: engine.getBalance(address).toString(),
        accruedValue: engine.getAccruedValue(address).toString(),
        accrualStartTime: engine.getAccrualStartTime(address),
        outgoingAccruedTotal: engine.getOutgoingAccruedTotal(address).toString(),
        activeDelegations: [...engine.getActiveDelegationsOf(address)],
        incomingDelegations: [...engine.getIncomingDelegationsOf(address)],
      },
    });
  });

  routes.post("/:address/start-accruing", requirePermission("write"), (c) => {
    const engine = c.get("engine");
    const address = AddressSchema.parse(c.req.param("address"));

    engine.startAccruing(address);

    return c.json({
      data: { address, accrualStartTime: engine.getAccrualStartTime(address) },
    });
  });

  routes.post("/:address/mint-accrued", requirePermission("write"), (c) => {
    const engine = c.get("engine");
    const address = AddressSchema.parse(c.req.param("address"));

    const minted = engine.mintAccrued(address);

    return c.json({ data: { address, minted: minted.toString() } });
  });

  routes.post("/:address/report-removal", requireCaller(), (c) => {
    const engine = c.get("engine");
    const reporter = c.get("caller");
    const account = AddressSchema.parse(c.req.param("address"));

    const reward = engine.reportRemoval(reporter, account);

    return c.json({ data: { account, reporter, reward: reward.toString() } });
  });

  return routes;
}
