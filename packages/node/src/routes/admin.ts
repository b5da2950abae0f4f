/**
 * Governance routes. Every route requires the caller to be the governor.
 *
 * GET /api/v1/admin/config              — Current engine configuration
 * PUT /api/v1/admin/max-delegations     — Change the per-sender delegation cap
 * PUT /api/v1/admin/governor            — Hand governance to another address
 * PUT /api/v1/admin/registry/:address   — Set an address's verification in the in-memory registry
 */

import { Hono } from "hono";
import { DelegationError } from "@ubistream/delegation";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddressSchema,
  GovernorSchema,
  MaxDelegationsSchema,
  RegistryEntrySchema,
} from "../types/dto.js";
import { requireCaller } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";

export function createAdminRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/config", (c) => {
    const engine = c.get("engine");

    return c.json({
      data: {
        accruedPerSecond: engine.accruedPerSecond.toString(),
        maxDelegationsAllowed: engine.maxDelegationsAllowed,
        governor: engine.governor,
      },
    });
  });

  routes.put("/max-delegations", requireCaller(), validateBody(MaxDelegationsSchema), (c) => {
    const engine = c.get("engine");
    const { value } = c.get("validatedBody");

    engine.setMaxDelegationsAllowed(c.get("caller"), value);

    return c.json({ data: { maxDelegationsAllowed: engine.maxDelegationsAllowed } });
  });

  routes.put("/governor", requireCaller(), validateBody(GovernorSchema), (c) => {
    const engine = c.get("engine");
    const { address } = c.get("validatedBody");

    engine.changeGovernor(c.get("caller"), address);

    return c.json({ data: { governor: engine.governor } });
  });

  routes.put("/registry/:address", requireCaller(), validateBody(RegistryEntrySchema), (c) => {
    const engine = c.get("engine");
    const caller = c.get("caller");
    const address = AddressSchema.parse(c.req.param("address"));
    const { verified } = c.get("validatedBody");

    if (caller !== engine.governor) {
      throw new DelegationError("UNAUTHORIZED", `"${caller}" is not the governor`);
    }
    c.get("registry").setVerified(address, verified);

    return c.json({ data: { address, verified } });
  });

  return routes;
}
