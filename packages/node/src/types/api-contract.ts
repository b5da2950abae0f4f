/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { InMemoryRegistry } from "@ubistream/accrual";
import type { UbiEngine } from "@ubistream/delegation";
import type { Address } from "@ubistream/types";
import type { AuthContext } from "./auth.js";

/**
 * Hono environment type for the ubistream app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The engine serving this process */
    engine: UbiEngine;

    /** Registry the engine consults; toggled through the admin routes */
    registry: InMemoryRegistry;

    /** Resolved API key (set by auth middleware on /api/* routes) */
    auth?: AuthContext;
  };
}

/** Environment of routes behind `requireCaller`. */
export interface CallerEnv extends AppEnv {
  Variables: AppEnv["Variables"] & {
    /** Address bound to the request's API key */
    caller: Address;
  };
}
