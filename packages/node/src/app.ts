/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes around one engine.
 * Separated from main.ts so tests can drive the app without a server.
 */

import { Hono } from "hono";
import type { InMemoryRegistry } from "@ubistream/accrual";
import type { UbiEngine } from "@ubistream/delegation";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createTransferRoutes } from "./routes/transfers.js";
import { createDelegationRoutes } from "./routes/delegations.js";
import { createAdminRoutes } from "./routes/admin.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly engine: UbiEngine;
  /** Registry the engine was built with; the admin routes toggle it. */
  readonly registry: InMemoryRegistry;
  /** API keys accepted on /api/* routes. */
  readonly auth: AuthConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly engine: UbiEngine;
  readonly registry: InMemoryRegistry;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { engine, registry } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes());

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", authMiddleware(options.auth));
  app.use("/api/*", async (c, next) => {
    c.set("engine", engine);
    c.set("registry", registry);
    await next();
  });

  app.route("/api/v1/accounts", createAccountRoutes());
  app.route("/api/v1", createTransferRoutes());
  app.route("/api/v1/delegations", createDelegationRoutes());
  app.route("/api/v1/admin", createAdminRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, engine, registry };
}
