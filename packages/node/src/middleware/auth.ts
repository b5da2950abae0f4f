/**
 * Authentication middleware.
 *
 * Looks the X-Api-Key header up in the configured key registry and
 * sets `c.set("auth", authContext)`. The acting address of a request
 * is the one bound to its key.
 *
 * On failure, returns 401 or 403.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv, CallerEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";
import type { ErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Create authentication middleware. Returns 401 when the key is
 * missing or unknown.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(createErrorEnvelope("UNAUTHENTICATED", "Authentication required"), 401);
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(createErrorEnvelope("UNAUTHENTICATED", "Invalid API key"), 401);
    }

    c.set("auth", { identity: record.key, role: record.role, address: record.address });
    return next();
  };
}

// =============================================================================
// Permission Guards
// =============================================================================

type PermissionCheck =
  | { readonly ok: true; readonly auth: AuthContext }
  | { readonly ok: false; readonly status: 401 | 403; readonly envelope: ErrorEnvelope };

function checkPermission(auth: AuthContext | undefined, permission: Permission): PermissionCheck {
  if (auth === undefined) {
    return {
      ok: false,
      status: 401,
      envelope: createErrorEnvelope("UNAUTHENTICATED", "Authentication required"),
    };
  }
  if (!hasPermission(auth.role, permission)) {
    return {
      ok: false,
      status: 403,
      envelope: createErrorEnvelope("FORBIDDEN", `Role '${auth.role}' lacks '${permission}' permission`),
    };
  }
  return { ok: true, auth };
}

/**
 * Must run AFTER authMiddleware. Returns 403 if the authenticated
 * role lacks the required permission.
 */
export function requirePermission(permission: Permission): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const check = checkPermission(c.get("auth"), permission);
    if (!check.ok) {
      return c.json(check.envelope, check.status);
    }
    return next();
  };
}

/**
 * Write guard for operations that act as an account: sets `caller` to
 * the address bound to the request's key.
 */
export function requireCaller(): MiddlewareHandler<CallerEnv> {
  return async (c, next) => {
    const check = checkPermission(c.get("auth"), "write");
    if (!check.ok) {
      return c.json(check.envelope, check.status);
    }
    c.set("caller", check.auth.address);
    return next();
  };
}
