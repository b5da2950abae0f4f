/**
 * Request ID middleware.
 *
 * Reuses the client's X-Request-Id when it is a short token of word
 * characters, dots and dashes; anything else is replaced by a fresh
 * UUID so log lines never carry client-controlled text. The id is
 * echoed on every response, errors included.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const REQUEST_ID_PATTERN = /^[\w.-]{1,128}$/;

/** The incoming id if it is usable, otherwise a new one. */
export function resolveRequestId(incoming: string | undefined): string {
  return incoming !== undefined && REQUEST_ID_PATTERN.test(incoming) ? incoming : randomUUID();
}

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const requestId = resolveRequestId(c.req.header(REQUEST_ID_HEADER));
    c.set("requestId", requestId);
    c.header(REQUEST_ID_HEADER, requestId);
    await next();
  };
}
