/**
 * Middleware barrel: re-exports all middleware.
 */

export { handleError, statusForCode } from "./error-handler.js";
export type { ErrorStatus } from "./error-handler.js";
export { requestIdMiddleware, resolveRequestId, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export type { BodyEnv } from "./validate.js";
export { authMiddleware, requirePermission, requireCaller, API_KEY_HEADER } from "./auth.js";
export type { AuthConfig } from "./auth.js";
