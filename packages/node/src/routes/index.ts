/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createAccountRoutes } from "./accounts.js";
export { createTransferRoutes } from "./transfers.js";
export { createDelegationRoutes } from "./delegations.js";
export { createAdminRoutes } from "./admin.js";
export { createEventRoutes } from "./events.js";
