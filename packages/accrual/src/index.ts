/**
 * @ubistream/accrual: Lazily-computed UBI accrual ledger.
 *
 * Balances of verified accounts grow with time without being written:
 * the pending amount is derived from the accrual start on every query
 * and folded into the stored balance only when something needs an
 * exact number.
 *
 * Design rules:
 * - All monetary arithmetic uses bigint
 * - One `now` per operation, one registry answer per address per operation
 * - Fail-closed: invalid operations throw, never silently succeed
 */

// Core ledger
export { AccrualLedger } from "./accrual-ledger.js";

// Account storage
export { AccountBook } from "./account-book.js";

// Registry gateway
export { InMemoryRegistry } from "./registry.js";
export type { RegistryGateway } from "./registry.js";

// Clocks
export { SystemClock, ManualClock } from "./clock.js";
export type { Clock, ManualClockOptions } from "./clock.js";

// Operation context
export { createOperationContext } from "./operation-context.js";
export type { OperationContext } from "./operation-context.js";

// Arithmetic
export {
  assertOrdered,
  accruedOver,
  overlapSeconds,
  shareOver,
  windowsOverlap,
  parseUnits,
  formatUnits,
  parseBaseUnits,
} from "./accrual-math.js";

// Types
export type {
  AccountState,
  AccountRecord,
  AccrualConfig,
  AccrualErrorCode,
} from "./types.js";

export { AccrualError } from "./types.js";
