/**
 * @ubistream/types: Shared domain types for the ubistream stack.
 *
 * Used across all ubistream packages:
 * - Primitives (addresses, seconds, bigint amounts)
 * - Delegation vocabulary (kinds, windows)
 * - Engine events
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types: meaning lives in consuming code
 */

export type {
  Address,
  UnixSeconds,
  Amount,
  DelegationId,
} from "./primitives.js";

export { ZERO_ADDRESS } from "./primitives.js";

export type {
  DelegationKind,
  TimeWindow,
  SettlementReason,
} from "./delegation.js";

export type {
  EventMetadata,
  AccrualStartedEvent,
  AccrualConsolidatedEvent,
  RemovalReportedEvent,
  TransferEvent,
  BurnEvent,
  DelegationCreatedEvent,
  DelegationWithdrawnEvent,
  DelegationCancelledEvent,
  ConfigChangedEvent,
  EngineEvent,
  EngineEventType,
  JournaledEvent,
} from "./event.js";

export {
  isAddress,
  normalizeAddress,
  isUnixSeconds,
  isDelegationKind,
  isEngineEvent,
} from "./guards.js";
