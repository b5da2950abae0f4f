/**
 * @ubistream/delegation: Delegated accrual on top of the accrual ledger.
 *
 * A verified, accruing account can redirect part of its per-second
 * accrual to other addresses for a window of time. Value is split
 * lazily: nothing moves until a withdrawal, cancellation, transfer or
 * removal needs an exact number.
 *
 * Design rules:
 * - All monetary arithmetic uses bigint
 * - Check-then-effect: a failed operation changes nothing
 * - One `now` per operation; mutating operations are never re-entered
 */

// Engine
export { UbiEngine } from "./engine.js";

// Components
export { DelegationRegistry } from "./delegation-registry.js";
export { OverlapValidator } from "./overlap-validator.js";
export type { DelegationProposal } from "./overlap-validator.js";
export { SettlementEngine } from "./settlement.js";
export { OperationGuard } from "./operation-guard.js";
export type { GuardState } from "./operation-guard.js";
export { EventJournal } from "./event-journal.js";
export type {
  EventJournalOptions,
  EventListener,
  ListenerErrorHandler,
  Subscription,
} from "./event-journal.js";

// Flavors
export { flavorOf, delegationWindow } from "./flavors.js";
export type { DelegationFlavor, ResolvedWindow } from "./flavors.js";

// Types
export type {
  DelegationRecord,
  NewDelegation,
  Tombstone,
  DelegationState,
  CreateDelegationParams,
  WithdrawalResult,
  CancellationResult,
  EngineConfig,
  EngineDependencies,
  DelegationSnapshotRecord,
  IndexEntry,
  RegistrySnapshot,
  EngineSnapshot,
  DelegationErrorCode,
} from "./types.js";

export { DelegationError } from "./types.js";
