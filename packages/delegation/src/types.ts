/**
 * @ubistream/delegation: Internal types for delegations and the engine.
 *
 * Rules:
 * - All exported types are readonly
 * - Records are replaced, never mutated in place
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { AccountRecord, Clock, RegistryGateway } from "@ubistream/accrual";
import type {
  Address,
  Amount,
  DelegationId,
  DelegationKind,
  JournaledEvent,
  SettlementReason,
  UnixSeconds,
} from "@ubistream/types";
import type { EventJournal, ListenerErrorHandler } from "./event-journal.js";

// =============================================================================
// Delegation Records
// =============================================================================

/**
 * A live delegation.
 *
 * `settledAccrued` is the value attributed to this delegation by past
 * consolidations of its sender. The part of the sender's current span
 * that falls in the delegation's window is added on top of it when
 * the balance is queried.
 */
export interface DelegationRecord {
  readonly id: DelegationId;
  readonly kind: DelegationKind;
  readonly sender: Address;
  readonly recipient: Address;
  readonly ratePerSecond: Amount;
  readonly startTime: UnixSeconds;
  /** null for open-ended flows. */
  readonly stopTime: UnixSeconds | null;
  readonly cancellable: boolean;
  readonly createdAt: UnixSeconds;
  readonly settledAccrued: Amount;
  readonly withdrawn: Amount;
}

/** Fields supplied when a record is first stored. */
export type NewDelegation = Omit<DelegationRecord, "id" | "settledAccrued" | "withdrawn">;

/** What remains of a delegation after it leaves the active set. */
export interface Tombstone {
  readonly id: DelegationId;
  readonly reason: SettlementReason;
  readonly settledAt: UnixSeconds;
}

/**
 * Definite state of a delegation id.
 */
export type DelegationState =
  | { readonly status: "active"; readonly delegation: DelegationRecord }
  | ({ readonly status: "settled" } & Tombstone)
  | { readonly status: "unknown"; readonly id: DelegationId };

// =============================================================================
// Requests
// =============================================================================

/**
 * Parameters of a delegation request.
 *
 * - stream: `startTime` defaults to now; `stopTime` is required;
 *   `cancellable` defaults to true
 * - flow: `startTime` defaults to now; `stopTime` must be absent;
 *   always cancellable
 */
export interface CreateDelegationParams {
  readonly kind: DelegationKind;
  readonly recipient: Address;
  readonly ratePerSecond: Amount;
  readonly startTime?: UnixSeconds;
  readonly stopTime?: UnixSeconds | null;
  readonly cancellable?: boolean;
}

/** Outcome of paying out one delegation. */
export interface WithdrawalResult {
  readonly id: DelegationId;
  readonly recipient: Address;
  readonly amount: Amount;
  /** True when the payout closed the delegation. */
  readonly completed: boolean;
}

export interface CancellationResult {
  readonly id: DelegationId;
  readonly recipientPayout: Amount;
}

// =============================================================================
// Engine Configuration
// =============================================================================

export interface EngineConfig {
  /** Base units accrued per second by each verified, accruing account. */
  readonly accruedPerSecond: Amount;

  /** Cap on a sender's active delegations. */
  readonly maxDelegationsAllowed: number;

  /** Address allowed to change configuration. */
  readonly governor: Address;

  /** The engine's own address; never a valid recipient. */
  readonly engineAddress?: Address;

  /** Minted to the governor when the engine is constructed. */
  readonly initialSupply?: Amount;
}

export interface EngineDependencies {
  readonly registry: RegistryGateway;
  readonly clock?: Clock;
  readonly journal?: EventJournal;
  /** Receives subscriber failures when the engine creates its own journal. */
  readonly onListenerError?: ListenerErrorHandler;
}

// =============================================================================
// Snapshots
// =============================================================================

/** Serializable delegation record (amounts as decimal strings). */
export interface DelegationSnapshotRecord {
  readonly id: DelegationId;
  readonly kind: DelegationKind;
  readonly sender: Address;
  readonly recipient: Address;
  readonly ratePerSecond: string;
  readonly startTime: UnixSeconds;
  readonly stopTime: UnixSeconds | null;
  readonly cancellable: boolean;
  readonly createdAt: UnixSeconds;
  readonly settledAccrued: string;
  readonly withdrawn: string;
}

/** An address and the ids in one of its indices, in index order. */
export interface IndexEntry {
  readonly address: Address;
  readonly ids: readonly DelegationId[];
}

export interface RegistrySnapshot {
  readonly lastId: DelegationId;
  readonly delegations: readonly DelegationSnapshotRecord[];
  readonly tombstones: readonly Tombstone[];
  readonly outgoing: readonly IndexEntry[];
  readonly incoming: readonly IndexEntry[];
}

export interface EngineSnapshot {
  readonly version: 1;
  readonly config: {
    readonly accruedPerSecond: string;
    readonly maxDelegationsAllowed: number;
    readonly governor: Address;
    readonly engineAddress: Address | null;
  };
  readonly accounts: readonly AccountRecord[];
  readonly registry: RegistrySnapshot;
  readonly events: readonly JournaledEvent[];
}

// =============================================================================
// Error Types
// =============================================================================

/** Error codes for delegation and engine operations. */
export type DelegationErrorCode =
  | "NOT_ELIGIBLE"
  | "INVALID_RECIPIENT"
  | "ZERO_RATE"
  | "STARTS_IN_PAST"
  | "INVALID_WINDOW"
  | "RATE_EXCEEDS_BASE"
  | "TOO_MANY_DELEGATIONS"
  | "OVERLAPPING_TO_SAME_RECIPIENT"
  | "CIRCULAR_DELEGATION"
  | "INSUFFICIENT_CAPACITY"
  | "UNAUTHORIZED"
  | "NOT_FOUND"
  | "AMOUNT_EXCEEDS_AVAILABLE"
  | "NOTHING_TO_WITHDRAW"
  | "NOT_CANCELLABLE"
  | "REENTRANT_CALL"
  | "INVALID_CONFIG";

/**
 * Structured error from delegation operations.
 */
export class DelegationError extends Error {
  public readonly code: DelegationErrorCode;

  constructor(code: DelegationErrorCode, message: string) {
    super(message);
    this.name = "DelegationError";
    this.code = code;
  }
}
