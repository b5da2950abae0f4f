/**
 * Event Types
 *
 * Every committed state change in the engine is published as an
 * EngineEvent. Events carry enough data for an external indexer to
 * rebuild balances and delegation state without re-running accrual math.
 *
 * Rules:
 * - Events are immutable after creation
 * - The journal wraps each event with a sequence number (1-based)
 * - Amounts are decimal strings of base units (JSON-safe)
 */

import type { DelegationKind } from "./delegation.js";
import type { Address, DelegationId, UnixSeconds } from "./primitives.js";

/** Fields present on every event. */
export interface EventMetadata {
  /** Operation time (the single `now` sampled by the operation). */
  readonly timestamp: UnixSeconds;
}

export interface AccrualStartedEvent extends EventMetadata {
  readonly type: "accrual.started";
  readonly account: Address;
}

export interface AccrualConsolidatedEvent extends EventMetadata {
  readonly type: "accrual.consolidated";
  readonly account: Address;
  /** Base accrual folded into the account's balance. */
  readonly credited: string;
  /** Portion of the span's accrual that went to outgoing delegations. */
  readonly delegated: string;
}

export interface RemovalReportedEvent extends EventMetadata {
  readonly type: "accrual.removal-reported";
  readonly account: Address;
  readonly reporter: Address;
  readonly reward: string;
}

export interface TransferEvent extends EventMetadata {
  readonly type: "transfer";
  readonly from: Address;
  readonly to: Address;
  readonly amount: string;
}

export interface BurnEvent extends EventMetadata {
  readonly type: "burn";
  readonly account: Address;
  readonly amount: string;
}

export interface DelegationCreatedEvent extends EventMetadata {
  readonly type: "delegation.created";
  readonly id: DelegationId;
  readonly kind: DelegationKind;
  readonly sender: Address;
  readonly recipient: Address;
  readonly ratePerSecond: string;
  readonly startTime: UnixSeconds;
  /** null for open-ended flows. */
  readonly stopTime: UnixSeconds | null;
  readonly cancellable: boolean;
}

export interface DelegationWithdrawnEvent extends EventMetadata {
  readonly type: "delegation.withdrawn";
  readonly id: DelegationId;
  readonly sender: Address;
  readonly recipient: Address;
  readonly amount: string;
  /** True when the withdrawal closed the delegation. */
  readonly completed: boolean;
}

export interface DelegationCancelledEvent extends EventMetadata {
  readonly type: "delegation.cancelled";
  readonly id: DelegationId;
  readonly sender: Address;
  readonly recipient: Address;
  readonly cancelledBy: Address;
  /** Amount paid to the recipient on cancellation. */
  readonly recipientPayout: string;
}

export interface ConfigChangedEvent extends EventMetadata {
  readonly type: "config.changed";
  readonly key: "maxDelegationsAllowed" | "registry" | "governor";
  readonly value: string;
  readonly changedBy: Address;
}

/** Discriminated union of everything the engine publishes. */
export type EngineEvent =
  | AccrualStartedEvent
  | AccrualConsolidatedEvent
  | RemovalReportedEvent
  | TransferEvent
  | BurnEvent
  | DelegationCreatedEvent
  | DelegationWithdrawnEvent
  | DelegationCancelledEvent
  | ConfigChangedEvent;

export type EngineEventType = EngineEvent["type"];

/**
 * An event as stored in the journal.
 */
export interface JournaledEvent {
  /** Position in the global event sequence (1-based, gap-free). */
  readonly sequence: number;

  readonly event: EngineEvent;
}
