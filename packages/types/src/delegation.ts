/**
 * Delegation Types
 *
 * A delegation redirects part of a sender's accrual rate to a recipient
 * for a window of time.
 */

import type { UnixSeconds } from "./primitives.js";

/**
 * Delegation flavors.
 *
 * - stream: fixed start and stop
 * - flow: starts immediately, no fixed stop
 */
export type DelegationKind = "stream" | "flow";

/**
 * A closed time window `[start, stop]`.
 * `stop` is `Infinity` for open-ended windows.
 */
export interface TimeWindow {
  readonly start: UnixSeconds;
  readonly stop: UnixSeconds;
}

/** Why a delegation left the active set. */
export type SettlementReason = "completed" | "cancelled";
