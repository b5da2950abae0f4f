/**
 * @ubistream/delegation: Delegation flavors.
 *
 * A closed set: every delegation is either a `stream` (fixed window,
 * paid to the recipient on the recipient's request) or a `flow`
 * (open-ended, either party may trigger a payout). Flavor behavior is
 * looked up by the record's `kind`; records carry no behavior.
 */

import { isUnixSeconds } from "@ubistream/types";
import type { Address, DelegationKind, TimeWindow, UnixSeconds } from "@ubistream/types";
import type { CreateDelegationParams, DelegationRecord } from "./types.js";
import { DelegationError } from "./types.js";

/** A window as requested, after defaults are applied. */
export interface ResolvedWindow {
  readonly startTime: UnixSeconds;
  readonly stopTime: UnixSeconds | null;
  readonly cancellable: boolean;
}

export interface DelegationFlavor {
  readonly kind: DelegationKind;

  /**
   * Apply defaults and check the requested window against `now`.
   * Throws STARTS_IN_PAST, then INVALID_WINDOW.
   */
  validateWindow(params: CreateDelegationParams, now: UnixSeconds): ResolvedWindow;

  canWithdraw(record: DelegationRecord, caller: Address): boolean;

  canCancel(record: DelegationRecord): boolean;

  /** Whether the window has fully elapsed at `now`. */
  isComplete(record: DelegationRecord, now: UnixSeconds): boolean;
}

/**
 * Window of a record, with an open stop mapped to +∞.
 */
export function delegationWindow(record: DelegationRecord): TimeWindow {
  return {
    start: record.startTime,
    stop: record.stopTime ?? Number.POSITIVE_INFINITY,
  };
}

/**
 * Reject requested times that are not whole, non-negative seconds.
 * Runs before any other check on a delegation request.
 */
export function assertWindowTimes(params: CreateDelegationParams): void {
  const { startTime, stopTime } = params;
  if (startTime !== undefined && !isUnixSeconds(startTime)) {
    throw new DelegationError("INVALID_WINDOW", `Start time must be whole unix seconds, got ${String(startTime)}`);
  }
  if (stopTime !== undefined && stopTime !== null && !isUnixSeconds(stopTime)) {
    throw new DelegationError("INVALID_WINDOW", `Stop time must be whole unix seconds, got ${String(stopTime)}`);
  }
}

function assertNotInPast(startTime: UnixSeconds, now: UnixSeconds): void {
  if (startTime < now) {
    throw new DelegationError(
      "STARTS_IN_PAST",
      `Start time ${String(startTime)} is before now (${String(now)})`,
    );
  }
}

// ─── Stream ──────────────────────────────────────────────────────────────

const streamFlavor: DelegationFlavor = {
  kind: "stream",

  validateWindow(params, now) {
    const startTime = params.startTime ?? now;
    assertNotInPast(startTime, now);

    const stopTime = params.stopTime;
    if (stopTime === undefined || stopTime === null || stopTime <= startTime) {
      throw new DelegationError(
        "INVALID_WINDOW",
        `Stream stop time must be after start time ${String(startTime)}, got ${String(stopTime)}`,
      );
    }

    return { startTime, stopTime, cancellable: params.cancellable ?? true };
  },

  canWithdraw(record, caller) {
    return caller === record.recipient;
  },

  canCancel(record) {
    return record.cancellable;
  },

  isComplete(record, now) {
    return record.stopTime !== null && now >= record.stopTime;
  },
};

// ─── Flow ────────────────────────────────────────────────────────────────

const flowFlavor: DelegationFlavor = {
  kind: "flow",

  validateWindow(params, now) {
    const startTime = params.startTime ?? now;
    assertNotInPast(startTime, now);

    if (params.stopTime !== undefined && params.stopTime !== null) {
      throw new DelegationError(
        "INVALID_WINDOW",
        `Flows are open-ended; stop time ${String(params.stopTime)} is not allowed`,
      );
    }

    return { startTime, stopTime: null, cancellable: true };
  },

  canWithdraw(record, caller) {
    return caller === record.recipient || caller === record.sender;
  },

  canCancel() {
    return true;
  },

  isComplete() {
    return false;
  },
};

const FLAVORS: Readonly<Record<DelegationKind, DelegationFlavor>> = {
  stream: streamFlavor,
  flow: flowFlavor,
};

export function flavorOf(kind: DelegationKind): DelegationFlavor {
  return FLAVORS[kind];
}
