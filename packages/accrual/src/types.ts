/**
 * @ubistream/accrual: Internal types for the accrual ledger.
 *
 * Rules:
 * - All exported types are readonly
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Address, Amount, UnixSeconds } from "@ubistream/types";

// ─── Account State ───────────────────────────────────────────────────────

/**
 * Stored state of one account.
 *
 * `accrualStartTime` is 0 when the account is not accruing. Otherwise it
 * is the instant from which unconsolidated accrual is computed; it moves
 * forward every time the account is consolidated.
 */
export interface AccountState {
  readonly balance: Amount;
  readonly accrualStartTime: UnixSeconds;
}

/** Serializable account record (amounts as decimal strings). */
export interface AccountRecord {
  readonly address: Address;
  readonly balance: string;
  readonly accrualStartTime: UnixSeconds;
}

// ─── Configuration ───────────────────────────────────────────────────────

export interface AccrualConfig {
  /** Base units accrued per second by every verified, accruing account. */
  readonly accruedPerSecond: Amount;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for accrual operations. */
export type AccrualErrorCode =
  | "NOT_VERIFIED"
  | "STILL_VERIFIED"
  | "ALREADY_ACCRUING"
  | "NOT_ACCRUING"
  | "INSUFFICIENT_BALANCE"
  | "INVALID_AMOUNT"
  | "TIME_BEFORE_CHECKPOINT"
  | "CLOCK_REGRESSION";

/**
 * Structured error from the accrual ledger.
 * Always thrown: never returns error codes silently.
 */
export class AccrualError extends Error {
  public readonly code: AccrualErrorCode;

  constructor(code: AccrualErrorCode, message: string) {
    super(message);
    this.name = "AccrualError";
    this.code = code;
  }
}
