/**
 * @ubistream/accrual: Deterministic accrual arithmetic.
 *
 * Rules:
 * - bigint for every value; seconds stay integral numbers
 * - Windows are closed intervals; `stop` may be Infinity
 * - Asking for a span that ends before it starts is a precondition
 *   violation and throws
 */

import type { Amount, TimeWindow, UnixSeconds } from "@ubistream/types";
import { AccrualError } from "./types.js";

// ─── Time Spans ──────────────────────────────────────────────────────────

/**
 * Throw unless `to >= from`.
 */
export function assertOrdered(from: UnixSeconds, to: UnixSeconds): void {
  if (to < from) {
    throw new AccrualError(
      "TIME_BEFORE_CHECKPOINT",
      `Query time ${String(to)} is before checkpoint ${String(from)}`,
    );
  }
}

/**
 * Value accrued at `ratePerSecond` over `[from, to]`.
 */
export function accruedOver(
  ratePerSecond: Amount,
  from: UnixSeconds,
  to: UnixSeconds,
): Amount {
  assertOrdered(from, to);
  return ratePerSecond * BigInt(to - from);
}

/**
 * Length in seconds of the intersection of `window` and `[from, to]`.
 * Zero when they are disjoint or only touch.
 */
export function overlapSeconds(
  window: TimeWindow,
  from: UnixSeconds,
  to: UnixSeconds,
): number {
  assertOrdered(from, to);
  const lo = Math.max(window.start, from);
  const hi = Math.min(window.stop, to);
  return hi > lo ? hi - lo : 0;
}

/**
 * Value a delegation of `ratePerSecond` over `window` accrues during `[from, to]`.
 */
export function shareOver(
  ratePerSecond: Amount,
  window: TimeWindow,
  from: UnixSeconds,
  to: UnixSeconds,
): Amount {
  return ratePerSecond * BigInt(overlapSeconds(window, from, to));
}

/**
 * Boundary-inclusive overlap test: `a.start <= b.stop && a.stop >= b.start`.
 * Two windows that merely touch DO overlap.
 */
export function windowsOverlap(a: TimeWindow, b: TimeWindow): boolean {
  return a.start <= b.stop && a.stop >= b.start;
}

// ─── Unit Conversion ─────────────────────────────────────────────────────

/**
 * Parse a decimal token amount into base units.
 *
 * "0.01" with decimals=18 → 10000000000000000n
 * "5" with decimals=0 → 5n
 */
export function parseUnits(amount: string, decimals: number): Amount {
  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new AccrualError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new AccrualError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the token allows ${String(decimals)}`,
    );
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Render base units as a decimal token amount.
 *
 * 10000000000000000n with decimals=18 → "0.010000000000000000"
 */
export function formatUnits(amount: Amount, decimals: number): string {
  if (decimals === 0) {
    return amount.toString();
  }

  const negative = amount < 0n;
  const abs = negative ? -amount : amount;
  const str = abs.toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;

  return negative ? `-${result}` : result;
}

/**
 * Parse a non-negative integer string of base units (snapshots, API bodies).
 */
export function parseBaseUnits(value: string): Amount {
  if (!/^\d+$/.test(value)) {
    throw new AccrualError("INVALID_AMOUNT", `Invalid base-unit amount: "${value}"`);
  }
  return BigInt(value);
}
