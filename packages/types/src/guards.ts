/**
 * Runtime Type Guards
 *
 * Narrowing functions for ubistream domain types, used at system
 * boundaries (API inputs, deserialized snapshots).
 */

import type { DelegationKind } from "./delegation.js";
import type { EngineEvent } from "./event.js";
import type { Address, UnixSeconds } from "./primitives.js";

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const DELEGATION_KINDS = new Set<string>(["stream", "flow"]);
const EVENT_TYPES = new Set<string>([
  "accrual.started",
  "accrual.consolidated",
  "accrual.removal-reported",
  "transfer",
  "burn",
  "delegation.created",
  "delegation.withdrawn",
  "delegation.cancelled",
  "config.changed",
]);

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

/**
 * Lower-case an address so that map lookups are case-insensitive.
 * Throws on anything that is not a 20-byte hex address.
 */
export function normalizeAddress(value: string): Address {
  if (!isAddress(value)) {
    throw new TypeError(`Not an address: "${value}"`);
  }
  return value.toLowerCase();
}

export function isUnixSeconds(value: unknown): value is UnixSeconds {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

export function isDelegationKind(value: unknown): value is DelegationKind {
  return typeof value === "string" && DELEGATION_KINDS.has(value);
}

export function isEngineEvent(value: unknown): value is EngineEvent {
  if (value === null || typeof value !== "object") return false;
  if (!("type" in value) || !("timestamp" in value)) return false;
  const { type, timestamp } = value;
  return typeof type === "string" && EVENT_TYPES.has(type) && isUnixSeconds(timestamp);
}
