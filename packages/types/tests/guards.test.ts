/**
 * Runtime type guard tests for @ubistream/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isAddress,
  normalizeAddress,
  isUnixSeconds,
  isDelegationKind,
  isEngineEvent,
} from "../src/guards.js";
import { ZERO_ADDRESS } from "../src/primitives.js";

const ALICE = "0xA11CE00000000000000000000000000000000001";

// =============================================================================
// Addresses
// =============================================================================

describe("isAddress", () => {
  it("accepts a 20-byte hex address in any case", () => {
    expect(isAddress(ALICE)).toBe(true);
    expect(isAddress(ALICE.toLowerCase())).toBe(true);
    expect(isAddress(ZERO_ADDRESS)).toBe(true);
  });

  it("rejects a missing 0x prefix", () => {
    expect(isAddress(ALICE.slice(2))).toBe(false);
  });

  it("rejects wrong length", () => {
    expect(isAddress("0x1234")).toBe(false);
    expect(isAddress(`${ALICE}0`)).toBe(false);
  });

  it("rejects non-hex characters and non-strings", () => {
    expect(isAddress("0xZZ1CE00000000000000000000000000000000001")).toBe(false);
    expect(isAddress(42)).toBe(false);
    expect(isAddress(null)).toBe(false);
  });
});

describe("normalizeAddress", () => {
  it("lower-cases a valid address", () => {
    expect(normalizeAddress(ALICE)).toBe("0xa11ce00000000000000000000000000000000001");
  });

  it("throws on an invalid address", () => {
    expect(() => normalizeAddress("alice")).toThrow('Not an address: "alice"');
  });
});

// =============================================================================
// Time
// =============================================================================

describe("isUnixSeconds", () => {
  it("accepts zero and positive integers", () => {
    expect(isUnixSeconds(0)).toBe(true);
    expect(isUnixSeconds(1_700_000_000)).toBe(true);
  });

  it("rejects fractions, negatives and non-numbers", () => {
    expect(isUnixSeconds(1.5)).toBe(false);
    expect(isUnixSeconds(-1)).toBe(false);
    expect(isUnixSeconds("100")).toBe(false);
    expect(isUnixSeconds(Number.POSITIVE_INFINITY)).toBe(false);
  });
});

// =============================================================================
// Delegations & events
// =============================================================================

describe("isDelegationKind", () => {
  it("accepts the two flavors", () => {
    expect(isDelegationKind("stream")).toBe(true);
    expect(isDelegationKind("flow")).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isDelegationKind("delegation")).toBe(false);
    expect(isDelegationKind(undefined)).toBe(false);
  });
});

describe("isEngineEvent", () => {
  const valid = {
    type: "transfer",
    timestamp: 1000,
    from: ALICE,
    to: ZERO_ADDRESS,
    amount: "5",
  };

  it("accepts a well-formed event", () => {
    expect(isEngineEvent(valid)).toBe(true);
  });

  it("rejects an unknown event type", () => {
    expect(isEngineEvent({ ...valid, type: "mint" })).toBe(false);
  });

  it("rejects a fractional timestamp", () => {
    expect(isEngineEvent({ ...valid, timestamp: 1.5 })).toBe(false);
  });

  it("rejects a missing timestamp", () => {
    const { timestamp: _omitted, ...rest } = valid;
    expect(isEngineEvent(rest)).toBe(false);
  });
});
