/**
 * Shared fixtures and helpers for delegation tests.
 */

import { InMemoryRegistry, ManualClock } from "@ubistream/accrual";
import { UbiEngine } from "../src/engine.js";
import type { ListenerErrorHandler } from "../src/event-journal.js";
import type { EngineConfig } from "../src/types.js";

// =============================================================================
// Addresses
// =============================================================================

export const GOVERNOR = "0x9000000000000000000000000000000000000009";
export const ENGINE = "0xe000000000000000000000000000000000000001";
export const ALICE = "0xa000000000000000000000000000000000000001";
export const BOB = "0xb000000000000000000000000000000000000002";
export const CAROL = "0xc000000000000000000000000000000000000003";
export const DAVE = "0xd000000000000000000000000000000000000004";

/** Start of every test timeline. */
export const T0 = 1_700_000_000;

/** Base accrual rate used by most tests (base units per second). */
export const RATE = 1000n;

// =============================================================================
// Engine Factory
// =============================================================================

export interface TestEngine {
  readonly engine: UbiEngine;
  readonly clock: ManualClock;
  readonly registry: InMemoryRegistry;
}

export function createTestEngine(
  options: {
    autoAdvance?: number;
    verified?: readonly string[];
    config?: Partial<EngineConfig>;
    onListenerError?: ListenerErrorHandler;
  } = {},
): TestEngine {
  const clock = new ManualClock(T0, { autoAdvance: options.autoAdvance ?? 0 });
  const registry = new InMemoryRegistry(options.verified ?? [ALICE, BOB, CAROL]);
  const engine = new UbiEngine(
    {
      accruedPerSecond: RATE,
      maxDelegationsAllowed: 10,
      governor: GOVERNOR,
      engineAddress: ENGINE,
      ...options.config,
    },
    {
      registry,
      clock,
      ...(options.onListenerError !== undefined ? { onListenerError: options.onListenerError } : {}),
    },
  );
  return { engine, clock, registry };
}

// =============================================================================
// Assertions
// =============================================================================

/**
 * Run `fn` and return what it threw. Fails the test if nothing was thrown.
 */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}
