/**
 * Tests for UbiEngine: accrual, transfers, governance, events, snapshots.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { AccrualError, InMemoryRegistry, ManualClock } from "@ubistream/accrual";
import { ZERO_ADDRESS } from "@ubistream/types";
import type { JournaledEvent } from "@ubistream/types";
import type { EngineSnapshot } from "../src/types.js";
import { UbiEngine } from "../src/engine.js";
import { DelegationError } from "../src/types.js";
import type { TestEngine } from "./helpers.js";
import {
  ALICE,
  BOB,
  CAROL,
  DAVE,
  GOVERNOR,
  RATE,
  T0,
  createTestEngine,
  thrownBy,
} from "./helpers.js";

describe("UbiEngine accrual", () => {
  let t: TestEngine;

  beforeEach(() => {
    t = createTestEngine();
  });

  // ─── Accrual ─────────────────────────────────────────────────────────

  describe("startAccruing / getAccruedValue", () => {
    it("accrues rate × elapsed seconds", () => {
      t.engine.startAccruing(ALICE);
      t.clock.set(T0 + 3600);

      expect(t.engine.getAccrualStartTime(ALICE)).toBe(T0);
      expect(t.engine.getAccruedValue(ALICE)).toBe(3600n * RATE);
      expect(t.engine.getBalance(ALICE)).toBe(3600n * RATE);
      expect(t.engine.getSettledBalance(ALICE)).toBe(0n);
    });

    it("returns identical values for repeated queries at the same time", () => {
      t.engine.startAccruing(ALICE);
      t.clock.set(T0 + 77);
      expect(t.engine.getAccruedValue(ALICE, T0 + 50)).toBe(t.engine.getAccruedValue(ALICE, T0 + 50));
      expect(t.engine.getAccruedValue(ALICE, T0 + 50)).toBe(50_000n);
    });

    it("rejects a second start and unverified accounts", () => {
      t.engine.startAccruing(ALICE);
      expect(thrownBy(() => t.engine.startAccruing(ALICE))).toMatchObject({ code: "ALREADY_ACCRUING" });
      const err = thrownBy(() => t.engine.startAccruing(DAVE));
      expect(err).toBeInstanceOf(AccrualError);
      expect(err).toMatchObject({ code: "NOT_VERIFIED" });
      expect(t.engine.readEvents()).toHaveLength(1);
    });

    it("freezes while the account is unverified", () => {
      t.engine.startAccruing(ALICE);
      t.clock.set(T0 + 100);
      t.registry.setVerified(ALICE, false);
      expect(t.engine.getAccruedValue(ALICE)).toBe(0n);
      expect(t.engine.getBalance(ALICE)).toBe(0n);
    });

    it("rejects query times before the checkpoint", () => {
      t.clock.set(T0 + 10);
      t.engine.startAccruing(ALICE);
      expect(thrownBy(() => t.engine.getAccruedValue(ALICE, T0))).toMatchObject({
        code: "TIME_BEFORE_CHECKPOINT",
      });
    });
  });

  // ─── Removal ─────────────────────────────────────────────────────────

  describe("reportRemoval", () => {
    it("pays the pending span to the reporter and stops accrual", () => {
      t.engine.startAccruing(ALICE);
      t.clock.set(T0 + 100);
      t.registry.setVerified(ALICE, false);

      expect(t.engine.reportRemoval(BOB, ALICE)).toBe(100_000n);
      expect(t.engine.getSettledBalance(BOB)).toBe(100_000n);
      expect(t.engine.getAccrualStartTime(ALICE)).toBe(0);
      expect(t.engine.readEvents(2)).toEqual([
        {
          sequence: 2,
          event: {
            type: "accrual.removal-reported",
            timestamp: T0 + 100,
            account: ALICE,
            reporter: BOB,
            reward: "100000",
          },
        },
      ]);
    });

    it("leaves delegations their share of the span", () => {
      t.engine.startAccruing(ALICE);
      const id = t.engine.createStream(ALICE, CAROL, 400n, T0 + 10, T0 + 1000);
      t.clock.set(T0 + 110);
      t.registry.setVerified(ALICE, false);

      expect(t.engine.reportRemoval(BOB, ALICE)).toBe(70_000n);
      expect(t.engine.balanceOfDelegation(id)).toBe(40_000n);
      t.clock.set(T0 + 500);
      expect(t.engine.balanceOfDelegation(id)).toBe(40_000n);
    });

    it("requires the account to be unverified and accruing", () => {
      t.engine.startAccruing(ALICE);
      expect(thrownBy(() => t.engine.reportRemoval(BOB, ALICE))).toMatchObject({ code: "STILL_VERIFIED" });
      expect(thrownBy(() => t.engine.reportRemoval(BOB, DAVE))).toMatchObject({ code: "NOT_ACCRUING" });
    });
  });

  // ─── Minting ─────────────────────────────────────────────────────────

  describe("mintAccrued", () => {
    it("moves pending accrual into the settled balance", () => {
      t.engine.startAccruing(ALICE);
      t.clock.set(T0 + 50);

      expect(t.engine.mintAccrued(ALICE)).toBe(50_000n);
      expect(t.engine.getSettledBalance(ALICE)).toBe(50_000n);
      expect(t.engine.getAccrualStartTime(ALICE)).toBe(T0 + 50);
      expect(t.engine.mintAccrued(ALICE)).toBe(0n);
      expect(t.engine.readEvents().map((e) => e.event.type)).toEqual([
        "accrual.started",
        "accrual.consolidated",
      ]);
    });

    it("requires a verified, accruing account", () => {
      expect(thrownBy(() => t.engine.mintAccrued(DAVE))).toMatchObject({ code: "NOT_VERIFIED" });
      expect(thrownBy(() => t.engine.mintAccrued(BOB))).toMatchObject({ code: "NOT_ACCRUING" });
    });
  });

  // ─── Transfers ───────────────────────────────────────────────────────

  describe("transfer / burn", () => {
    it("settles the sender before moving value", () => {
      t.engine.startAccruing(ALICE);
      t.clock.set(T0 + 10);
      t.engine.transfer(ALICE, DAVE, 4000n);

      expect(t.engine.getSettledBalance(ALICE)).toBe(6000n);
      expect(t.engine.getSettledBalance(DAVE)).toBe(4000n);
      expect(t.engine.getAccrualStartTime(ALICE)).toBe(T0 + 10);
      expect(t.engine.readEvents(2).map((e) => e.event)).toEqual([
        { type: "accrual.consolidated", timestamp: T0 + 10, account: ALICE, credited: "10000", delegated: "0" },
        { type: "transfer", timestamp: T0 + 10, from: ALICE, to: DAVE, amount: "4000" },
      ]);
    });

    it("spends incoming delegation balances", () => {
      t.engine.startAccruing(ALICE);
      const id = t.engine.createFlow(ALICE, BOB, 400n);
      t.clock.set(T0 + 100);

      expect(t.engine.getBalance(BOB)).toBe(40_000n);
      t.engine.transfer(BOB, DAVE, 30_000n);

      expect(t.engine.getSettledBalance(BOB)).toBe(10_000n);
      expect(t.engine.getSettledBalance(DAVE)).toBe(30_000n);
      expect(t.engine.getSettledBalance(ALICE)).toBe(60_000n);
      expect(t.engine.balanceOfDelegation(id)).toBe(0n);
    });

    it("changes nothing when the balance is short", () => {
      t.engine.startAccruing(ALICE);
      t.clock.set(T0 + 10);
      const err = thrownBy(() => t.engine.transfer(ALICE, DAVE, 10_001n));

      expect(err).toBeInstanceOf(AccrualError);
      expect(err).toMatchObject({ code: "INSUFFICIENT_BALANCE" });
      expect(t.engine.getAccrualStartTime(ALICE)).toBe(T0);
      expect(t.engine.getSettledBalance(ALICE)).toBe(0n);
      expect(t.engine.readEvents()).toHaveLength(1);
    });

    it("rejects non-positive amounts and the zero address", () => {
      expect(thrownBy(() => t.engine.transfer(ALICE, DAVE, 0n))).toMatchObject({ code: "INVALID_AMOUNT" });
      expect(thrownBy(() => t.engine.burn(ALICE, -1n))).toMatchObject({ code: "INVALID_AMOUNT" });
      const err = thrownBy(() => t.engine.transfer(ALICE, ZERO_ADDRESS, 1n));
      expect(err).toBeInstanceOf(DelegationError);
      expect(err).toMatchObject({ code: "INVALID_RECIPIENT" });
    });

    it("burns from the initial supply", () => {
      const { engine } = createTestEngine({ config: { initialSupply: 5000n } });
      expect(engine.getSettledBalance(GOVERNOR)).toBe(5000n);

      engine.burn(GOVERNOR, 2000n);
      expect(engine.getSettledBalance(GOVERNOR)).toBe(3000n);
      expect(thrownBy(() => engine.burn(GOVERNOR, 4000n))).toMatchObject({ code: "INSUFFICIENT_BALANCE" });
    });
  });

  // ─── Governance ──────────────────────────────────────────────────────

  describe("governance", () => {
    it("lets only the governor change the delegation cap", () => {
      expect(thrownBy(() => t.engine.setMaxDelegationsAllowed(ALICE, 5))).toMatchObject({
        code: "UNAUTHORIZED",
      });
      expect(thrownBy(() => t.engine.setMaxDelegationsAllowed(GOVERNOR, 0))).toMatchObject({
        code: "INVALID_CONFIG",
      });
      expect(thrownBy(() => t.engine.setMaxDelegationsAllowed(GOVERNOR, 1.5))).toMatchObject({
        code: "INVALID_CONFIG",
      });

      t.engine.setMaxDelegationsAllowed(GOVERNOR, 3);
      expect(t.engine.maxDelegationsAllowed).toBe(3);
      expect(t.engine.readEvents().map((e) => e.event)).toEqual([
        { type: "config.changed", timestamp: T0, key: "maxDelegationsAllowed", value: "3", changedBy: GOVERNOR },
      ]);
    });

    it("samples the clock once per governance operation", () => {
      const { engine, clock } = createTestEngine({ autoAdvance: 1 });
      engine.setMaxDelegationsAllowed(GOVERNOR, 4);
      engine.changeGovernor(GOVERNOR, ALICE);

      expect(clock.now()).toBe(T0 + 2);
      expect(engine.readEvents().map((e) => e.event.timestamp)).toEqual([T0 + 1, T0 + 2]);
    });

    it("hands governance over", () => {
      t.engine.changeGovernor(GOVERNOR, ALICE);
      expect(t.engine.governor).toBe(ALICE);
      expect(thrownBy(() => t.engine.changeGovernor(GOVERNOR, BOB))).toMatchObject({ code: "UNAUTHORIZED" });
      expect(thrownBy(() => t.engine.changeGovernor(ALICE, ZERO_ADDRESS))).toMatchObject({
        code: "INVALID_CONFIG",
      });
    });

    it("swaps the registry gateway", () => {
      t.engine.changeRegistry(GOVERNOR, new InMemoryRegistry([DAVE]));
      t.engine.startAccruing(DAVE);
      expect(thrownBy(() => t.engine.startAccruing(ALICE))).toMatchObject({ code: "NOT_VERIFIED" });
    });

    it("validates its configuration", () => {
      expect(thrownBy(() => createTestEngine({ config: { maxDelegationsAllowed: 0 } }))).toMatchObject({
        code: "INVALID_CONFIG",
      });
      expect(thrownBy(() => createTestEngine({ config: { accruedPerSecond: 0n } }))).toMatchObject({
        code: "INVALID_CONFIG",
      });
      expect(thrownBy(() => createTestEngine({ config: { initialSupply: -1n } }))).toMatchObject({
        code: "INVALID_CONFIG",
      });
    });
  });

  // ─── Events ──────────────────────────────────────────────────────────

  describe("events", () => {
    it("delivers committed events to subscribers in sequence", () => {
      const seen: JournaledEvent[] = [];
      t.engine.subscribe((entry) => seen.push(entry));

      t.engine.startAccruing(ALICE);
      t.engine.startAccruing(BOB);

      expect(seen.map((e) => e.sequence)).toEqual([1, 2]);
      expect(seen[1]?.event).toEqual({ type: "accrual.started", timestamp: T0, account: BOB });
    });

    it("commits and keeps notifying when a listener throws", () => {
      const onListenerError = vi.fn();
      const { engine } = createTestEngine({ onListenerError });
      const failure = new Error("listener failed");
      const seen: JournaledEvent[] = [];
      engine.subscribe(() => {
        throw failure;
      });
      engine.subscribe((entry) => seen.push(entry));

      engine.startAccruing(ALICE);

      const entry = { sequence: 1, event: { type: "accrual.started", timestamp: T0, account: ALICE } };
      expect(engine.getAccrualStartTime(ALICE)).toBe(T0);
      expect(seen).toEqual([entry]);
      expect(onListenerError).toHaveBeenCalledTimes(1);
      expect(onListenerError).toHaveBeenCalledWith(failure, entry);
    });

    it("rejects mutations from inside a listener but allows views", () => {
      const errors: unknown[] = [];
      const views: bigint[] = [];
      t.engine.subscribe(() => {
        views.push(t.engine.getAccruedValue(ALICE));
        errors.push(thrownBy(() => t.engine.startAccruing(BOB)));
      });

      t.engine.startAccruing(ALICE);

      expect(views).toEqual([0n]);
      expect(errors[0]).toMatchObject({ code: "REENTRANT_CALL" });
      expect(t.engine.getAccrualStartTime(BOB)).toBe(0);
      expect(t.engine.getAccrualStartTime(ALICE)).toBe(T0);
    });
  });

  // ─── Snapshot ────────────────────────────────────────────────────────

  describe("snapshot", () => {
    it("restores balances, delegations and history", () => {
      t.engine.startAccruing(ALICE);
      const id = t.engine.createStream(ALICE, BOB, 250n, T0 + 10, T0 + 110);
      t.clock.set(T0 + 60);
      t.engine.withdraw(BOB, [id]);
      t.clock.set(T0 + 80);

      const snap = t.engine.snapshot();
      const restored = UbiEngine.fromSnapshot(snap, { registry: t.registry, clock: t.clock });

      expect(restored.snapshot()).toEqual(snap);
      expect(restored.getBalance(ALICE)).toBe(t.engine.getBalance(ALICE));
      expect(restored.balanceOfDelegation(id)).toBe(5000n);
      expect(restored.getDelegation(id)).toEqual(t.engine.getDelegation(id));
      expect(restored.readEvents()).toEqual(t.engine.readEvents());
    });

    it("rejects snapshots with unknown delegation kinds or events", () => {
      t.engine.startAccruing(ALICE);
      t.engine.createFlow(ALICE, BOB, 1n);
      const json = JSON.stringify(t.engine.snapshot());
      const deps = { registry: t.registry, clock: t.clock };

      const badKind: EngineSnapshot = JSON.parse(json.replace('"kind":"flow"', '"kind":"pipe"'));
      expect(thrownBy(() => UbiEngine.fromSnapshot(badKind, deps))).toMatchObject({
        code: "INVALID_CONFIG",
        message: 'Delegation 1 has unknown kind "pipe"',
      });

      const badEvent: EngineSnapshot = JSON.parse(json.replace('"type":"accrual.started"', '"type":"mint"'));
      expect(thrownBy(() => UbiEngine.fromSnapshot(badEvent, deps))).toMatchObject({
        code: "INVALID_CONFIG",
        message: "Journal entry 1 is not an engine event",
      });
    });

    it("does not mint the initial supply again", () => {
      const clock = new ManualClock(T0);
      const registry = new InMemoryRegistry();
      const engine = new UbiEngine(
        { accruedPerSecond: RATE, maxDelegationsAllowed: 2, governor: GOVERNOR, initialSupply: 10n },
        { registry, clock },
      );
      const restored = UbiEngine.fromSnapshot(engine.snapshot(), { registry, clock });
      expect(restored.getSettledBalance(GOVERNOR)).toBe(10n);
      expect(restored.snapshot().config.engineAddress).toBeNull();
    });
  });
});
