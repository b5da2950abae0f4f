/**
 * Tests for account routes.
 *
 * Covers: account view, start-accruing, mint-accrued, report-removal.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ALICE, BOB, DAVE, T0, createTestApp, jsonRequest } from "./setup.js";
import type { TestApp } from "./setup.js";

let instance: TestApp;

beforeEach(() => {
  instance = createTestApp();
});

async function startAccruing(address: string): Promise<Response> {
  return instance.app.request(
    jsonRequest(`/api/v1/accounts/${address}/start-accruing`, "POST"),
  );
}

// =============================================================================
// POST /api/v1/accounts/:address/start-accruing
// =============================================================================

describe("POST /api/v1/accounts/:address/start-accruing", () => {
  it("starts accrual at the current time", async () => {
    const res = await startAccruing(ALICE);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: { address: ALICE, accrualStartTime: T0 },
    });
  });

  it("normalizes a mixed-case address", async () => {
    const res = await startAccruing("0xA000000000000000000000000000000000000001");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: { address: ALICE, accrualStartTime: T0 },
    });
  });

  it("returns 409 for an unverified account", async () => {
    const res = await startAccruing(DAVE);

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: { code: "NOT_VERIFIED", message: `Account "${DAVE}" is not verified` },
    });
  });

  it("returns 409 when already accruing", async () => {
    await startAccruing(ALICE);
    const res = await startAccruing(ALICE);

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: { code: "ALREADY_ACCRUING", message: `Account "${ALICE}" is already accruing` },
    });
  });

  it("returns 400 for a malformed address", async () => {
    const res = await startAccruing("not-an-address");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: "VALIDATION_ERROR",
        message: "Request validation failed",
        details: {
          issues: [{ path: "", message: "Expected a 0x-prefixed 20-byte hex address" }],
        },
      },
    });
  });
});

// =============================================================================
// GET /api/v1/accounts/:address
// =============================================================================

describe("GET /api/v1/accounts/:address", () => {
  it("reports an untouched account as empty", async () => {
    const res = await instance.app.request(jsonRequest(`/api/v1/accounts/${DAVE}`));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: {
        address: DAVE,
        settledBalance: "0",
        balance: "0",
        accruedValue: "0",
        accrualStartTime: 0,
        outgoingAccruedTotal: "0",
        activeDelegations: [],
        incomingDelegations: [],
      },
    });
  });

  it("shows live accrual split with a delegation", async () => {
    const { app, clock } = instance;
    await startAccruing(ALICE);
    await app.request(
      jsonRequest(
        "/api/v1/delegations",
        "POST",
        { kind: "stream", recipient: BOB, ratePerSecond: "100", stopTime: T0 + 3600 },
        ALICE,
      ),
    );
    clock.advance(100);

    const sender = await app.request(jsonRequest(`/api/v1/accounts/${ALICE}`));
    expect(await sender.json()).toEqual({
      data: {
        address: ALICE,
        settledBalance: "0",
        balance: "90000",
        accruedValue: "90000",
        accrualStartTime: T0,
        outgoingAccruedTotal: "10000",
        activeDelegations: [1],
        incomingDelegations: [],
      },
    });

    const recipient = await app.request(jsonRequest(`/api/v1/accounts/${BOB}`));
    expect(await recipient.json()).toEqual({
      data: {
        address: BOB,
        settledBalance: "0",
        balance: "10000",
        accruedValue: "0",
        accrualStartTime: 0,
        outgoingAccruedTotal: "0",
        activeDelegations: [],
        incomingDelegations: [1],
      },
    });
  });
});

// =============================================================================
// POST /api/v1/accounts/:address/mint-accrued
// =============================================================================

describe("POST /api/v1/accounts/:address/mint-accrued", () => {
  it("folds pending accrual into the settled balance", async () => {
    const { app, clock, engine } = instance;
    await startAccruing(ALICE);
    clock.advance(100);

    const res = await app.request(
      jsonRequest(`/api/v1/accounts/${ALICE}/mint-accrued`, "POST"),
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: { address: ALICE, minted: "100000" } });
    expect(engine.getSettledBalance(ALICE)).toBe(100000n);
    expect(engine.getAccrualStartTime(ALICE)).toBe(T0 + 100);
  });

  it("returns 409 for an account that is not accruing", async () => {
    const res = await instance.app.request(
      jsonRequest(`/api/v1/accounts/${BOB}/mint-accrued`, "POST"),
    );

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: { code: "NOT_ACCRUING", message: `Account "${BOB}" is not accruing` },
    });
  });
});

// =============================================================================
// POST /api/v1/accounts/:address/report-removal
// =============================================================================

describe("POST /api/v1/accounts/:address/report-removal", () => {
  it("pays the pending span to the reporter", async () => {
    const { app, clock, registry, engine } = instance;
    await startAccruing(ALICE);
    clock.advance(100);
    registry.setVerified(ALICE, false);

    const res = await app.request(
      jsonRequest(`/api/v1/accounts/${ALICE}/report-removal`, "POST", undefined, BOB),
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: { account: ALICE, reporter: BOB, reward: "100000" },
    });
    expect(engine.getSettledBalance(BOB)).toBe(100000n);
    expect(engine.getAccrualStartTime(ALICE)).toBe(0);
  });

  it("returns 409 while the account is still verified", async () => {
    await startAccruing(ALICE);

    const res = await instance.app.request(
      jsonRequest(`/api/v1/accounts/${ALICE}/report-removal`, "POST", undefined, BOB),
    );

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: { code: "STILL_VERIFIED", message: `Account "${ALICE}" is still verified` },
    });
  });

  it("pays the account bound to the API key, whatever the headers claim", async () => {
    const { app, clock, registry, engine } = instance;
    await startAccruing(ALICE);
    clock.advance(10);
    registry.setVerified(ALICE, false);

    const req = jsonRequest(`/api/v1/accounts/${ALICE}/report-removal`, "POST", undefined, BOB);
    req.headers.set("X-Caller-Address", DAVE);
    const res = await app.request(req);

    expect(await res.json()).toEqual({
      data: { account: ALICE, reporter: BOB, reward: "10000" },
    });
    expect(engine.getSettledBalance(DAVE)).toBe(0n);
  });
});
