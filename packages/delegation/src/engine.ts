/**
 * UbiEngine: Top-level coordinator for accrual and delegation.
 *
 * Composes:
 * - AccrualLedger: per-account balances and lazy accrual
 * - DelegationRegistry: live delegations, tombstones and party indices
 * - OverlapValidator: recipient exclusivity, circularity and capacity
 * - SettlementEngine: splitting spans and paying out delegations
 * - EventJournal: committed events, in order
 *
 * Every mutating operation runs inside the re-entrancy guard, samples
 * the clock once, asks the registry gateway everything it needs before
 * the first write, and journals its events after the last one.
 */

import {
  AccountBook,
  AccrualError,
  AccrualLedger,
  SystemClock,
  createOperationContext,
  parseBaseUnits,
} from "@ubistream/accrual";
import type { Clock, OperationContext, RegistryGateway } from "@ubistream/accrual";
import { ZERO_ADDRESS, isDelegationKind, isEngineEvent, isUnixSeconds } from "@ubistream/types";
import type {
  Address,
  Amount,
  DelegationId,
  EngineEvent,
  JournaledEvent,
  UnixSeconds,
} from "@ubistream/types";
import { DelegationRegistry } from "./delegation-registry.js";
import { EventJournal } from "./event-journal.js";
import type { EventJournalOptions, EventListener, Subscription } from "./event-journal.js";
import { assertWindowTimes, flavorOf } from "./flavors.js";
import { OperationGuard } from "./operation-guard.js";
import { OverlapValidator } from "./overlap-validator.js";
import { SettlementEngine } from "./settlement.js";
import type {
  CancellationResult,
  CreateDelegationParams,
  DelegationRecord,
  DelegationState,
  EngineConfig,
  EngineDependencies,
  EngineSnapshot,
  WithdrawalResult,
} from "./types.js";
import { DelegationError } from "./types.js";

/** Stored state handed to the constructor when restoring a snapshot. */
interface RestoredState {
  readonly accounts: AccountBook;
  readonly delegations: DelegationRegistry;
}

// =============================================================================
// UbiEngine
// =============================================================================

export class UbiEngine {
  private readonly ledger: AccrualLedger;
  private readonly delegations: DelegationRegistry;
  private readonly validator: OverlapValidator;
  private readonly settlement: SettlementEngine;
  private readonly journal: EventJournal;
  private readonly clock: Clock;
  private readonly guard = new OperationGuard();
  private readonly engineAddress: Address | null;

  private registry: RegistryGateway;
  private maxDelegations: number;
  private governorAddress: Address;

  constructor(config: EngineConfig, deps: EngineDependencies, restored?: RestoredState) {
    assertPositiveInteger(config.maxDelegationsAllowed);
    if (config.accruedPerSecond <= 0n) {
      throw new DelegationError(
        "INVALID_CONFIG",
        `accruedPerSecond must be positive, got ${config.accruedPerSecond.toString()}`,
      );
    }
    const initialSupply = config.initialSupply ?? 0n;
    if (initialSupply < 0n) {
      throw new DelegationError(
        "INVALID_CONFIG",
        `initialSupply must not be negative, got ${initialSupply.toString()}`,
      );
    }

    this.ledger = new AccrualLedger(
      { accruedPerSecond: config.accruedPerSecond },
      restored?.accounts ?? new AccountBook(),
    );
    this.delegations = restored?.delegations ?? new DelegationRegistry();
    this.validator = new OverlapValidator(this.delegations);
    this.settlement = new SettlementEngine(this.ledger, this.delegations);
    this.journal = deps.journal ?? new EventJournal([], journalOptions(deps));
    this.clock = deps.clock ?? new SystemClock();
    this.registry = deps.registry;
    this.maxDelegations = config.maxDelegationsAllowed;
    this.governorAddress = config.governor;
    this.engineAddress = config.engineAddress ?? null;

    if (restored === undefined && initialSupply > 0n) {
      this.ledger.accounts.credit(config.governor, initialSupply);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Configuration
  // ───────────────────────────────────────────────────────────────────────

  get accruedPerSecond(): Amount {
    return this.ledger.accruedPerSecond;
  }

  get maxDelegationsAllowed(): number {
    return this.maxDelegations;
  }

  get governor(): Address {
    return this.governorAddress;
  }

  setMaxDelegationsAllowed(caller: Address, n: number): void {
    this.guard.run("setMaxDelegationsAllowed", () => {
      const now = this.clock.transactionTime();
      this.assertGovernor(caller);
      assertPositiveInteger(n);
      this.maxDelegations = n;
      this.commit([this.configChanged("maxDelegationsAllowed", String(n), caller, now)]);
    });
  }

  changeRegistry(caller: Address, registry: RegistryGateway): void {
    this.guard.run("changeRegistry", () => {
      const now = this.clock.transactionTime();
      this.assertGovernor(caller);
      this.registry = registry;
      this.commit([this.configChanged("registry", "replaced", caller, now)]);
    });
  }

  changeGovernor(caller: Address, next: Address): void {
    this.guard.run("changeGovernor", () => {
      const now = this.clock.transactionTime();
      this.assertGovernor(caller);
      if (next === ZERO_ADDRESS) {
        throw new DelegationError("INVALID_CONFIG", "Governor cannot be the zero address");
      }
      this.governorAddress = next;
      this.commit([this.configChanged("governor", next, caller, now)]);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Accrual
  // ───────────────────────────────────────────────────────────────────────

  startAccruing(account: Address): void {
    this.guard.run("startAccruing", () => {
      const ctx = this.transactionContext([account]);
      this.ledger.startAccruing(account, ctx);
      this.commit([{ type: "accrual.started", timestamp: ctx.now, account }]);
    });
  }

  /**
   * Stop an unverified account accruing and pay its pending span
   * (less what belongs to its delegations) to the reporter.
   *
   * @returns The reporter's reward
   */
  reportRemoval(reporter: Address, account: Address): Amount {
    return this.guard.run("reportRemoval", () => {
      const ctx = this.transactionContext([account]);
      this.ledger.assertRemovable(account, ctx);
      const event = this.settlement.settleRemoval(account, reporter, ctx);
      this.commit([event]);
      return BigInt(event.reward);
    });
  }

  /**
   * Fold an account's pending accrual into its settled balance.
   *
   * @returns The amount credited
   */
  mintAccrued(account: Address): Amount {
    return this.guard.run("mintAccrued", () => {
      const ctx = this.transactionContext([account]);
      if (!ctx.isVerified(account)) {
        throw new AccrualError("NOT_VERIFIED", `Account "${account}" is not verified`);
      }
      if (!this.ledger.isAccruing(account)) {
        throw new AccrualError("NOT_ACCRUING", `Account "${account}" is not accruing`);
      }
      const event = this.settlement.consolidate(account, ctx);
      if (event === null) {
        return 0n;
      }
      this.commit([event]);
      return BigInt(event.credited);
    });
  }

  /**
   * Unconsolidated accrual the account keeps for itself at `asOf`:
   * base accrual less the live share of its outgoing delegations.
   */
  getAccruedValue(account: Address, asOf?: UnixSeconds): Amount {
    const ctx = this.viewContext(asOf);
    return this.ledger.computeAccrued(account, ctx) - this.settlement.liveOutgoing(account, ctx);
  }

  /**
   * Settled balance + own live accrual + available incoming delegations.
   */
  getBalance(account: Address, asOf?: UnixSeconds): Amount {
    const ctx = this.viewContext(asOf);
    return this.spendable(account, ctx);
  }

  getSettledBalance(account: Address): Amount {
    return this.ledger.getAccount(account).balance;
  }

  /** 0 when the account is not accruing. */
  getAccrualStartTime(account: Address): UnixSeconds {
    return this.ledger.getAccount(account).accrualStartTime;
  }

  transfer(from: Address, to: Address, amount: Amount): void {
    this.guard.run("transfer", () => {
      assertPositiveAmount(amount);
      if (to === ZERO_ADDRESS) {
        throw new DelegationError("INVALID_RECIPIENT", "Cannot transfer to the zero address");
      }
      const { ctx, events } = this.settleForSpending(from, amount);
      this.ledger.accounts.debit(from, amount);
      this.ledger.accounts.credit(to, amount);
      events.push({ type: "transfer", timestamp: ctx.now, from, to, amount: amount.toString() });
      this.commit(events);
    });
  }

  burn(from: Address, amount: Amount): void {
    this.guard.run("burn", () => {
      assertPositiveAmount(amount);
      const { ctx, events } = this.settleForSpending(from, amount);
      this.ledger.accounts.debit(from, amount);
      events.push({ type: "burn", timestamp: ctx.now, account: from, amount: amount.toString() });
      this.commit(events);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Delegations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Redirect part of the sender's accrual rate to a recipient.
   *
   * @returns The new delegation's id
   */
  createDelegation(sender: Address, params: CreateDelegationParams): DelegationId {
    return this.guard.run("createDelegation", () => {
      assertWindowTimes(params);
      const ctx = this.transactionContext([sender]);
      const { recipient, ratePerSecond } = params;

      if (!ctx.isVerified(sender) || !this.ledger.isAccruing(sender)) {
        throw new DelegationError(
          "NOT_ELIGIBLE",
          `Sender "${sender}" must be verified and accruing`,
        );
      }
      if (recipient === sender || recipient === ZERO_ADDRESS || recipient === this.engineAddress) {
        throw new DelegationError("INVALID_RECIPIENT", `Cannot delegate to "${recipient}"`);
      }
      if (ratePerSecond <= 0n) {
        throw new DelegationError("ZERO_RATE", "Delegation rate must be positive");
      }

      const flavor = flavorOf(params.kind);
      const resolved = flavor.validateWindow(params, ctx.now);

      if (ratePerSecond > this.ledger.accruedPerSecond) {
        throw new DelegationError(
          "RATE_EXCEEDS_BASE",
          `Rate ${ratePerSecond.toString()} exceeds base rate ${this.ledger.accruedPerSecond.toString()}`,
        );
      }
      if (this.delegations.activeCount(sender) >= this.maxDelegations) {
        throw new DelegationError(
          "TOO_MANY_DELEGATIONS",
          `Sender "${sender}" already has ${String(this.maxDelegations)} active delegations`,
        );
      }

      this.validator.validate(
        {
          sender,
          recipient,
          ratePerSecond,
          window: {
            start: resolved.startTime,
            stop: resolved.stopTime ?? Number.POSITIVE_INFINITY,
          },
        },
        this.ledger.accruedPerSecond,
      );

      const record = this.delegations.add({
        kind: params.kind,
        sender,
        recipient,
        ratePerSecond,
        startTime: resolved.startTime,
        stopTime: resolved.stopTime,
        cancellable: resolved.cancellable,
        createdAt: ctx.now,
      });

      this.commit([
        {
          type: "delegation.created",
          timestamp: ctx.now,
          id: record.id,
          kind: record.kind,
          sender,
          recipient,
          ratePerSecond: ratePerSecond.toString(),
          startTime: record.startTime,
          stopTime: record.stopTime,
          cancellable: record.cancellable,
        },
      ]);
      return record.id;
    });
  }

  createStream(
    sender: Address,
    recipient: Address,
    ratePerSecond: Amount,
    startTime: UnixSeconds,
    stopTime: UnixSeconds,
    cancellable = true,
  ): DelegationId {
    return this.createDelegation(sender, {
      kind: "stream",
      recipient,
      ratePerSecond,
      startTime,
      stopTime,
      cancellable,
    });
  }

  /**
   * Open-ended delegation, starting now unless `startTime` is given.
   */
  createFlow(
    sender: Address,
    recipient: Address,
    ratePerSecond: Amount,
    startTime?: UnixSeconds,
  ): DelegationId {
    return this.createDelegation(sender, {
      kind: "flow",
      recipient,
      ratePerSecond,
      ...(startTime !== undefined ? { startTime } : {}),
    });
  }

  getDelegation(id: DelegationId): DelegationState {
    return this.delegations.state(id);
  }

  balanceOfDelegation(id: DelegationId, asOf?: UnixSeconds): Amount {
    const record = this.delegations.require(id);
    return this.settlement.availableOf(record, this.viewContext(asOf));
  }

  /**
   * Withdraw the full available balance of each delegation. Duplicate
   * ids are paid once.
   */
  withdraw(caller: Address, ids: readonly DelegationId[]): readonly WithdrawalResult[] {
    return this.guard.run("withdraw", () => {
      const unique = [...new Set(ids)];
      if (unique.length === 0) {
        throw new DelegationError("NOTHING_TO_WITHDRAW", "No delegation ids given");
      }

      const records = unique.map((id) => this.requireWithdrawable(id, caller));
      const ctx = this.transactionContext(records.map((r) => r.sender));

      for (const record of records) {
        const available = this.settlement.availableOf(record, ctx);
        if (available === 0n && !flavorOf(record.kind).isComplete(record, ctx.now)) {
          throw new DelegationError(
            "NOTHING_TO_WITHDRAW",
            `Delegation ${String(record.id)} has nothing to withdraw`,
          );
        }
      }

      const events = this.consolidateAll(records.map((r) => r.sender), ctx);
      const results = records.map((r): WithdrawalResult => {
        const record = this.delegations.require(r.id);
        const amount = this.settlement.availableOf(record, ctx);
        const event = this.settlement.payOut(record, amount, ctx);
        events.push(event);
        return { id: record.id, recipient: record.recipient, amount, completed: event.completed };
      });

      this.commit(events);
      return results;
    });
  }

  /**
   * Withdraw part of a delegation's available balance.
   */
  withdrawAmount(caller: Address, id: DelegationId, amount: Amount): WithdrawalResult {
    return this.guard.run("withdrawAmount", () => {
      assertPositiveAmount(amount);
      const pending = this.requireWithdrawable(id, caller);
      const ctx = this.transactionContext([pending.sender]);

      const available = this.settlement.availableOf(pending, ctx);
      if (amount > available) {
        throw new DelegationError(
          "AMOUNT_EXCEEDS_AVAILABLE",
          `Delegation ${String(id)} has ${available.toString()} available, requested ${amount.toString()}`,
        );
      }

      const events = this.consolidateAll([pending.sender], ctx);
      const record = this.delegations.require(id);
      const event = this.settlement.payOut(record, amount, ctx);
      events.push(event);

      this.commit(events);
      return { id, recipient: record.recipient, amount, completed: event.completed };
    });
  }

  /**
   * Cancel a delegation: pay the recipient what it has earned, settle
   * the sender at the same instant, and free the delegated capacity.
   */
  cancelDelegation(caller: Address, id: DelegationId): CancellationResult {
    return this.guard.run("cancelDelegation", () => {
      const pending = this.delegations.require(id);
      if (caller !== pending.sender && caller !== pending.recipient) {
        throw new DelegationError(
          "UNAUTHORIZED",
          `"${caller}" is not a party to delegation ${String(id)}`,
        );
      }
      if (!flavorOf(pending.kind).canCancel(pending)) {
        throw new DelegationError("NOT_CANCELLABLE", `Delegation ${String(id)} is not cancellable`);
      }

      const ctx = this.transactionContext([pending.sender]);
      const events: EngineEvent[] = [];
      let payout = 0n;

      if (ctx.now > pending.startTime) {
        events.push(...this.consolidateAll([pending.sender], ctx));
        const record = this.delegations.require(id);
        payout = this.settlement.availableOf(record, ctx);
        this.ledger.accounts.credit(record.recipient, payout);
      }
      this.delegations.settle(id, "cancelled", ctx.now);

      events.push({
        type: "delegation.cancelled",
        timestamp: ctx.now,
        id,
        sender: pending.sender,
        recipient: pending.recipient,
        cancelledBy: caller,
        recipientPayout: payout.toString(),
      });
      this.commit(events);
      return { id, recipientPayout: payout };
    });
  }

  getActiveDelegationsOf(account: Address): readonly DelegationId[] {
    return this.delegations.outgoingIdsOf(account);
  }

  getIncomingDelegationsOf(account: Address): readonly DelegationId[] {
    return this.delegations.incomingIdsOf(account);
  }

  /**
   * Sum of available balances over the account's outgoing delegations.
   */
  getOutgoingAccruedTotal(account: Address, asOf?: UnixSeconds): Amount {
    return this.settlement.availableOutgoing(account, this.viewContext(asOf));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Events
  // ───────────────────────────────────────────────────────────────────────

  subscribe(listener: EventListener): Subscription {
    return this.journal.subscribe(listener);
  }

  readEvents(fromSequence = 1): readonly JournaledEvent[] {
    return this.journal.readAll(fromSequence);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): EngineSnapshot {
    return {
      version: 1,
      config: {
        accruedPerSecond: this.ledger.accruedPerSecond.toString(),
        maxDelegationsAllowed: this.maxDelegations,
        governor: this.governorAddress,
        engineAddress: this.engineAddress,
      },
      accounts: this.ledger.accounts.export(),
      registry: this.delegations.export(),
      events: this.journal.readAll(),
    };
  }

  static fromSnapshot(snap: EngineSnapshot, deps: EngineDependencies): UbiEngine {
    if (snap.version !== 1) {
      throw new DelegationError("INVALID_CONFIG", `Unsupported snapshot version ${String(snap.version)}`);
    }
    for (const record of snap.registry.delegations) {
      if (!isDelegationKind(record.kind)) {
        throw new DelegationError("INVALID_CONFIG", `Delegation ${String(record.id)} has unknown kind "${String(record.kind)}"`);
      }
    }
    for (const entry of snap.events) {
      if (!isEngineEvent(entry.event)) {
        throw new DelegationError("INVALID_CONFIG", `Journal entry ${String(entry.sequence)} is not an engine event`);
      }
    }
    const { engineAddress } = snap.config;
    return new UbiEngine(
      {
        accruedPerSecond: parseBaseUnits(snap.config.accruedPerSecond),
        maxDelegationsAllowed: snap.config.maxDelegationsAllowed,
        governor: snap.config.governor,
        ...(engineAddress !== null ? { engineAddress } : {}),
      },
      { ...deps, journal: deps.journal ?? new EventJournal(snap.events, journalOptions(deps)) },
      {
        accounts: AccountBook.fromRecords(snap.accounts),
        delegations: DelegationRegistry.fromSnapshot(snap.registry),
      },
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private viewContext(asOf?: UnixSeconds): OperationContext {
    if (asOf !== undefined && !isUnixSeconds(asOf)) {
      throw new DelegationError("INVALID_WINDOW", `asOf must be whole unix seconds, got ${String(asOf)}`);
    }
    return createOperationContext(asOf ?? this.clock.now(), this.registry);
  }

  private transactionContext(addresses: Iterable<Address>): OperationContext {
    const ctx = createOperationContext(this.clock.transactionTime(), this.registry);
    ctx.prefetch(addresses);
    return ctx;
  }

  private commit(events: readonly EngineEvent[]): void {
    this.journal.append(events);
  }

  private spendable(account: Address, ctx: OperationContext): Amount {
    return (
      this.ledger.getAccount(account).balance +
      this.ledger.computeAccrued(account, ctx) -
      this.settlement.liveOutgoing(account, ctx) +
      this.settlement.availableIncoming(account, ctx)
    );
  }

  /**
   * Check the account can spend `amount`, then settle its own span and
   * collect its incoming delegations.
   */
  private settleForSpending(
    account: Address,
    amount: Amount,
  ): { ctx: OperationContext; events: EngineEvent[] } {
    const senders = this.delegations.incomingOf(account).map((r) => r.sender);
    const ctx = this.transactionContext([account, ...senders]);

    const available = this.spendable(account, ctx);
    if (available < amount) {
      throw new AccrualError(
        "INSUFFICIENT_BALANCE",
        `Account "${account}" has ${available.toString()}, needs ${amount.toString()}`,
      );
    }

    const events = this.consolidateAll([account], ctx);
    events.push(...this.settlement.collectIncoming(account, ctx));
    return { ctx, events };
  }

  private consolidateAll(senders: readonly Address[], ctx: OperationContext): EngineEvent[] {
    const events: EngineEvent[] = [];
    for (const sender of new Set(senders)) {
      const event = this.settlement.consolidate(sender, ctx);
      if (event !== null) {
        events.push(event);
      }
    }
    return events;
  }

  private requireWithdrawable(id: DelegationId, caller: Address): DelegationRecord {
    const record = this.delegations.require(id);
    if (!flavorOf(record.kind).canWithdraw(record, caller)) {
      throw new DelegationError(
        "UNAUTHORIZED",
        `"${caller}" cannot withdraw from delegation ${String(id)}`,
      );
    }
    return record;
  }

  private assertGovernor(caller: Address): void {
    if (caller !== this.governorAddress) {
      throw new DelegationError("UNAUTHORIZED", `"${caller}" is not the governor`);
    }
  }

  private configChanged(
    key: "maxDelegationsAllowed" | "registry" | "governor",
    value: string,
    changedBy: Address,
    timestamp: UnixSeconds,
  ): EngineEvent {
    return {
      type: "config.changed",
      timestamp,
      key,
      value,
      changedBy,
    };
  }
}

// =============================================================================
// Helpers
// =============================================================================

function journalOptions(deps: EngineDependencies): EventJournalOptions {
  return deps.onListenerError !== undefined ? { onListenerError: deps.onListenerError } : {};
}

function assertPositiveInteger(n: number): void {
  if (!Number.isSafeInteger(n) || n < 1) {
    throw new DelegationError(
      "INVALID_CONFIG",
      `maxDelegationsAllowed must be a positive integer, got ${String(n)}`,
    );
  }
}

function assertPositiveAmount(amount: Amount): void {
  if (amount <= 0n) {
    throw new AccrualError("INVALID_AMOUNT", `Amount must be positive, got ${amount.toString()}`);
  }
}
