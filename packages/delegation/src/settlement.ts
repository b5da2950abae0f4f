/**
 * @ubistream/delegation: Settlement engine.
 *
 * Splits a sender's accrual span between the sender and its outgoing
 * delegations, and pays delegation balances out to recipients.
 *
 * Rules:
 * - A delegation earns `rate × overlap(window, span)` of its sender's
 *   current span, and only while the sender is verified
 * - Consolidation settles the span of every outgoing delegation and the
 *   sender's own remainder at the same `now`
 * - Payouts never exceed a delegation's available balance
 */

import type { AccrualLedger, OperationContext } from "@ubistream/accrual";
import { shareOver } from "@ubistream/accrual";
import type {
  AccrualConsolidatedEvent,
  Address,
  Amount,
  DelegationWithdrawnEvent,
  EngineEvent,
  RemovalReportedEvent,
  UnixSeconds,
} from "@ubistream/types";
import type { DelegationRegistry } from "./delegation-registry.js";
import { delegationWindow, flavorOf } from "./flavors.js";
import type { DelegationRecord } from "./types.js";

interface SpanShare {
  readonly record: DelegationRecord;
  readonly share: Amount;
}

export class SettlementEngine {
  private readonly _ledger: AccrualLedger;
  private readonly _registry: DelegationRegistry;

  constructor(ledger: AccrualLedger, registry: DelegationRegistry) {
    this._ledger = ledger;
    this._registry = registry;
  }

  // ─── Views ───────────────────────────────────────────────────────────

  /**
   * The delegation's part of its sender's unconsolidated span at `ctx.now`.
   */
  liveShare(record: DelegationRecord, ctx: OperationContext): Amount {
    const { accrualStartTime } = this._ledger.getAccount(record.sender);
    if (accrualStartTime === 0) {
      return 0n;
    }
    const share = shareOver(record.ratePerSecond, delegationWindow(record), accrualStartTime, ctx.now);
    return ctx.isVerified(record.sender) ? share : 0n;
  }

  /**
   * What the recipient could withdraw at `ctx.now`.
   */
  availableOf(record: DelegationRecord, ctx: OperationContext): Amount {
    return record.settledAccrued + this.liveShare(record, ctx) - record.withdrawn;
  }

  /**
   * Sum of live shares of the sender's active delegations.
   */
  liveOutgoing(sender: Address, ctx: OperationContext): Amount {
    let total = 0n;
    for (const record of this._registry.outgoingOf(sender)) {
      total += this.liveShare(record, ctx);
    }
    return total;
  }

  /**
   * Sum of available balances of delegations targeting the account.
   */
  availableIncoming(recipient: Address, ctx: OperationContext): Amount {
    let total = 0n;
    for (const record of this._registry.incomingOf(recipient)) {
      total += this.availableOf(record, ctx);
    }
    return total;
  }

  /**
   * Sum of available balances of the sender's active delegations.
   */
  availableOutgoing(sender: Address, ctx: OperationContext): Amount {
    let total = 0n;
    for (const record of this._registry.outgoingOf(sender)) {
      total += this.availableOf(record, ctx);
    }
    return total;
  }

  // ─── Settlement ──────────────────────────────────────────────────────

  /**
   * Settle the sender's span at `ctx.now`. Returns null when there is
   * nothing to settle: not accruing, not verified, or already settled
   * at this instant.
   */
  consolidate(sender: Address, ctx: OperationContext): AccrualConsolidatedEvent | null {
    const { accrualStartTime } = this._ledger.getAccount(sender);
    if (accrualStartTime === 0 || accrualStartTime === ctx.now || !ctx.isVerified(sender)) {
      return null;
    }

    const shares = this._spanShares(sender, accrualStartTime, ctx.now);
    const delegated = sumShares(shares);
    const credited = this._ledger.consolidate(sender, ctx, delegated);
    this._applyShares(shares);

    return {
      type: "accrual.consolidated",
      timestamp: ctx.now,
      account: sender,
      credited: credited.toString(),
      delegated: delegated.toString(),
    };
  }

  /**
   * Settle the span of a removed account regardless of verification:
   * delegations keep their share, the reporter gets the rest.
   */
  settleRemoval(account: Address, reporter: Address, ctx: OperationContext): RemovalReportedEvent {
    const { accrualStartTime } = this._ledger.getAccount(account);
    const shares = this._spanShares(account, accrualStartTime, ctx.now);
    const reward = this._ledger.close(account, reporter, ctx, sumShares(shares));
    this._applyShares(shares);

    return {
      type: "accrual.removal-reported",
      timestamp: ctx.now,
      account,
      reporter,
      reward: reward.toString(),
    };
  }

  /**
   * Pay `amount` of a delegation to its recipient. A completed
   * delegation with nothing left is tombstoned.
   */
  payOut(record: DelegationRecord, amount: Amount, ctx: OperationContext): DelegationWithdrawnEvent {
    const available = this.availableOf(record, ctx);
    if (amount < 0n || amount > available) {
      throw new Error(
        `Payout ${amount.toString()} outside available ${available.toString()} for delegation ${String(record.id)}`,
      );
    }

    const paid: DelegationRecord = { ...record, withdrawn: record.withdrawn + amount };
    const completed = flavorOf(record.kind).isComplete(record, ctx.now) && available === amount;

    this._ledger.accounts.credit(record.recipient, amount);
    if (completed) {
      this._registry.settle(record.id, "completed", ctx.now);
    } else {
      this._registry.update(paid);
    }

    return {
      type: "delegation.withdrawn",
      timestamp: ctx.now,
      id: record.id,
      sender: record.sender,
      recipient: record.recipient,
      amount: amount.toString(),
      completed,
    };
  }

  /**
   * Move every incoming delegation balance into the account's settled
   * balance, consolidating each sender first.
   */
  collectIncoming(account: Address, ctx: OperationContext): readonly EngineEvent[] {
    const events: EngineEvent[] = [];

    for (const id of this._registry.incomingIdsOf(account)) {
      const sender = this._registry.require(id).sender;
      const consolidated = this.consolidate(sender, ctx);
      if (consolidated !== null) {
        events.push(consolidated);
      }

      const record = this._registry.require(id);
      const available = this.availableOf(record, ctx);
      if (available > 0n || flavorOf(record.kind).isComplete(record, ctx.now)) {
        events.push(this.payOut(record, available, ctx));
      }
    }

    return events;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _spanShares(sender: Address, from: UnixSeconds, to: UnixSeconds): SpanShare[] {
    if (from === 0) {
      return [];
    }
    return this._registry
      .outgoingOf(sender)
      .map((record) => ({
        record,
        share: shareOver(record.ratePerSecond, delegationWindow(record), from, to),
      }))
      .filter(({ share }) => share > 0n);
  }

  private _applyShares(shares: readonly SpanShare[]): void {
    for (const { record, share } of shares) {
      this._registry.update({ ...record, settledAccrued: record.settledAccrued + share });
    }
  }
}

function sumShares(shares: readonly SpanShare[]): Amount {
  return shares.reduce((total, { share }) => total + share, 0n);
}
