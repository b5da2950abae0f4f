/**
 * @ubistream/accrual: Accrual ledger.
 *
 * Balances are not stored per tick. An accruing account owns
 * `accruedPerSecond * (now - accrualStartTime)` on top of its settled
 * balance, for as long as the registry says it is verified.
 *
 * API surface:
 * - computeAccrued(): Pending accrual as seen at `ctx.now`
 * - grossAccrued(): Pending accrual ignoring verification
 * - startAccruing(): Begin accruing (verified, not yet accruing)
 * - assertRemovable(): Preconditions of a removal report
 * - consolidate(): Fold the pending span into the settled balance
 * - close(): Pay out the pending span to a reporter and stop accruing
 *
 * Delegation lives one layer up: callers pass in the part of the span
 * that belongs to outgoing delegations.
 */

import type { Address, Amount } from "@ubistream/types";
import { AccountBook } from "./account-book.js";
import { accruedOver } from "./accrual-math.js";
import type { OperationContext } from "./operation-context.js";
import type { AccountState, AccrualConfig } from "./types.js";
import { AccrualError } from "./types.js";

export class AccrualLedger {
  private readonly _config: AccrualConfig;
  private readonly _book: AccountBook;

  constructor(config: AccrualConfig, book: AccountBook = new AccountBook()) {
    if (config.accruedPerSecond <= 0n) {
      throw new AccrualError(
        "INVALID_AMOUNT",
        `accruedPerSecond must be positive, got ${config.accruedPerSecond.toString()}`,
      );
    }
    this._config = config;
    this._book = book;
  }

  get accruedPerSecond(): Amount {
    return this._config.accruedPerSecond;
  }

  get accounts(): AccountBook {
    return this._book;
  }

  getAccount(address: Address): AccountState {
    return this._book.get(address);
  }

  isAccruing(address: Address): boolean {
    return this._book.get(address).accrualStartTime !== 0;
  }

  // ─── Views ───────────────────────────────────────────────────────────

  /**
   * Pending accrual at `ctx.now`. Zero when not accruing or not verified.
   * Throws TIME_BEFORE_CHECKPOINT if `ctx.now` precedes the accrual start.
   */
  computeAccrued(address: Address, ctx: OperationContext): Amount {
    const { accrualStartTime } = this._book.get(address);
    if (accrualStartTime === 0) {
      return 0n;
    }
    const gross = accruedOver(this._config.accruedPerSecond, accrualStartTime, ctx.now);
    return ctx.isVerified(address) ? gross : 0n;
  }

  /**
   * Pending accrual at `ctx.now` without consulting the registry.
   */
  grossAccrued(address: Address, ctx: OperationContext): Amount {
    const { accrualStartTime } = this._book.get(address);
    if (accrualStartTime === 0) {
      return 0n;
    }
    return accruedOver(this._config.accruedPerSecond, accrualStartTime, ctx.now);
  }

  // ─── Lifecycle ───────────────────────────────────────────────────────

  assertCanStartAccruing(address: Address, ctx: OperationContext): void {
    if (this.isAccruing(address)) {
      throw new AccrualError("ALREADY_ACCRUING", `Account "${address}" is already accruing`);
    }
    if (!ctx.isVerified(address)) {
      throw new AccrualError("NOT_VERIFIED", `Account "${address}" is not verified`);
    }
  }

  startAccruing(address: Address, ctx: OperationContext): AccountState {
    this.assertCanStartAccruing(address, ctx);
    return this._book.setAccrualStartTime(address, ctx.now);
  }

  assertRemovable(address: Address, ctx: OperationContext): void {
    if (ctx.isVerified(address)) {
      throw new AccrualError("STILL_VERIFIED", `Account "${address}" is still verified`);
    }
    if (!this.isAccruing(address)) {
      throw new AccrualError("NOT_ACCRUING", `Account "${address}" is not accruing`);
    }
  }

  // ─── Settlement ──────────────────────────────────────────────────────

  /**
   * Fold the pending span into the account's own balance, minus the part
   * owed to outgoing delegations, and restart the span at `ctx.now`.
   *
   * Returns the amount credited.
   */
  consolidate(address: Address, ctx: OperationContext, delegated: Amount): Amount {
    const credited = this._netOf(address, ctx, delegated);
    this._book.credit(address, credited);
    this._book.setAccrualStartTime(address, ctx.now);
    return credited;
  }

  /**
   * Pay the pending span (minus the delegated part) to `reporter` and
   * stop the account accruing.
   *
   * Returns the reporter's reward.
   */
  close(
    address: Address,
    reporter: Address,
    ctx: OperationContext,
    delegated: Amount,
  ): Amount {
    const reward = this._netOf(address, ctx, delegated);
    this._book.setAccrualStartTime(address, 0);
    this._book.credit(reporter, reward);
    return reward;
  }

  private _netOf(address: Address, ctx: OperationContext, delegated: Amount): Amount {
    const gross = this.grossAccrued(address, ctx);
    if (delegated > gross) {
      throw new Error(
        `Delegated share ${delegated.toString()} exceeds accrual ${gross.toString()} for "${address}"`,
      );
    }
    return gross - delegated;
  }
}
