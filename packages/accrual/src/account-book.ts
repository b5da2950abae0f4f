/**
 * @ubistream/accrual: Account book.
 *
 * Accounts are implicit: every address has a zero, non-accruing state
 * until something is written for it. Stored states are immutable values
 * replaced on every write.
 *
 * Rules:
 * - Balances never go negative
 * - Only explicit mutations change a stored balance
 */

import type { Address, Amount, UnixSeconds } from "@ubistream/types";
import type { AccountRecord, AccountState } from "./types.js";
import { AccrualError } from "./types.js";
import { parseBaseUnits } from "./accrual-math.js";

const EMPTY_ACCOUNT: AccountState = { balance: 0n, accrualStartTime: 0 };

export class AccountBook {
  private readonly _accounts: Map<Address, AccountState> = new Map();

  /**
   * Get an account's stored state (zero state for unknown addresses).
   */
  get(address: Address): AccountState {
    return this._accounts.get(address) ?? EMPTY_ACCOUNT;
  }

  credit(address: Address, amount: Amount): AccountState {
    this._assertNonNegative(amount);
    const current = this.get(address);
    return this._write(address, { ...current, balance: current.balance + amount });
  }

  /**
   * Remove value from an account's settled balance.
   * Throws INSUFFICIENT_BALANCE rather than going negative.
   */
  debit(address: Address, amount: Amount): AccountState {
    this._assertNonNegative(amount);
    const current = this.get(address);
    if (current.balance < amount) {
      throw new AccrualError(
        "INSUFFICIENT_BALANCE",
        `Account "${address}" has ${current.balance.toString()}, needs ${amount.toString()}`,
      );
    }
    return this._write(address, { ...current, balance: current.balance - amount });
  }

  setAccrualStartTime(address: Address, time: UnixSeconds): AccountState {
    return this._write(address, { ...this.get(address), accrualStartTime: time });
  }

  // ─── Serialization ───────────────────────────────────────────────────

  export(): readonly AccountRecord[] {
    return [...this._accounts.entries()].map(([address, state]) => ({
      address,
      balance: state.balance.toString(),
      accrualStartTime: state.accrualStartTime,
    }));
  }

  static fromRecords(records: readonly AccountRecord[]): AccountBook {
    const book = new AccountBook();
    for (const record of records) {
      book._write(record.address, {
        balance: parseBaseUnits(record.balance),
        accrualStartTime: record.accrualStartTime,
      });
    }
    return book;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _write(address: Address, state: AccountState): AccountState {
    this._accounts.set(address, state);
    return state;
  }

  private _assertNonNegative(amount: Amount): void {
    if (amount < 0n) {
      throw new AccrualError("INVALID_AMOUNT", `Amount must not be negative, got ${amount.toString()}`);
    }
  }
}
