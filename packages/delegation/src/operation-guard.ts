/**
 * @ubistream/delegation: Re-entrancy guard.
 *
 * An explicit idle / in-progress flag wrapped around every mutating
 * operation. A nested mutating call (from an event listener, say)
 * fails with REENTRANT_CALL instead of interleaving with the outer one.
 */

import { DelegationError } from "./types.js";

export type GuardState =
  | { readonly status: "idle" }
  | { readonly status: "in-progress"; readonly operation: string };

export class OperationGuard {
  private _state: GuardState = { status: "idle" };

  get state(): GuardState {
    return this._state;
  }

  run<T>(operation: string, fn: () => T): T {
    if (this._state.status === "in-progress") {
      throw new DelegationError(
        "REENTRANT_CALL",
        `Cannot start "${operation}" while "${this._state.operation}" is in progress`,
      );
    }
    this._state = { status: "in-progress", operation };
    try {
      return fn();
    } finally {
      this._state = { status: "idle" };
    }
  }
}
