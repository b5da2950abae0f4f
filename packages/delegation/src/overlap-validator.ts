/**
 * @ubistream/delegation: Overlap & capacity validator.
 *
 * Checks, in order:
 * 1. The sender has no delegation to the same recipient overlapping the
 *    proposed window (OVERLAPPING_TO_SAME_RECIPIENT)
 * 2. The recipient has no delegation back to the sender overlapping the
 *    proposed window (CIRCULAR_DELEGATION)
 * 3. The rates of the sender's delegations overlapping the proposed
 *    window, plus the proposed rate, fit in the base rate
 *    (INSUFFICIENT_CAPACITY)
 *
 * Each check is a linear scan over one party's outgoing delegations,
 * bounded by the engine's maxDelegationsAllowed.
 */

import type { Address, Amount, TimeWindow } from "@ubistream/types";
import { windowsOverlap } from "@ubistream/accrual";
import type { DelegationRegistry } from "./delegation-registry.js";
import { delegationWindow } from "./flavors.js";
import { DelegationError } from "./types.js";

export interface DelegationProposal {
  readonly sender: Address;
  readonly recipient: Address;
  readonly ratePerSecond: Amount;
  readonly window: TimeWindow;
}

export class OverlapValidator {
  private readonly _registry: DelegationRegistry;

  constructor(registry: DelegationRegistry) {
    this._registry = registry;
  }

  validate(proposal: DelegationProposal, baseRate: Amount): void {
    const outgoing = this._registry.outgoingOf(proposal.sender);

    for (const existing of outgoing) {
      if (
        existing.recipient === proposal.recipient &&
        windowsOverlap(delegationWindow(existing), proposal.window)
      ) {
        throw new DelegationError(
          "OVERLAPPING_TO_SAME_RECIPIENT",
          `Delegation ${String(existing.id)} already covers "${proposal.recipient}" in this window`,
        );
      }
    }

    for (const reverse of this._registry.outgoingOf(proposal.recipient)) {
      if (
        reverse.recipient === proposal.sender &&
        windowsOverlap(delegationWindow(reverse), proposal.window)
      ) {
        throw new DelegationError(
          "CIRCULAR_DELEGATION",
          `Delegation ${String(reverse.id)} already flows from "${proposal.recipient}" back to "${proposal.sender}" in this window`,
        );
      }
    }

    const committed = this.committedRate(proposal.sender, proposal.window);
    if (committed + proposal.ratePerSecond > baseRate) {
      throw new DelegationError(
        "INSUFFICIENT_CAPACITY",
        `Sender "${proposal.sender}" has ${(baseRate - committed).toString()} per second free in this window, requested ${proposal.ratePerSecond.toString()}`,
      );
    }
  }

  /**
   * Sum of the rates of the sender's delegations that overlap `window`.
   */
  committedRate(sender: Address, window: TimeWindow): Amount {
    let total = 0n;
    for (const existing of this._registry.outgoingOf(sender)) {
      if (windowsOverlap(delegationWindow(existing), window)) {
        total += existing.ratePerSecond;
      }
    }
    return total;
  }
}
