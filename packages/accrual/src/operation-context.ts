/**
 * @ubistream/accrual: Per-operation context.
 *
 * One context per public operation: a single `now`, and registry answers
 * memoized for the life of that operation only.
 */

import type { Address, UnixSeconds } from "@ubistream/types";
import type { RegistryGateway } from "./registry.js";

export interface OperationContext {
  readonly now: UnixSeconds;

  isVerified(address: Address): boolean;

  /**
   * Query the registry for every address up front, so that the effect
   * phase of an operation never calls out.
   */
  prefetch(addresses: Iterable<Address>): void;
}

export function createOperationContext(
  now: UnixSeconds,
  registry: RegistryGateway,
): OperationContext {
  const answers = new Map<Address, boolean>();

  const isVerified = (address: Address): boolean => {
    const cached = answers.get(address);
    if (cached !== undefined) {
      return cached;
    }
    const verified = registry.isVerified(address);
    answers.set(address, verified);
    return verified;
  };

  return {
    now,
    isVerified,
    prefetch(addresses) {
      for (const address of addresses) {
        isVerified(address);
      }
    },
  };
}
