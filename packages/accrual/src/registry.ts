/**
 * @ubistream/accrual: Registry gateway.
 *
 * The engine treats the identity registry as a pure boolean oracle:
 * "is this address currently a verified unique human?"
 */

import type { Address } from "@ubistream/types";

export interface RegistryGateway {
  isVerified(address: Address): boolean;
}

/**
 * Registry backed by an in-process set of verified addresses.
 */
export class InMemoryRegistry implements RegistryGateway {
  private readonly _verified: Set<Address>;

  constructor(verified?: Iterable<Address>) {
    this._verified = new Set(verified);
  }

  isVerified(address: Address): boolean {
    return this._verified.has(address);
  }

  setVerified(address: Address, verified: boolean): void {
    if (verified) {
      this._verified.add(address);
    } else {
      this._verified.delete(address);
    }
  }

  verifiedAddresses(): readonly Address[] {
    return [...this._verified];
  }
}
