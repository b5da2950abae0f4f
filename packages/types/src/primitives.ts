/**
 * Primitive Types
 *
 * The scalar vocabulary shared by every ubistream package.
 *
 * Rules:
 * - Value is always bigint base units (no floating point)
 * - Time is always whole unix seconds
 * - Addresses are compared as given; normalize at system boundaries
 */

/** An account identifier (EVM-style hex address, lower-cased at the API edge). */
export type Address = string;

/** Whole seconds since the unix epoch. */
export type UnixSeconds = number;

/** Token value in base units. */
export type Amount = bigint;

/** Delegation identifier. Allocated from a monotonic counter, never reused. */
export type DelegationId = number;

/** The address that can never own value or receive a delegation. */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";
