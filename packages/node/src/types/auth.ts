/**
 * Authentication and authorization types.
 *
 * Every API key is bound to one account address: the engine acts on
 * behalf of that address and nothing in the request can change it.
 *
 * Role hierarchy: operator > viewer
 */

import type { Address } from "@ubistream/types";

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "operator" | "viewer";

/** Permission levels for role-based access control */
export type Permission = "read" | "write";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Readonly<Record<Role, readonly Permission[]>> = {
  viewer: ["read"],
  operator: ["read", "write"],
};

export function isRole(value: string): value is Role {
  return value === "operator" || value === "viewer";
}

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 */
export interface AuthContext {
  /** The API key that authenticated the request */
  readonly identity: string;
  readonly role: Role;
  /** Account the key acts for */
  readonly address: Address;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly address: Address;
}
