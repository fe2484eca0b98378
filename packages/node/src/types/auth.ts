/**
 * Authentication and authorization types.
 *
 * Identity is external: an API key resolves to a username and a role.
 * The username is recorded verbatim as the actor on ledger records.
 *
 * Viewers may read. Operators and admins may also write.
 */

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "operator" | "viewer";

export type Permission = "read" | "write";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  operator: ["read", "write"],
  admin: ["read", "write"],
};

export function isRole(value: string): value is Role {
  return value === "admin" || value === "operator" || value === "viewer";
}

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved identity for the current request, set by the auth middleware.
 */
export interface AuthContext {
  readonly username: string;
  readonly role: Role;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly username: string;
}
