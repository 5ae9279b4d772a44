/**
 * Authentication and authorization types.
 *
 * Callers authenticate with an API key via the X-Api-Key header. Each key
 * is bound to a role and to the vault account it acts as.
 *
 * Role hierarchy: admin > operator > viewer
 */

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "operator" | "viewer";

/** Permission levels for role-based access control */
export type Permission = "read" | "write" | "admin";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  operator: ["read", "write"],
  admin: ["read", "write", "admin"],
};

export function isRole(value: string): value is Role {
  return value === "admin" || value === "operator" || value === "viewer";
}

/**
 * Check whether a role has a specific permission.
 */
export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 *
 * `account` is the vault address every operation of the request runs as.
 */
export interface AuthContext {
  readonly type: "api-key" | "open";
  readonly identity: string;
  readonly role: Role;
  readonly account: string;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly account: string;
}
